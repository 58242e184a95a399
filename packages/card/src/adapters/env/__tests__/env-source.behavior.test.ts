import { ENV_PREFIX, EnvSource } from "../env-source"

describe("EnvSource", () => {
  afterEach(() => {
    vi.unstubAllEnvs()
  })

  it("is named after its prefix", () => {
    expect(new EnvSource().name).toBe("env:CARDCHECK_")
    expect(new EnvSource({ prefix: "APP_" }).name).toBe("env:APP_")
  })

  it("keeps only CARDCHECK_ keys by default and strips the prefix", async () => {
    const source = new EnvSource({
      env: { CARDCHECK_LOG_LEVEL: "debug", PATH: "/usr/bin", CARDCHECK: "x" },
    })

    await expect(source.load()).resolves.toEqual({ LOG_LEVEL: "debug" })
  })

  it("ignores a variable named exactly the prefix", async () => {
    const source = new EnvSource({ env: { [ENV_PREFIX]: "x" } })

    await expect(source.load()).resolves.toEqual({})
  })

  it("loads every key with an empty prefix", async () => {
    const source = new EnvSource({ prefix: "", env: { A: "1", B: "2" } })

    await expect(source.load()).resolves.toEqual({ A: "1", B: "2" })
  })

  it("trims values", async () => {
    const source = new EnvSource({ env: { CARDCHECK_SERVICE_NAME: "  checkout\n" } })

    await expect(source.load()).resolves.toEqual({ SERVICE_NAME: "checkout" })
  })

  it("leaves out blank and unset values", async () => {
    const source = new EnvSource({
      env: {
        CARDCHECK_LOG_LEVEL: "",
        CARDCHECK_LOG_PRETTY: "   ",
        CARDCHECK_SERVICE_NAME: undefined,
      },
    })

    await expect(source.load()).resolves.toEqual({})
  })

  it("reads process.env by default", async () => {
    vi.stubEnv("CARDCHECK_SERVICE_NAME", "checkout")

    const values = await new EnvSource().load()

    expect(values.SERVICE_NAME).toBe("checkout")
  })
})
