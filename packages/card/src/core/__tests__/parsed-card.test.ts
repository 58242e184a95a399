import { Issuer } from "../../ports/issuer"
import { maskPan } from "../parsed-card"
import { parseCard } from "../validate"

describe("maskPan", () => {
  it("keeps the first six and last four digits", () => {
    expect(maskPan("4111111111111111")).toBe("411111******1111")
    expect(maskPan("378282246310005")).toBe("378282*****0005")
    expect(maskPan("4222222222222")).toBe("422222***2222")
  })

  it("keeps only the last four digits of short input", () => {
    expect(maskPan("1234567890")).toBe("******7890")
    expect(maskPan("123")).toBe("123")
  })
})

describe("ParsedCard", () => {
  const visa = parseCard("4111111111111111")

  it("exposes the numeric value and issuer", () => {
    expect(visa.pan).toBe(4111111111111111n)
    expect(visa.issuer).toBe(Issuer.Visa)
    expect(visa.length).toBe(16)
  })

  it("looks up the issuer display name", () => {
    expect(visa.issuerName()).toBe("Visa")
    expect(parseCard("378282246310005").issuerName()).toBe("American Express")
    expect(parseCard("6040010000000008").issuerName()).toBe("UkrCard")
  })

  it("returns the digit string from toString()", () => {
    expect(visa.toString()).toBe("4111111111111111")
    expect(`${parseCard("6763990100000000015")}`).toBe("6763990100000000015")
  })

  it("returns the last four digits", () => {
    expect(visa.lastFour()).toBe("1111")
  })

  it("masks the number", () => {
    expect(visa.masked()).toBe("411111******1111")
  })

  it("compares by value", () => {
    expect(visa.equals(parseCard("4111111111111111"))).toBe(true)
    expect(visa.equals(parseCard("4012888888881881"))).toBe(false)
  })

  it("serializes without the full number", () => {
    expect(JSON.stringify(visa)).toBe(
      '{"issuer":"Visa","issuerName":"Visa","length":16,"masked":"411111******1111"}',
    )
  })

  it("is frozen", () => {
    expect(Object.isFrozen(visa)).toBe(true)
  })
})
