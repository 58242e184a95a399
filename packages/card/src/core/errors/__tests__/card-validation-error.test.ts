import { ValidationErrorCode } from "../../../ports/error"
import {
  CardValidationError,
  isCardValidationError,
  serializeValidationError,
} from "../card-validation-error"

describe("CardValidationError", () => {
  beforeEach(() => {
    vi.useFakeTimers()
    vi.setSystemTime(new Date("2024-01-15T10:30:00.000Z"))
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  describe("construction", () => {
    it("sets code, message and name", () => {
      const err = new CardValidationError(ValidationErrorCode.InvalidLuhn, { length: 16 })

      expect(err).toBeInstanceOf(Error)
      expect(err.code).toBe("invalid_luhn")
      expect(err.message).toBe("Card number fails the Luhn checksum")
      expect(err.name).toBe("CardValidationError")
    })

    it.each([
      [ValidationErrorCode.InvalidFormat, "format"],
      [ValidationErrorCode.UnknownType, "classify"],
      [ValidationErrorCode.InvalidLength, "length"],
      [ValidationErrorCode.InvalidLuhn, "checksum"],
    ])("derives the stage for %s", (code, stage) => {
      const err = new CardValidationError(code, { length: 16 })

      expect(err.context.stage).toBe(stage)
    })

    it("accepts an explicit stage", () => {
      const err = new CardValidationError(ValidationErrorCode.UnknownType, {
        length: 4,
        stage: "format",
      })

      expect(err.context).toEqual({ stage: "format", length: 4 })
    })

    it("includes the issuer only when given", () => {
      const err = new CardValidationError(ValidationErrorCode.InvalidLength, {
        length: 17,
        issuer: "Visa",
      })

      expect(err.context).toEqual({ stage: "length", length: 17, issuer: "Visa" })
      expect(new CardValidationError(ValidationErrorCode.UnknownType, { length: 15 }).context)
        .not.toHaveProperty("issuer")
    })

    it("is never retryable and always operational", () => {
      const err = new CardValidationError(ValidationErrorCode.InvalidFormat, { length: 0 })

      expect(err.isRetryable).toBe(false)
      expect(err.isOperational).toBe(true)
    })

    it("does not depend on the clock", () => {
      const first = new CardValidationError(ValidationErrorCode.InvalidFormat, { length: 0 })
      vi.setSystemTime(new Date("2024-01-15T10:30:01.000Z"))
      const second = new CardValidationError(ValidationErrorCode.InvalidFormat, { length: 0 })

      expect(first).not.toHaveProperty("timestamp")
      expect(JSON.stringify(second)).toBe(JSON.stringify(first))
    })

    it("freezes context to prevent mutation", () => {
      const err = new CardValidationError(ValidationErrorCode.InvalidFormat, { length: 0 })

      expect(Object.isFrozen(err.context)).toBe(true)
    })
  })

  describe("serialization", () => {
    it("produces a JSON-safe shape", () => {
      const err = new CardValidationError(ValidationErrorCode.InvalidLength, {
        length: 17,
        issuer: "Visa",
      })

      expect(err.toJSON()).toEqual({
        name: "CardValidationError",
        code: "invalid_length",
        message: "Card number length is not valid for its issuer",
        context: { stage: "length", length: 17, issuer: "Visa" },
        isRetryable: false,
        isOperational: true,
      })
    })

    it("omits the stack unless asked", () => {
      const err = new CardValidationError(ValidationErrorCode.InvalidLuhn, { length: 16 })

      expect(serializeValidationError(err)).not.toHaveProperty("stack")
      expect(serializeValidationError(err, { includeStack: true }).stack).toBe(err.stack)
    })
  })
})

describe("isCardValidationError", () => {
  it("accepts instances", () => {
    expect(
      isCardValidationError(new CardValidationError(ValidationErrorCode.InvalidLuhn, { length: 16 })),
    ).toBe(true)
  })

  it("accepts structurally matching errors", () => {
    const foreign = Object.assign(new Error("Card number fails the Luhn checksum"), {
      code: "invalid_luhn",
      context: { stage: "checksum", length: 16 },
      isRetryable: false,
      isOperational: true,
    })

    expect(isCardValidationError(foreign)).toBe(true)
  })

  it("rejects other errors and values", () => {
    expect(isCardValidationError(new Error("boom"))).toBe(false)
    expect(
      isCardValidationError(
        Object.assign(new Error("x"), {
          code: "not_found",
          context: {},
          isRetryable: false,
          isOperational: true,
            }),
      ),
    ).toBe(false)
    expect(isCardValidationError({ code: "invalid_luhn" })).toBe(false)
    expect(isCardValidationError(null)).toBe(false)
  })
})
