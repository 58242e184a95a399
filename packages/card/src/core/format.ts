import { ValidationErrorCode } from "../ports/error"
import { CardValidationError } from "./errors/card-validation-error"

/** Fewest digits any issuer accepts. */
export const MIN_CARD_LENGTH = 12

/** Largest value of an unsigned 64-bit integer. */
export const MAX_PAN = 18_446_744_073_709_551_615n

const DIGITS = /^[0-9]+$/

export type FormatCheck =
  | { ok: true; digits: string; pan: bigint }
  | { ok: false; error: CardValidationError }

/**
 * Cheap rejections made before any table lookup.
 *
 * - `invalid_format`: empty input, any character outside `0-9`, or a value above
 *   {@link MAX_PAN} (leading zeros do not count toward the limit)
 * - `unknown_type`: fewer than {@link MIN_CARD_LENGTH} digits, or a leading `0`
 */
export function checkFormat(input: string): FormatCheck {
  if (!DIGITS.test(input)) {
    return fail(ValidationErrorCode.InvalidFormat, input)
  }

  const pan = BigInt(input)

  if (pan > MAX_PAN) {
    return fail(ValidationErrorCode.InvalidFormat, input)
  }

  if (input.length < MIN_CARD_LENGTH || input.startsWith("0")) {
    return fail(ValidationErrorCode.UnknownType, input)
  }

  return { ok: true, digits: input, pan }
}

function fail(code: ValidationErrorCode, input: string): FormatCheck {
  return {
    ok: false,
    error: new CardValidationError(code, { length: input.length, stage: "format" }),
  }
}
