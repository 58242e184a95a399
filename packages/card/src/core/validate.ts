import type { ValidationResult } from "../ports/card-validator"
import { ValidationErrorCode } from "../ports/error"
import { CardValidationError } from "./errors/card-validation-error"
import { checkFormat } from "./format"
import { classifyIssuer, readIin } from "./issuer-ranges"
import { isLengthValid } from "./issuers"
import { isLuhnValid, toDigits } from "./luhn"
import { ParsedCard } from "./parsed-card"

/**
 * Classify and validate a card number.
 *
 * Stages run in order and the first failure wins: format, issuer lookup, length, Luhn.
 * Pure: the same input always yields an equal result.
 *
 * @example
 * ```ts
 * const result = validate("4111111111111111")
 * if (result.ok) result.card.issuerName() // "Visa"
 * ```
 */
export function validate(input: string): ValidationResult {
  const format = checkFormat(input)
  if (!format.ok) return format

  const { digits, pan } = format
  const length = digits.length

  const issuer = classifyIssuer(readIin(digits))
  if (issuer === undefined) {
    return { ok: false, error: new CardValidationError(ValidationErrorCode.UnknownType, { length }) }
  }

  if (!isLengthValid(issuer, length)) {
    return {
      ok: false,
      error: new CardValidationError(ValidationErrorCode.InvalidLength, { length, issuer }),
    }
  }

  if (!isLuhnValid(toDigits(digits))) {
    return {
      ok: false,
      error: new CardValidationError(ValidationErrorCode.InvalidLuhn, { length, issuer }),
    }
  }

  return { ok: true, card: new ParsedCard(digits, pan, issuer) }
}

/**
 * Parse a card number, throwing on the first failed stage.
 *
 * @throws CardValidationError
 */
export function parseCard(input: string): ParsedCard {
  const result = validate(input)
  if (!result.ok) throw result.error

  return result.card
}

export function isValidCard(input: string): boolean {
  return validate(input).ok
}
