import type { CardValidationError } from "../core/errors/card-validation-error"
import type { ParsedCard } from "../core/parsed-card"

export type ValidationResult =
  | { ok: true; card: ParsedCard }
  | { ok: false; error: CardValidationError }

/**
 * Validates card numbers given as plain ASCII digit strings (no spaces or dashes).
 */
export interface CardValidator {
  /** Classify and validate `input`. Never throws. */
  validate(input: string): ValidationResult

  /**
   * Parse `input` into a {@link ParsedCard}.
   * @throws CardValidationError if any validation stage rejects the input
   */
  parse(input: string): ParsedCard

  /** `true` if `input` passes every validation stage */
  isValid(input: string): boolean
}
