const ZERO = "0".charCodeAt(0)

/** Digit values of an ASCII decimal digit string. */
export function toDigits(digits: string): number[] {
  return Array.from(digits, (c) => c.charCodeAt(0) - ZERO)
}

/**
 * Luhn sum over `digits` (values 0-9, most significant first).
 *
 * Positions are counted from the rightmost digit starting at 1. Odd positions add their
 * value, even positions add double their value less 9 when the double exceeds 9. Every
 * digit is visited exactly once.
 */
export function luhnChecksum(digits: readonly number[]): number {
  let sum = 0

  for (let i = digits.length - 1, position = 1; i >= 0; i--, position++) {
    const d = digits[i] ?? 0

    if (position % 2 === 1) {
      sum += d
    } else {
      const doubled = d * 2
      sum += doubled > 9 ? doubled - 9 : doubled
    }
  }

  return sum
}

export function isLuhnValid(digits: readonly number[]): boolean {
  return luhnChecksum(digits) % 10 === 0
}

/**
 * The check digit that completes `payload` into a Luhn-valid sequence.
 *
 * Appending the digit shifts every payload digit one position left, so the checksum of
 * `payload + [0]` already weighs them correctly.
 */
export function luhnCheckDigit(payload: readonly number[]): number {
  const sum = luhnChecksum([...payload, 0])

  return (10 - (sum % 10)) % 10
}
