import type { Issuer } from "../ports/issuer"
import { issuerName } from "./issuers"

const MASK = "*"
const VISIBLE_PREFIX = 6
const VISIBLE_SUFFIX = 4

/**
 * Keep the IIN and last four digits of a PAN, masking the rest.
 *
 * @example
 * ```ts
 * maskPan("4111111111111111") // "411111******1111"
 * ```
 */
export function maskPan(digits: string): string {
  if (digits.length <= VISIBLE_PREFIX + VISIBLE_SUFFIX) {
    return MASK.repeat(Math.max(0, digits.length - VISIBLE_SUFFIX)) + digits.slice(-VISIBLE_SUFFIX)
  }

  const hidden = digits.length - VISIBLE_PREFIX - VISIBLE_SUFFIX

  return digits.slice(0, VISIBLE_PREFIX) + MASK.repeat(hidden) + digits.slice(-VISIBLE_SUFFIX)
}

export type SerializedCard = Readonly<{
  issuer: Issuer
  issuerName: string
  length: number
  masked: string
}>

/**
 * A card number that passed every validation stage.
 *
 * Instances come only from the validation pipeline.
 */
export class ParsedCard {
  readonly pan: bigint
  readonly issuer: Issuer
  private readonly digits: string

  /** @internal */
  constructor(digits: string, pan: bigint, issuer: Issuer) {
    this.digits = digits
    this.pan = pan
    this.issuer = issuer
    Object.freeze(this)
  }

  get length(): number {
    return this.digits.length
  }

  issuerName(): string {
    return issuerName(this.issuer)
  }

  lastFour(): string {
    return this.digits.slice(-4)
  }

  masked(): string {
    return maskPan(this.digits)
  }

  equals(other: ParsedCard): boolean {
    return this.pan === other.pan && this.issuer === other.issuer
  }

  /** The digit string as validated. */
  toString(): string {
    return this.digits
  }

  /** Never includes the full PAN. */
  toJSON(): SerializedCard {
    return {
      issuer: this.issuer,
      issuerName: this.issuerName(),
      length: this.length,
      masked: this.masked(),
    }
  }
}
