import { z } from "zod"
import { Issuer } from "../ports/issuer"
import rawTable from "./data/issuer-ranges.json"

/** All IIN rules are at most this many digits wide. */
export const IIN_WIDTH = 8

const rangeSchema = z
  .object({
    from: z.number().int().nonnegative(),
    to: z.number().int().nonnegative(),
    issuer: z.enum(Issuer),
  })
  .refine((r) => r.from <= r.to, { message: "range start must not exceed its end" })

const tierSchema = z
  .object({
    width: z.number().int().min(1).max(IIN_WIDTH),
    ranges: z.array(rangeSchema).min(1),
  })
  .refine((t) => t.ranges.every((r) => r.to < 10 ** t.width), {
    message: "range bound is wider than its tier",
  })

const tableSchema = z
  .object({ tiers: z.array(tierSchema).min(1) })
  .refine((t) => isStrictlyDecreasing(t.tiers.map((tier) => tier.width)), {
    message: "tiers must be ordered by strictly decreasing width",
  })

export type IssuerRange = z.infer<typeof rangeSchema>
export type IssuerRangeTier = z.infer<typeof tierSchema>
export type IssuerRangeTable = z.infer<typeof tableSchema>

function isStrictlyDecreasing(values: number[]): boolean {
  return values.every((v, i) => i === 0 || (values[i - 1] ?? Number.POSITIVE_INFINITY) > v)
}

/**
 * Validate a raw range table.
 *
 * @throws Error listing every schema violation
 */
export function parseIssuerRangeTable(raw: unknown): IssuerRangeTable {
  const result = tableSchema.safeParse(raw)

  if (!result.success) {
    throw new Error(`Issuer range table validation failed:\n${z.prettifyError(result.error)}`)
  }

  return result.data
}

const table: IssuerRangeTable = parseIssuerRangeTable(rawTable)

/** Tiers in lookup order, widest prefix first. */
export const issuerRangeTiers: readonly IssuerRangeTier[] = table.tiers

/**
 * Reads the leading {@link IIN_WIDTH} digits as an integer.
 * `digits` must be a validated digit string at least that long.
 */
export function readIin(digits: string): number {
  return Number.parseInt(digits.slice(0, IIN_WIDTH), 10)
}

/**
 * Match an 8-digit IIN against the range table.
 *
 * Tiers are consulted widest first, and entries within a tier in table order, so a
 * narrow range always wins over a broader one that nests it.
 */
export function classifyIssuer(
  iin: number,
  tiers: readonly IssuerRangeTier[] = issuerRangeTiers,
): Issuer | undefined {
  for (const tier of tiers) {
    const prefix = Math.floor(iin / 10 ** (IIN_WIDTH - tier.width))

    for (const range of tier.ranges) {
      if (prefix >= range.from && prefix <= range.to) return range.issuer
    }
  }

  return undefined
}
