/**
 * Card networks recognised by the classifier.
 *
 * The set is not exhaustive and may grow, so callers matching on it should keep a
 * default branch.
 */
export const Issuer = {
  AmericanExpress: "AmericanExpress",
  ChinaTUnion: "ChinaTUnion",
  UnionPay: "UnionPay",
  DinersClub: "DinersClub",
  Discover: "Discover",
  UkrCard: "UkrCard",
  RuPay: "RuPay",
  InterPayment: "InterPayment",
  InstaPayment: "InstaPayment",
  Jcb: "Jcb",
  MaestroUk: "MaestroUk",
  Maestro: "Maestro",
  Dankort: "Dankort",
  Mir: "Mir",
  Borica: "Borica",
  Mastercard: "Mastercard",
  Troy: "Troy",
  Visa: "Visa",
  VisaElectron: "VisaElectron",
  Uatp: "Uatp",
  Verve: "Verve",
  LankaPay: "LankaPay",
  Gpn: "Gpn",
} as const

export type Issuer = (typeof Issuer)[keyof typeof Issuer]

/**
 * Accepted total digit counts for an issuer.
 *
 * - `exact`: a single length (American Express is always 15)
 * - `range`: a closed interval (UnionPay is 16 to 19)
 * - `set`: a short list of discrete lengths (Visa is 13, 16 or 19)
 */
export type LengthRule =
  | { kind: "exact"; length: number }
  | { kind: "range"; min: number; max: number }
  | { kind: "set"; lengths: readonly number[] }

export type IssuerInfo = Readonly<{
  issuer: Issuer
  /** Display name, e.g. "American Express" */
  name: string
  lengths: LengthRule
}>
