import { Issuer, type IssuerInfo, type LengthRule } from "../ports/issuer"

const exact = (length: number): LengthRule => ({ kind: "exact", length })
const range = (min: number, max: number): LengthRule => ({ kind: "range", min, max })
const set = (...lengths: number[]): LengthRule => ({ kind: "set", lengths })

const issuers: Readonly<Record<Issuer, IssuerInfo>> = {
  AmericanExpress: { issuer: Issuer.AmericanExpress, name: "American Express", lengths: exact(15) },
  ChinaTUnion: { issuer: Issuer.ChinaTUnion, name: "China T-Union", lengths: exact(19) },
  UnionPay: { issuer: Issuer.UnionPay, name: "UnionPay", lengths: range(16, 19) },
  DinersClub: { issuer: Issuer.DinersClub, name: "Diners Club", lengths: range(14, 19) },
  Discover: { issuer: Issuer.Discover, name: "Discover", lengths: range(16, 19) },
  UkrCard: { issuer: Issuer.UkrCard, name: "UkrCard", lengths: range(16, 19) },
  RuPay: { issuer: Issuer.RuPay, name: "RuPay", lengths: exact(16) },
  InterPayment: { issuer: Issuer.InterPayment, name: "InterPayment", lengths: range(16, 19) },
  InstaPayment: { issuer: Issuer.InstaPayment, name: "InstaPayment", lengths: exact(16) },
  Jcb: { issuer: Issuer.Jcb, name: "JCB", lengths: range(16, 19) },
  MaestroUk: { issuer: Issuer.MaestroUk, name: "Maestro UK", lengths: range(12, 19) },
  Maestro: { issuer: Issuer.Maestro, name: "Maestro", lengths: range(12, 19) },
  Dankort: { issuer: Issuer.Dankort, name: "Dankort", lengths: exact(16) },
  Mir: { issuer: Issuer.Mir, name: "MIR", lengths: range(16, 19) },
  Borica: { issuer: Issuer.Borica, name: "Borica", lengths: exact(16) },
  Mastercard: { issuer: Issuer.Mastercard, name: "Mastercard", lengths: exact(16) },
  Troy: { issuer: Issuer.Troy, name: "Troy", lengths: exact(16) },
  Visa: { issuer: Issuer.Visa, name: "Visa", lengths: set(13, 16, 19) },
  VisaElectron: { issuer: Issuer.VisaElectron, name: "Visa Electron", lengths: exact(16) },
  Uatp: { issuer: Issuer.Uatp, name: "UATP", lengths: exact(15) },
  Verve: { issuer: Issuer.Verve, name: "Verve", lengths: set(16, 18, 19) },
  LankaPay: { issuer: Issuer.LankaPay, name: "LankaPay", lengths: exact(16) },
  Gpn: { issuer: Issuer.Gpn, name: "GPN", lengths: set(16, 18, 19) },
}

const issuerIds: ReadonlySet<string> = new Set(Object.values(Issuer))

export function isIssuer(value: unknown): value is Issuer {
  return typeof value === "string" && issuerIds.has(value)
}

export function issuerInfo(issuer: Issuer): IssuerInfo {
  return issuers[issuer]
}

export function issuerName(issuer: Issuer): string {
  return issuers[issuer].name
}

export function isLengthValid(issuer: Issuer, length: number): boolean {
  const rule = issuers[issuer].lengths

  switch (rule.kind) {
    case "exact":
      return length === rule.length
    case "range":
      return length >= rule.min && length <= rule.max
    case "set":
      return rule.lengths.includes(length)
  }
}

/** Every accepted length for `issuer`, ascending. */
export function allowedLengths(issuer: Issuer): number[] {
  const rule = issuers[issuer].lengths

  switch (rule.kind) {
    case "exact":
      return [rule.length]
    case "range":
      return Array.from({ length: rule.max - rule.min + 1 }, (_, i) => rule.min + i)
    case "set":
      return [...rule.lengths].sort((a, b) => a - b)
  }
}
