export { EnvSource, type EnvSourceOptions } from "./adapters/env/env-source"
export { createPinoLogger, PinoLogger, type PinoLoggerDeps } from "./adapters/pino/pino-logger"
export {
  type CardConfig,
  cardConfigSchema,
  createLogger,
  ENV_PREFIX,
  type LoadCardConfigOptions,
  loadCardConfig,
} from "./core/config/config"
export {
  type CreateCardValidatorOptions,
  createCardValidator,
} from "./core/create-card-validator"
export {
  CardValidationError,
  type CardValidationErrorOptions,
  isCardValidationError,
  type SerializeOptions,
  serializeValidationError,
} from "./core/errors/card-validation-error"
export { checkFormat, type FormatCheck, MAX_PAN, MIN_CARD_LENGTH } from "./core/format"
export {
  classifyIssuer,
  IIN_WIDTH,
  type IssuerRange,
  type IssuerRangeTable,
  type IssuerRangeTier,
  issuerRangeTiers,
  parseIssuerRangeTable,
  readIin,
} from "./core/issuer-ranges"
export { allowedLengths, isIssuer, isLengthValid, issuerInfo, issuerName } from "./core/issuers"
export { isLuhnValid, luhnCheckDigit, luhnChecksum, toDigits } from "./core/luhn"
export { maskPan, type ParsedCard, type SerializedCard } from "./core/parsed-card"
export { isValidCard, parseCard, validate } from "./core/validate"
export type { CardValidator, ValidationResult } from "./ports/card-validator"
export {
  type SerializedValidationError,
  ValidationErrorCode,
  type ValidationErrorContext,
  type ValidationStage,
} from "./ports/error"
export { Issuer, type IssuerInfo, type LengthRule } from "./ports/issuer"
export type { LogContext, LogContextPatch, LogMeta } from "./ports/log-context"
export { type LogLevelName, logLevelNames } from "./ports/log-level"
export type { Logger } from "./ports/logger"
export type { LoggerOptions } from "./ports/logger-options"
export type { ConfigSource } from "./ports/source"
