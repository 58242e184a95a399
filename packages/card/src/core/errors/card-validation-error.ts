import {
  type SerializedValidationError,
  ValidationErrorCode,
  type ValidationErrorContext,
  type ValidationStage,
} from "../../ports/error"

const messages: Record<ValidationErrorCode, string> = {
  invalid_format: "Card number must be a non-empty string of ASCII digits fitting in 64 bits",
  unknown_type: "Card number does not match any known issuer",
  invalid_length: "Card number length is not valid for its issuer",
  invalid_luhn: "Card number fails the Luhn checksum",
}

const stages: Record<ValidationErrorCode, ValidationStage> = {
  invalid_format: "format",
  unknown_type: "classify",
  invalid_length: "length",
  invalid_luhn: "checksum",
}

export type CardValidationErrorOptions = Readonly<{
  /** Length of the rejected input */
  length: number
  /** Overrides the stage implied by the code (leading zero and short input fail in "format") */
  stage?: ValidationStage
  issuer?: string
}>

/**
 * A card number rejected by one stage of the validation pipeline.
 *
 * Always operational and never retryable: the same input fails the same way, and the
 * only recovery is correcting it. Carries no clock reading, so equal inputs produce
 * equal errors.
 */
export class CardValidationError<
  C extends ValidationErrorCode = ValidationErrorCode,
> extends Error {
  readonly code: C
  readonly context: ValidationErrorContext
  readonly isRetryable = false
  readonly isOperational = true

  constructor(code: C, options: CardValidationErrorOptions) {
    super(messages[code])

    this.name = this.constructor.name
    this.code = code
    this.context = Object.freeze({
      stage: options.stage ?? stages[code],
      length: options.length,
      ...(options.issuer !== undefined && { issuer: options.issuer }),
    })

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }

  toJSON(): SerializedValidationError {
    return serializeValidationError(this)
  }
}

export type SerializeOptions = Readonly<{
  /** Include stack traces in output. Default: false */
  includeStack?: boolean
}>

export function serializeValidationError(
  err: CardValidationError,
  options?: SerializeOptions,
): SerializedValidationError {
  const includeStack = options?.includeStack ?? false

  return {
    name: err.name,
    code: err.code,
    message: err.message,
    context: { ...err.context },
    isRetryable: err.isRetryable,
    isOperational: err.isOperational,
    ...(includeStack && err.stack && { stack: err.stack }),
  }
}

const codes: ReadonlySet<unknown> = new Set(Object.values(ValidationErrorCode))

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null
}

/**
 * Type guard for validation errors, including ones that crossed a realm or bundle
 * boundary and so fail `instanceof`.
 */
export function isCardValidationError(e: unknown): e is CardValidationError {
  if (e instanceof CardValidationError) return true
  if (!(e instanceof Error) || !isRecord(e)) return false

  return (
    codes.has(e.code) &&
    isRecord(e.context) &&
    e.isRetryable === false &&
    e.isOperational === true
  )
}
