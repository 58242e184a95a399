/**
 * Validation failures, in the order the pipeline detects them.
 */
export const ValidationErrorCode = {
  InvalidFormat: "invalid_format",
  UnknownType: "unknown_type",
  InvalidLength: "invalid_length",
  InvalidLuhn: "invalid_luhn",
} as const

export type ValidationErrorCode =
  (typeof ValidationErrorCode)[keyof typeof ValidationErrorCode]

/** Pipeline stage that rejected the input. */
export type ValidationStage = "format" | "classify" | "length" | "checksum"

/**
 * Contextual metadata attached to validation errors.
 *
 * Never carries the card number itself.
 */
export type ValidationErrorContext = Readonly<{
  stage: ValidationStage
  /** Number of characters in the rejected input */
  length: number
  issuer?: string
}>

/**
 * Serialized error shape for logging and transport.
 *
 * Designed to be JSON.stringify-safe.
 */
export type SerializedValidationError = Readonly<{
  name: string
  code: ValidationErrorCode
  message: string
  context: ValidationErrorContext
  isRetryable: boolean
  isOperational: boolean
  stack?: string
}>
