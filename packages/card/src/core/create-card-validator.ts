import type { CardValidator, ValidationResult } from "../ports/card-validator"
import type { Logger } from "../ports/logger"
import { validate } from "./validate"

export type CreateCardValidatorOptions = {
  /** Receives one entry per validation. Nothing is logged without one. */
  logger?: Logger
}

/**
 * A {@link CardValidator} that reports each outcome to a logger.
 *
 * Rejections log at `debug` with the error code and stage, acceptances at `trace`
 * with the masked number. The full PAN is never logged.
 */
export function createCardValidator(options: CreateCardValidatorOptions = {}): CardValidator {
  const logger = options.logger?.child({ module: "card-validator" })

  const run = (input: string): ValidationResult => {
    const result = validate(input)

    if (result.ok) {
      const { card } = result
      logger?.trace("card accepted", {
        issuer: card.issuer,
        length: card.length,
        card: card.masked(),
      })
    } else {
      const { code, context } = result.error
      logger?.debug("card rejected", { code, ...context })
    }

    return result
  }

  return {
    validate: run,

    parse(input: string) {
      const result = run(input)
      if (!result.ok) throw result.error

      return result.card
    },

    isValid(input: string) {
      return run(input).ok
    },
  }
}
