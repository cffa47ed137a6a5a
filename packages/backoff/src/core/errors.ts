import { BaseError } from "@pacer/errors"

export type BackoffField = "retries" | "min" | "max" | "factor" | "jitter"

export class ConfigurationError extends BaseError<
  "configuration_invalid",
  { field: BackoffField; value: unknown }
> {
  readonly field: BackoffField

  constructor(field: BackoffField, value: unknown, requirement: string) {
    super(`${field} ${requirement} (got ${String(value)})`, {
      code: "configuration_invalid",
      context: { field, value },
    })
    this.field = field
  }
}

export function isConfigurationError(err: unknown): err is ConfigurationError {
  return err instanceof ConfigurationError
}
