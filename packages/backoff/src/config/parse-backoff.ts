import { BaseError } from "@pacer/errors"
import { z } from "zod"
import { type Backoff, type BackoffOptions, createBackoff } from "../core/backoff"

const delaySchema = z.strictObject({ milliseconds: z.number() })

/**
 * The shape `Backoff#toJSON()` produces, with every field but `retries`
 * optional. Values are taken as given: no coercion from strings, booleans or
 * `null`. Ranges are checked by `createBackoff`, not here.
 */
export const backoffSettingsSchema = z.strictObject({
  retries: z.number(),
  min: delaySchema.optional(),
  max: delaySchema.optional(),
  factor: z.number().optional(),
  jitter: z.number().optional(),
})

export type BackoffSettingsJson = z.infer<typeof backoffSettingsSchema>

export type SettingsIssue = {
  path: string
  message: string
}

export class MalformedSettingsError extends BaseError<
  "settings_malformed",
  { issues: SettingsIssue[] }
> {
  constructor(error: z.ZodError) {
    super(`Malformed backoff settings:\n${z.prettifyError(error)}`, {
      code: "settings_malformed",
      context: {
        issues: error.issues.map((issue) => ({
          path: issue.path.map(String).join("."),
          message: issue.message,
        })),
      },
    })
  }
}

export type ParseBackoffOptions = Pick<BackoffOptions, "random" | "logger">

/**
 * Builds a `Backoff` from untrusted data, such as settings stored with
 * `JSON.stringify(backoff)`.
 *
 * @throws {MalformedSettingsError} when a field is missing, unknown or not a number
 * @throws {ConfigurationError} when the values break a range rule
 */
export function parseBackoff(value: unknown, options: ParseBackoffOptions = {}): Backoff {
  const result = backoffSettingsSchema.safeParse(value)

  if (!result.success) {
    throw new MalformedSettingsError(result.error)
  }

  const { retries, ...settings } = result.data

  return createBackoff(retries, { ...settings, ...options })
}
