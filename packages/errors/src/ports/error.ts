export type ErrorContext = Readonly<Record<string, unknown>>

/**
 * An error a caller can branch on by `code` and inspect through `context`
 * without parsing the message.
 */
export interface AppError<C extends string = string, X extends ErrorContext = ErrorContext>
  extends Error {
  readonly code: C
  readonly context: Readonly<X>
}
