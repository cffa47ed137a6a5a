import type { AppError, ErrorContext } from "../ports/error"

export type BaseErrorOptions<C extends string, X extends ErrorContext> = Readonly<{
  code: C
  context: X
  cause?: unknown
}>

export class BaseError<C extends string = string, X extends ErrorContext = ErrorContext>
  extends Error
  implements AppError<C, X>
{
  readonly code: C
  readonly context: Readonly<X>

  constructor(message: string, options: BaseErrorOptions<C, X>) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause })

    this.name = new.target.name
    this.code = options.code
    this.context = Object.freeze({ ...options.context })
  }
}
