export { BaseError, type BaseErrorOptions } from "./core/base-error"
export type { AppError, ErrorContext } from "./ports/error"
