import type {FieldViolation} from '@conference-api/schemas'

export type ErrorStatus = 400 | 401 | 404 | 409 | 415 | 422 | 500

export class AppError extends Error {
  public readonly code: string
  public readonly status: ErrorStatus
  public readonly violations?: FieldViolation[]

  public constructor({
    code,
    message,
    status,
    violations
  }: {
    code: string
    message: string
    status: ErrorStatus
    violations?: FieldViolation[]
  }) {
    super(message)
    this.name = 'AppError'
    this.code = code
    this.status = status
    if (violations) {
      this.violations = violations
    }
  }
}

export const badRequest = (code: string, message: string) =>
  new AppError({code, message, status: 400})

export const unauthorized = (code: string, message: string) =>
  new AppError({code, message, status: 401})

export const notFound = (code: string, message: string) =>
  new AppError({code, message, status: 404})

export const conflict = (code: string, message: string) =>
  new AppError({code, message, status: 409})

export const unsupportedMediaType = (code: string, message: string) =>
  new AppError({code, message, status: 415})

export const unprocessable = (code: string, message: string, violations: FieldViolation[]) =>
  new AppError({code, message, status: 422, violations})

export const internal = (code: string, message: string) =>
  new AppError({code, message, status: 500})

export const isAppError = (value: unknown): value is AppError => value instanceof AppError
