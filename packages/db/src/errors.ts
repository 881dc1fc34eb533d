import type {FieldViolation} from '@conference-api/schemas'

export type DbErrorCode = 'not_found' | 'validation_failed' | 'conflict' | 'unexpected_error'

export class DbRepositoryError extends Error {
  public readonly code: DbErrorCode
  public readonly violations: FieldViolation[]

  public constructor(
    code: DbErrorCode,
    message: string,
    options: {cause?: unknown; violations?: FieldViolation[]} = {}
  ) {
    super(message, options.cause === undefined ? undefined : {cause: options.cause})
    this.name = 'DbRepositoryError'
    this.code = code
    this.violations = options.violations ?? []
  }
}

type ErrorWithCode = {
  code?: unknown
  cause?: unknown
}

const isErrorWithCode = (value: unknown): value is ErrorWithCode =>
  typeof value === 'object' && value !== null && ('code' in value || 'cause' in value)

const readSqliteCode = (error: unknown): string | null => {
  if (!isErrorWithCode(error)) {
    return null
  }

  if (typeof error.code === 'string' && error.code.startsWith('SQLITE_')) {
    return error.code
  }

  return error.cause === error ? null : readSqliteCode(error.cause)
}

export const classifyDatabaseError = (error: unknown): DbRepositoryError => {
  if (error instanceof DbRepositoryError) {
    return error
  }

  switch (readSqliteCode(error)) {
    // ON DELETE RESTRICT is enforced as a trigger action and reported with the trigger code.
    case 'SQLITE_CONSTRAINT_TRIGGER':
    case 'SQLITE_CONSTRAINT_FOREIGNKEY':
      return new DbRepositoryError('conflict', 'Record is still referenced by other records', {cause: error})
    case 'SQLITE_CONSTRAINT_UNIQUE':
    case 'SQLITE_CONSTRAINT_PRIMARYKEY':
      return new DbRepositoryError('conflict', 'Unique constraint violated', {cause: error})
    default:
      return new DbRepositoryError('unexpected_error', 'Unexpected database error', {cause: error})
  }
}

export const notFound = (entity: string, id: number) =>
  new DbRepositoryError('not_found', `${entity} ${id} not found`)

export const validationFailed = (entity: string, violations: FieldViolation[]) =>
  new DbRepositoryError('validation_failed', `${entity} input is invalid`, {violations})
