import type {z} from 'zod'

export type FieldViolation = {
  field: string
  message: string
}

export type ValidationResult<T> = {ok: true; value: T} | {ok: false; violations: FieldViolation[]}

const BODY_FIELD = 'body'

const toFieldPath = (path: readonly PropertyKey[]) => (path.length > 0 ? path.map(String).join('.') : BODY_FIELD)

/**
 * Applies the declared field constraints of `schema` to `input` and reports every violated
 * constraint at once, keyed by its dotted field path (`talkDates.0.roomId`). A payload that is
 * not an object at all is reported against `body`.
 */
export const validateEntity = <TSchema extends z.ZodType>(
  schema: TSchema,
  input: unknown
): ValidationResult<z.output<TSchema>> => {
  const parsed = schema.safeParse(input)
  if (parsed.success) {
    return {ok: true, value: parsed.data}
  }

  return {
    ok: false,
    violations: parsed.error.issues.map(issue => ({
      field: toFieldPath(issue.path),
      message: issue.message
    }))
  }
}
