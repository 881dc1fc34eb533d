import type {StructuredLogger} from '@conference-api/logging'
import {type FieldViolation, validateEntity} from '@conference-api/schemas'
import {inArray} from 'drizzle-orm'
import type {z} from 'zod'

import type {DatabaseClient, DatabaseExecutor} from '../client.js'
import {classifyDatabaseError, validationFailed} from '../errors.js'
import {events, locations, organizations, persons, rooms, topics} from '../schema.js'

export type StoreDependencies = {
  db: DatabaseClient
  logger: StructuredLogger
}

export const parseEntityInput = <TSchema extends z.ZodType>(
  entity: string,
  schema: TSchema,
  input: unknown
): z.output<TSchema> => {
  const result = validateEntity(schema, input)
  if (!result.ok) {
    throw validationFailed(entity, result.violations)
  }

  return result.value
}

/**
 * Runs one store operation, logging it at debug level and classifying whatever the storage engine
 * throws. Unexpected failures are logged with their cause before they propagate.
 */
export const runStoreOperation = async <T>(
  {logger, entity, operation, id}: {logger: StructuredLogger; entity: string; operation: string; id?: number},
  run: () => Promise<T>
): Promise<T> => {
  const component = `db.${entity}`
  logger.debug({
    event: 'store.operation',
    component,
    metadata: {operation, ...(id === undefined ? {} : {id})}
  })

  try {
    return await run()
  } catch (error) {
    const classified = classifyDatabaseError(error)
    if (classified.code === 'unexpected_error') {
      logger.error({
        event: 'store.operation_failed',
        component,
        reason_code: classified.code,
        metadata: {operation, ...(id === undefined ? {} : {id}), error}
      })
    }

    throw classified
  }
}

export type ReferencedTable = 'location' | 'organization' | 'person' | 'topic' | 'room' | 'event'

const loadExistingIds = (executor: DatabaseExecutor, table: ReferencedTable, ids: number[]) => {
  switch (table) {
    case 'location':
      return executor.select({id: locations.id}).from(locations).where(inArray(locations.id, ids)).all()
    case 'organization':
      return executor.select({id: organizations.id}).from(organizations).where(inArray(organizations.id, ids)).all()
    case 'person':
      return executor.select({id: persons.id}).from(persons).where(inArray(persons.id, ids)).all()
    case 'topic':
      return executor.select({id: topics.id}).from(topics).where(inArray(topics.id, ids)).all()
    case 'room':
      return executor.select({id: rooms.id}).from(rooms).where(inArray(rooms.id, ids)).all()
    case 'event':
      return executor.select({id: events.id}).from(events).where(inArray(events.id, ids)).all()
  }
}

export type ReferenceCheck = {
  field: string
  table: ReferencedTable
  id: number | null | undefined
}

/**
 * Reports every reference that does not resolve to an existing row as a violation on its field.
 * Absent optional references are skipped.
 */
export const findUnresolvedReferences = (executor: DatabaseExecutor, checks: ReferenceCheck[]) => {
  const violations: FieldViolation[] = []
  const byTable = new Map<ReferencedTable, Set<number>>()

  for (const check of checks) {
    if (check.id === null || check.id === undefined) {
      continue
    }

    const ids = byTable.get(check.table) ?? new Set<number>()
    ids.add(check.id)
    byTable.set(check.table, ids)
  }

  const existing = new Map<ReferencedTable, Set<number>>()
  for (const [table, ids] of byTable) {
    existing.set(table, new Set(loadExistingIds(executor, table, [...ids]).map(row => row.id)))
  }

  for (const check of checks) {
    if (check.id === null || check.id === undefined) {
      continue
    }

    if (!existing.get(check.table)?.has(check.id)) {
      violations.push({field: check.field, message: `${check.table} ${check.id} does not exist`})
    }
  }

  return violations
}

export const assertReferencesResolve = (entity: string, executor: DatabaseExecutor, checks: ReferenceCheck[]) => {
  const violations = findUnresolvedReferences(executor, checks)
  if (violations.length > 0) {
    throw validationFailed(entity, violations)
  }
}

export const toInsertedId = (result: {lastInsertRowid: number | bigint}) => Number(result.lastInsertRowid)

export const byId = <T extends {id: number}>(left: T, right: T) => left.id - right.id
