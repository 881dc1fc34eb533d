import type {StructuredLogger} from '@conference-api/logging'
import {TopicInputSchema, type Topic} from '@conference-api/schemas'
import {asc, eq} from 'drizzle-orm'

import type {DatabaseClient, DatabaseExecutor} from '../client.js'
import type {EntityStore} from '../contracts.js'
import {notFound, validationFailed} from '../errors.js'
import {topics} from '../schema.js'
import {
  assertReferencesResolve,
  byId,
  parseEntityInput,
  runStoreOperation,
  toInsertedId,
  type StoreDependencies
} from './shared.js'

const ENTITY = 'topic'

// Walks up from `parentId`; reaching `id` means the new parent is the topic itself or one of its descendants.
const createsCycle = (executor: DatabaseExecutor, id: number, parentId: number) => {
  const visited = new Set<number>()
  let current: number | null = parentId

  while (current !== null && !visited.has(current)) {
    if (current === id) {
      return true
    }

    visited.add(current)
    const row: {parentId: number | null} | undefined = executor
      .select({parentId: topics.parentId})
      .from(topics)
      .where(eq(topics.id, current))
      .get()
    current = row?.parentId ?? null
  }

  return false
}

export class TopicRepository implements EntityStore<Topic> {
  private readonly db: DatabaseClient
  private readonly logger: StructuredLogger

  public constructor({db, logger}: StoreDependencies) {
    this.db = db
    this.logger = logger
  }

  public list(): Promise<Topic[]> {
    return runStoreOperation({logger: this.logger, entity: ENTITY, operation: 'list'}, async () => {
      const records = await this.db.query.topics.findMany({with: {children: true}, orderBy: [asc(topics.id)]})
      return records.map(record => ({...record, children: [...record.children].sort(byId)}))
    })
  }

  public getById(id: number): Promise<Topic> {
    return runStoreOperation({logger: this.logger, entity: ENTITY, operation: 'get', id}, () => this.load(id))
  }

  public create(input: unknown): Promise<Topic> {
    return runStoreOperation({logger: this.logger, entity: ENTITY, operation: 'create'}, async () => {
      const value = parseEntityInput(ENTITY, TopicInputSchema, input)

      const createdId = this.db.transaction(tx => {
        assertReferencesResolve(ENTITY, tx, [{field: 'parentId', table: 'topic', id: value.parentId}])

        return toInsertedId(tx.insert(topics).values({name: value.name, parentId: value.parentId ?? null}).run())
      })

      return this.load(createdId)
    })
  }

  public update(id: number, input: unknown): Promise<Topic> {
    return runStoreOperation({logger: this.logger, entity: ENTITY, operation: 'update', id}, async () => {
      const value = parseEntityInput(ENTITY, TopicInputSchema, input)
      const parentId = value.parentId ?? null

      this.db.transaction(tx => {
        const existing = tx.select({id: topics.id}).from(topics).where(eq(topics.id, id)).get()
        if (!existing) {
          throw notFound(ENTITY, id)
        }

        assertReferencesResolve(ENTITY, tx, [{field: 'parentId', table: 'topic', id: parentId}])

        if (parentId !== null && createsCycle(tx, id, parentId)) {
          throw validationFailed(ENTITY, [
            {field: 'parentId', message: 'must not be the topic itself or one of its descendants'}
          ])
        }

        tx.update(topics).set({name: value.name, parentId}).where(eq(topics.id, id)).run()
      })

      return this.load(id)
    })
  }

  // Child topics are kept and become roots.
  public delete(id: number): Promise<void> {
    return runStoreOperation({logger: this.logger, entity: ENTITY, operation: 'delete', id}, async () => {
      const result = this.db.delete(topics).where(eq(topics.id, id)).run()
      if (result.changes === 0) {
        throw notFound(ENTITY, id)
      }
    })
  }

  private async load(id: number): Promise<Topic> {
    const record = await this.db.query.topics.findFirst({where: eq(topics.id, id), with: {children: true}})
    if (!record) {
      throw notFound(ENTITY, id)
    }

    return {...record, children: [...record.children].sort(byId)}
  }
}
