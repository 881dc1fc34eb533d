import type {StructuredLogger} from '@conference-api/logging'
import {EventInputSchema, type ConferenceEvent} from '@conference-api/schemas'
import {asc, eq} from 'drizzle-orm'

import type {DatabaseClient} from '../client.js'
import type {EventRelation, RelatedEntityStore} from '../contracts.js'
import {notFound} from '../errors.js'
import {events} from '../schema.js'
import {
  assertReferencesResolve,
  parseEntityInput,
  runStoreOperation,
  toInsertedId,
  type StoreDependencies
} from './shared.js'

const ENTITY = 'event'

export class EventRepository implements RelatedEntityStore<ConferenceEvent, EventRelation> {
  private readonly db: DatabaseClient
  private readonly logger: StructuredLogger

  public constructor({db, logger}: StoreDependencies) {
    this.db = db
    this.logger = logger
  }

  public list(): Promise<ConferenceEvent[]> {
    return runStoreOperation({logger: this.logger, entity: ENTITY, operation: 'list'}, async () =>
      this.db.query.events.findMany({with: {location: true}, orderBy: [asc(events.id)]})
    )
  }

  public listByRelated(relation: EventRelation, id: number): Promise<ConferenceEvent[]> {
    return runStoreOperation({logger: this.logger, entity: ENTITY, operation: `list_by_${relation}`, id}, async () =>
      this.db.query.events.findMany({
        where: eq(events.locationId, id),
        with: {location: true},
        orderBy: [asc(events.id)]
      })
    )
  }

  public getById(id: number): Promise<ConferenceEvent> {
    return runStoreOperation({logger: this.logger, entity: ENTITY, operation: 'get', id}, () => this.load(id))
  }

  public create(input: unknown): Promise<ConferenceEvent> {
    return runStoreOperation({logger: this.logger, entity: ENTITY, operation: 'create'}, async () => {
      const value = parseEntityInput(ENTITY, EventInputSchema, input)

      const createdId = this.db.transaction(tx => {
        assertReferencesResolve(ENTITY, tx, [{field: 'locationId', table: 'location', id: value.locationId}])

        return toInsertedId(
          tx
            .insert(events)
            .values({
              name: value.name,
              beginDate: value.beginDate,
              endDate: value.endDate,
              locationId: value.locationId
            })
            .run()
        )
      })

      return this.load(createdId)
    })
  }

  public update(id: number, input: unknown): Promise<ConferenceEvent> {
    return runStoreOperation({logger: this.logger, entity: ENTITY, operation: 'update', id}, async () => {
      const value = parseEntityInput(ENTITY, EventInputSchema, input)

      this.db.transaction(tx => {
        const existing = tx.select({id: events.id}).from(events).where(eq(events.id, id)).get()
        if (!existing) {
          throw notFound(ENTITY, id)
        }

        assertReferencesResolve(ENTITY, tx, [{field: 'locationId', table: 'location', id: value.locationId}])

        tx.update(events)
          .set({name: value.name, beginDate: value.beginDate, endDate: value.endDate, locationId: value.locationId})
          .where(eq(events.id, id))
          .run()
      })

      return this.load(id)
    })
  }

  public delete(id: number): Promise<void> {
    return runStoreOperation({logger: this.logger, entity: ENTITY, operation: 'delete', id}, async () => {
      const result = this.db.delete(events).where(eq(events.id, id)).run()
      if (result.changes === 0) {
        throw notFound(ENTITY, id)
      }
    })
  }

  private async load(id: number): Promise<ConferenceEvent> {
    const record = await this.db.query.events.findFirst({where: eq(events.id, id), with: {location: true}})
    if (!record) {
      throw notFound(ENTITY, id)
    }

    return record
  }
}
