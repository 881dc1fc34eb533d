import type {StructuredLogger} from '@conference-api/logging'
import {RoomInputSchema, type Room} from '@conference-api/schemas'
import {asc, eq} from 'drizzle-orm'

import type {DatabaseClient} from '../client.js'
import type {RelatedEntityStore, RoomRelation} from '../contracts.js'
import {notFound} from '../errors.js'
import {rooms} from '../schema.js'
import {
  assertReferencesResolve,
  parseEntityInput,
  runStoreOperation,
  toInsertedId,
  type StoreDependencies
} from './shared.js'

const ENTITY = 'room'

export class RoomRepository implements RelatedEntityStore<Room, RoomRelation> {
  private readonly db: DatabaseClient
  private readonly logger: StructuredLogger

  public constructor({db, logger}: StoreDependencies) {
    this.db = db
    this.logger = logger
  }

  public list(): Promise<Room[]> {
    return runStoreOperation({logger: this.logger, entity: ENTITY, operation: 'list'}, async () =>
      this.db.query.rooms.findMany({with: {location: true}, orderBy: [asc(rooms.id)]})
    )
  }

  public listByRelated(relation: RoomRelation, id: number): Promise<Room[]> {
    return runStoreOperation({logger: this.logger, entity: ENTITY, operation: `list_by_${relation}`, id}, async () =>
      this.db.query.rooms.findMany({
        where: eq(rooms.locationId, id),
        with: {location: true},
        orderBy: [asc(rooms.id)]
      })
    )
  }

  public getById(id: number): Promise<Room> {
    return runStoreOperation({logger: this.logger, entity: ENTITY, operation: 'get', id}, () => this.load(id))
  }

  public create(input: unknown): Promise<Room> {
    return runStoreOperation({logger: this.logger, entity: ENTITY, operation: 'create'}, async () => {
      const value = parseEntityInput(ENTITY, RoomInputSchema, input)

      const createdId = this.db.transaction(tx => {
        assertReferencesResolve(ENTITY, tx, [{field: 'locationId', table: 'location', id: value.locationId}])

        return toInsertedId(
          tx
            .insert(rooms)
            .values({name: value.name, capacity: value.capacity ?? null, locationId: value.locationId})
            .run()
        )
      })

      return this.load(createdId)
    })
  }

  public update(id: number, input: unknown): Promise<Room> {
    return runStoreOperation({logger: this.logger, entity: ENTITY, operation: 'update', id}, async () => {
      const value = parseEntityInput(ENTITY, RoomInputSchema, input)

      this.db.transaction(tx => {
        const existing = tx.select({id: rooms.id}).from(rooms).where(eq(rooms.id, id)).get()
        if (!existing) {
          throw notFound(ENTITY, id)
        }

        assertReferencesResolve(ENTITY, tx, [{field: 'locationId', table: 'location', id: value.locationId}])

        tx.update(rooms)
          .set({name: value.name, capacity: value.capacity ?? null, locationId: value.locationId})
          .where(eq(rooms.id, id))
          .run()
      })

      return this.load(id)
    })
  }

  public delete(id: number): Promise<void> {
    return runStoreOperation({logger: this.logger, entity: ENTITY, operation: 'delete', id}, async () => {
      const result = this.db.delete(rooms).where(eq(rooms.id, id)).run()
      if (result.changes === 0) {
        throw notFound(ENTITY, id)
      }
    })
  }

  private async load(id: number): Promise<Room> {
    const record = await this.db.query.rooms.findFirst({where: eq(rooms.id, id), with: {location: true}})
    if (!record) {
      throw notFound(ENTITY, id)
    }

    return record
  }
}
