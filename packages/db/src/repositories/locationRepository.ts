import type {StructuredLogger} from '@conference-api/logging'
import {LocationInputSchema, type Location} from '@conference-api/schemas'
import {asc, eq} from 'drizzle-orm'

import type {DatabaseClient} from '../client.js'
import type {EntityStore} from '../contracts.js'
import {notFound} from '../errors.js'
import {locations} from '../schema.js'
import {parseEntityInput, runStoreOperation, toInsertedId, type StoreDependencies} from './shared.js'

const ENTITY = 'location'

export class LocationRepository implements EntityStore<Location> {
  private readonly db: DatabaseClient
  private readonly logger: StructuredLogger

  public constructor({db, logger}: StoreDependencies) {
    this.db = db
    this.logger = logger
  }

  public list(): Promise<Location[]> {
    return runStoreOperation({logger: this.logger, entity: ENTITY, operation: 'list'}, async () =>
      this.db.query.locations.findMany({orderBy: [asc(locations.id)]})
    )
  }

  public getById(id: number): Promise<Location> {
    return runStoreOperation({logger: this.logger, entity: ENTITY, operation: 'get', id}, () => this.load(id))
  }

  public create(input: unknown): Promise<Location> {
    return runStoreOperation({logger: this.logger, entity: ENTITY, operation: 'create'}, async () => {
      const value = parseEntityInput(ENTITY, LocationInputSchema, input)
      const result = this.db
        .insert(locations)
        .values({name: value.name, lat: value.lat, lon: value.lon})
        .run()

      return this.load(toInsertedId(result))
    })
  }

  public update(id: number, input: unknown): Promise<Location> {
    return runStoreOperation({logger: this.logger, entity: ENTITY, operation: 'update', id}, async () => {
      const value = parseEntityInput(ENTITY, LocationInputSchema, input)
      const result = this.db
        .update(locations)
        .set({name: value.name, lat: value.lat, lon: value.lon})
        .where(eq(locations.id, id))
        .run()

      if (result.changes === 0) {
        throw notFound(ENTITY, id)
      }

      return this.load(id)
    })
  }

  public delete(id: number): Promise<void> {
    return runStoreOperation({logger: this.logger, entity: ENTITY, operation: 'delete', id}, async () => {
      const result = this.db.delete(locations).where(eq(locations.id, id)).run()
      if (result.changes === 0) {
        throw notFound(ENTITY, id)
      }
    })
  }

  private async load(id: number): Promise<Location> {
    const record = await this.db.query.locations.findFirst({where: eq(locations.id, id)})
    if (!record) {
      throw notFound(ENTITY, id)
    }

    return record
  }
}
