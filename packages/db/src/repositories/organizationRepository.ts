import type {StructuredLogger} from '@conference-api/logging'
import {OrganizationInputSchema, type Organization} from '@conference-api/schemas'
import {asc, eq} from 'drizzle-orm'

import type {DatabaseClient} from '../client.js'
import type {EntityStore} from '../contracts.js'
import {notFound} from '../errors.js'
import {organizations} from '../schema.js'
import {parseEntityInput, runStoreOperation, toInsertedId, type StoreDependencies} from './shared.js'

const ENTITY = 'organization'

export class OrganizationRepository implements EntityStore<Organization> {
  private readonly db: DatabaseClient
  private readonly logger: StructuredLogger

  public constructor({db, logger}: StoreDependencies) {
    this.db = db
    this.logger = logger
  }

  public list(): Promise<Organization[]> {
    return runStoreOperation({logger: this.logger, entity: ENTITY, operation: 'list'}, async () =>
      this.db.query.organizations.findMany({orderBy: [asc(organizations.id)]})
    )
  }

  public getById(id: number): Promise<Organization> {
    return runStoreOperation({logger: this.logger, entity: ENTITY, operation: 'get', id}, () => this.load(id))
  }

  public create(input: unknown): Promise<Organization> {
    return runStoreOperation({logger: this.logger, entity: ENTITY, operation: 'create'}, async () => {
      const {name, address} = parseEntityInput(ENTITY, OrganizationInputSchema, input)
      const result = this.db.insert(organizations).values({name, address}).run()

      return this.load(toInsertedId(result))
    })
  }

  public update(id: number, input: unknown): Promise<Organization> {
    return runStoreOperation({logger: this.logger, entity: ENTITY, operation: 'update', id}, async () => {
      const {name, address} = parseEntityInput(ENTITY, OrganizationInputSchema, input)
      const result = this.db.update(organizations).set({name, address}).where(eq(organizations.id, id)).run()
      if (result.changes === 0) {
        throw notFound(ENTITY, id)
      }

      return this.load(id)
    })
  }

  // Members keep their record; their organization reference is cleared.
  public delete(id: number): Promise<void> {
    return runStoreOperation({logger: this.logger, entity: ENTITY, operation: 'delete', id}, async () => {
      const result = this.db.delete(organizations).where(eq(organizations.id, id)).run()
      if (result.changes === 0) {
        throw notFound(ENTITY, id)
      }
    })
  }

  private async load(id: number): Promise<Organization> {
    const record = await this.db.query.organizations.findFirst({where: eq(organizations.id, id)})
    if (!record) {
      throw notFound(ENTITY, id)
    }

    return record
  }
}
