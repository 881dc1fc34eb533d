import type {StructuredLogger} from '@conference-api/logging'
import {PersonInputSchema, type Person, type PersonInput} from '@conference-api/schemas'
import {asc, eq} from 'drizzle-orm'

import type {DatabaseClient} from '../client.js'
import type {PersonRelation, RelatedEntityStore} from '../contracts.js'
import {notFound} from '../errors.js'
import {persons} from '../schema.js'
import {
  assertReferencesResolve,
  parseEntityInput,
  runStoreOperation,
  toInsertedId,
  type StoreDependencies
} from './shared.js'

const ENTITY = 'person'

const toColumns = (value: PersonInput) => ({
  name: value.name,
  email: value.email,
  biography: value.biography ?? null,
  organizationId: value.organizationId ?? null
})

export class PersonRepository implements RelatedEntityStore<Person, PersonRelation> {
  private readonly db: DatabaseClient
  private readonly logger: StructuredLogger

  public constructor({db, logger}: StoreDependencies) {
    this.db = db
    this.logger = logger
  }

  public list(): Promise<Person[]> {
    return runStoreOperation({logger: this.logger, entity: ENTITY, operation: 'list'}, async () =>
      this.db.query.persons.findMany({with: {organization: true}, orderBy: [asc(persons.id)]})
    )
  }

  public listByRelated(relation: PersonRelation, id: number): Promise<Person[]> {
    return runStoreOperation({logger: this.logger, entity: ENTITY, operation: `list_by_${relation}`, id}, async () =>
      this.db.query.persons.findMany({
        where: eq(persons.organizationId, id),
        with: {organization: true},
        orderBy: [asc(persons.id)]
      })
    )
  }

  public getById(id: number): Promise<Person> {
    return runStoreOperation({logger: this.logger, entity: ENTITY, operation: 'get', id}, () => this.load(id))
  }

  public create(input: unknown): Promise<Person> {
    return runStoreOperation({logger: this.logger, entity: ENTITY, operation: 'create'}, async () => {
      const value = parseEntityInput(ENTITY, PersonInputSchema, input)

      const createdId = this.db.transaction(tx => {
        assertReferencesResolve(ENTITY, tx, [
          {field: 'organizationId', table: 'organization', id: value.organizationId}
        ])

        return toInsertedId(tx.insert(persons).values(toColumns(value)).run())
      })

      return this.load(createdId)
    })
  }

  public update(id: number, input: unknown): Promise<Person> {
    return runStoreOperation({logger: this.logger, entity: ENTITY, operation: 'update', id}, async () => {
      const value = parseEntityInput(ENTITY, PersonInputSchema, input)

      this.db.transaction(tx => {
        const existing = tx.select({id: persons.id}).from(persons).where(eq(persons.id, id)).get()
        if (!existing) {
          throw notFound(ENTITY, id)
        }

        assertReferencesResolve(ENTITY, tx, [
          {field: 'organizationId', table: 'organization', id: value.organizationId}
        ])

        tx.update(persons).set(toColumns(value)).where(eq(persons.id, id)).run()
      })

      return this.load(id)
    })
  }

  // Removes the person from every talk they were linked to.
  public delete(id: number): Promise<void> {
    return runStoreOperation({logger: this.logger, entity: ENTITY, operation: 'delete', id}, async () => {
      const result = this.db.delete(persons).where(eq(persons.id, id)).run()
      if (result.changes === 0) {
        throw notFound(ENTITY, id)
      }
    })
  }

  private async load(id: number): Promise<Person> {
    const record = await this.db.query.persons.findFirst({where: eq(persons.id, id), with: {organization: true}})
    if (!record) {
      throw notFound(ENTITY, id)
    }

    return record
  }
}
