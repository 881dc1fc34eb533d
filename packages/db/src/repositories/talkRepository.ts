import type {StructuredLogger} from '@conference-api/logging'
import {TalkInputSchema, type Talk, type TalkInput} from '@conference-api/schemas'
import {asc, eq, inArray, type SQL} from 'drizzle-orm'

import type {DatabaseClient, DatabaseExecutor} from '../client.js'
import type {RelatedEntityStore, TalkRelation} from '../contracts.js'
import {notFound} from '../errors.js'
import {talkDates, talkPersons, talks, talkTopics} from '../schema.js'
import {
  assertReferencesResolve,
  byId,
  parseEntityInput,
  runStoreOperation,
  toInsertedId,
  type ReferenceCheck,
  type StoreDependencies
} from './shared.js'

const ENTITY = 'talk'

const toReferenceChecks = (value: TalkInput): ReferenceCheck[] => [
  ...value.personIds.map((id, index): ReferenceCheck => ({field: `personIds.${index}`, table: 'person', id})),
  ...value.topicIds.map((id, index): ReferenceCheck => ({field: `topicIds.${index}`, table: 'topic', id})),
  ...value.talkDates.flatMap((talkDate, index): ReferenceCheck[] => [
    {field: `talkDates.${index}.roomId`, table: 'room', id: talkDate.roomId},
    {field: `talkDates.${index}.eventId`, table: 'event', id: talkDate.eventId}
  ])
]

const toColumns = (value: TalkInput) => ({
  title: value.title,
  durationInMinutes: value.durationInMinutes,
  language: value.language,
  level: value.level
})

// Links and schedule are owned by the talk and always written as a whole.
const writeAssociations = (executor: DatabaseExecutor, talkId: number, value: TalkInput) => {
  if (value.personIds.length > 0) {
    executor
      .insert(talkPersons)
      .values(value.personIds.map(personId => ({talkId, personId})))
      .run()
  }

  if (value.topicIds.length > 0) {
    executor
      .insert(talkTopics)
      .values(value.topicIds.map(topicId => ({talkId, topicId})))
      .run()
  }

  if (value.talkDates.length > 0) {
    executor
      .insert(talkDates)
      .values(
        value.talkDates.map(talkDate => ({
          talkId,
          beginDate: talkDate.beginDate,
          endDate: talkDate.endDate,
          roomId: talkDate.roomId,
          eventId: talkDate.eventId
        }))
      )
      .run()
  }
}

export class TalkRepository implements RelatedEntityStore<Talk, TalkRelation> {
  private readonly db: DatabaseClient
  private readonly logger: StructuredLogger

  public constructor({db, logger}: StoreDependencies) {
    this.db = db
    this.logger = logger
  }

  public list(): Promise<Talk[]> {
    return runStoreOperation({logger: this.logger, entity: ENTITY, operation: 'list'}, () => this.findTalks())
  }

  public listByRelated(relation: TalkRelation, id: number): Promise<Talk[]> {
    return runStoreOperation({logger: this.logger, entity: ENTITY, operation: `list_by_${relation}`, id}, async () => {
      const talkIds = this.findTalkIds(relation, id)
      if (talkIds.length === 0) {
        return []
      }

      return this.findTalks(inArray(talks.id, talkIds))
    })
  }

  public getById(id: number): Promise<Talk> {
    return runStoreOperation({logger: this.logger, entity: ENTITY, operation: 'get', id}, () => this.load(id))
  }

  public create(input: unknown): Promise<Talk> {
    return runStoreOperation({logger: this.logger, entity: ENTITY, operation: 'create'}, async () => {
      const value = parseEntityInput(ENTITY, TalkInputSchema, input)

      const createdId = this.db.transaction(tx => {
        assertReferencesResolve(ENTITY, tx, toReferenceChecks(value))

        const talkId = toInsertedId(tx.insert(talks).values(toColumns(value)).run())
        writeAssociations(tx, talkId, value)
        return talkId
      })

      return this.load(createdId)
    })
  }

  public update(id: number, input: unknown): Promise<Talk> {
    return runStoreOperation({logger: this.logger, entity: ENTITY, operation: 'update', id}, async () => {
      const value = parseEntityInput(ENTITY, TalkInputSchema, input)

      this.db.transaction(tx => {
        const existing = tx.select({id: talks.id}).from(talks).where(eq(talks.id, id)).get()
        if (!existing) {
          throw notFound(ENTITY, id)
        }

        assertReferencesResolve(ENTITY, tx, toReferenceChecks(value))

        tx.update(talks).set(toColumns(value)).where(eq(talks.id, id)).run()
        tx.delete(talkPersons).where(eq(talkPersons.talkId, id)).run()
        tx.delete(talkTopics).where(eq(talkTopics.talkId, id)).run()
        tx.delete(talkDates).where(eq(talkDates.talkId, id)).run()
        writeAssociations(tx, id, value)
      })

      return this.load(id)
    })
  }

  public delete(id: number): Promise<void> {
    return runStoreOperation({logger: this.logger, entity: ENTITY, operation: 'delete', id}, async () => {
      const result = this.db.delete(talks).where(eq(talks.id, id)).run()
      if (result.changes === 0) {
        throw notFound(ENTITY, id)
      }
    })
  }

  private findTalkIds(relation: TalkRelation, id: number): number[] {
    switch (relation) {
      case 'event':
        return this.db
          .selectDistinct({talkId: talkDates.talkId})
          .from(talkDates)
          .where(eq(talkDates.eventId, id))
          .all()
          .map(row => row.talkId)
      case 'person':
        return this.db
          .select({talkId: talkPersons.talkId})
          .from(talkPersons)
          .where(eq(talkPersons.personId, id))
          .all()
          .map(row => row.talkId)
      case 'topic':
        return this.db
          .select({talkId: talkTopics.talkId})
          .from(talkTopics)
          .where(eq(talkTopics.topicId, id))
          .all()
          .map(row => row.talkId)
    }
  }

  private async findTalks(where?: SQL): Promise<Talk[]> {
    const records = await this.db.query.talks.findMany({
      where,
      orderBy: [asc(talks.id)],
      with: {
        persons: {with: {person: {with: {organization: true}}}},
        topics: {with: {topic: {with: {children: true}}}},
        talkDates: {with: {room: true, event: true}}
      }
    })

    return records.map(record => ({
      id: record.id,
      title: record.title,
      durationInMinutes: record.durationInMinutes,
      language: record.language,
      level: record.level,
      persons: record.persons.map(link => link.person).sort(byId),
      topics: record.topics
        .map(link => ({...link.topic, children: [...link.topic.children].sort(byId)}))
        .sort(byId),
      talkDates: [...record.talkDates].sort(byId)
    }))
  }

  private async load(id: number): Promise<Talk> {
    const [record] = await this.findTalks(eq(talks.id, id))
    if (!record) {
      throw notFound(ENTITY, id)
    }

    return record
  }
}
