/**
 * Persistence contract shared by every entity kind. Inputs are accepted as `unknown` and validated
 * by the store before anything is written; failures surface as `DbRepositoryError`.
 */
export type EntityStore<TEntity> = {
  list: () => Promise<TEntity[]>
  getById: (id: number) => Promise<TEntity>
  create: (input: unknown) => Promise<TEntity>
  update: (id: number, input: unknown) => Promise<TEntity>
  delete: (id: number) => Promise<void>
}

export type RelatedEntityStore<TEntity, TRelation extends string> = EntityStore<TEntity> & {
  listByRelated: (relation: TRelation, id: number) => Promise<TEntity[]>
}

export type RoomRelation = 'location'
export type EventRelation = 'location'
export type PersonRelation = 'organization'
export type TalkRelation = 'event' | 'person' | 'topic'
