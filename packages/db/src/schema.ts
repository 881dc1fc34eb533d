import {relations} from 'drizzle-orm'
import {type AnySQLiteColumn, integer, primaryKey, real, sqliteTable, text} from 'drizzle-orm/sqlite-core'

export const TALK_LEVELS = ['beginner', 'advanced', 'expert'] as const

export const locations = sqliteTable('locations', {
  id: integer('id').primaryKey({autoIncrement: true}),
  name: text('name').notNull(),
  lat: real('lat').notNull(),
  lon: real('lon').notNull()
})

export const rooms = sqliteTable('rooms', {
  id: integer('id').primaryKey({autoIncrement: true}),
  name: text('name').notNull(),
  capacity: integer('capacity'),
  locationId: integer('location_id')
    .notNull()
    .references(() => locations.id, {onDelete: 'restrict'})
})

export const organizations = sqliteTable('organizations', {
  id: integer('id').primaryKey({autoIncrement: true}),
  name: text('name').notNull(),
  address: text('address').notNull()
})

export const persons = sqliteTable('persons', {
  id: integer('id').primaryKey({autoIncrement: true}),
  name: text('name').notNull(),
  email: text('email').notNull(),
  biography: text('biography'),
  organizationId: integer('organization_id').references(() => organizations.id, {onDelete: 'set null'})
})

export const topics = sqliteTable('topics', {
  id: integer('id').primaryKey({autoIncrement: true}),
  name: text('name').notNull(),
  parentId: integer('parent_id').references((): AnySQLiteColumn => topics.id, {onDelete: 'set null'})
})

export const events = sqliteTable('events', {
  id: integer('id').primaryKey({autoIncrement: true}),
  name: text('name').notNull(),
  beginDate: text('begin_date').notNull(),
  endDate: text('end_date').notNull(),
  locationId: integer('location_id')
    .notNull()
    .references(() => locations.id, {onDelete: 'restrict'})
})

export const talks = sqliteTable('talks', {
  id: integer('id').primaryKey({autoIncrement: true}),
  title: text('title').notNull(),
  durationInMinutes: integer('duration_in_minutes').notNull(),
  language: text('language').notNull(),
  level: text('level', {enum: TALK_LEVELS}).notNull()
})

export const talkPersons = sqliteTable(
  'talk_persons',
  {
    talkId: integer('talk_id')
      .notNull()
      .references(() => talks.id, {onDelete: 'cascade'}),
    personId: integer('person_id')
      .notNull()
      .references(() => persons.id, {onDelete: 'cascade'})
  },
  table => ({
    pk: primaryKey({columns: [table.talkId, table.personId]})
  })
)

export const talkTopics = sqliteTable(
  'talk_topics',
  {
    talkId: integer('talk_id')
      .notNull()
      .references(() => talks.id, {onDelete: 'cascade'}),
    topicId: integer('topic_id')
      .notNull()
      .references(() => topics.id, {onDelete: 'cascade'})
  },
  table => ({
    pk: primaryKey({columns: [table.talkId, table.topicId]})
  })
)

export const talkDates = sqliteTable('talk_dates', {
  id: integer('id').primaryKey({autoIncrement: true}),
  talkId: integer('talk_id')
    .notNull()
    .references(() => talks.id, {onDelete: 'cascade'}),
  beginDate: text('begin_date').notNull(),
  endDate: text('end_date').notNull(),
  roomId: integer('room_id')
    .notNull()
    .references(() => rooms.id, {onDelete: 'cascade'}),
  eventId: integer('event_id')
    .notNull()
    .references(() => events.id, {onDelete: 'cascade'})
})

export const locationsRelations = relations(locations, ({many}) => ({
  rooms: many(rooms),
  events: many(events)
}))

export const roomsRelations = relations(rooms, ({one, many}) => ({
  location: one(locations, {fields: [rooms.locationId], references: [locations.id]}),
  talkDates: many(talkDates)
}))

export const organizationsRelations = relations(organizations, ({many}) => ({
  persons: many(persons)
}))

export const personsRelations = relations(persons, ({one, many}) => ({
  organization: one(organizations, {fields: [persons.organizationId], references: [organizations.id]}),
  talks: many(talkPersons)
}))

export const topicsRelations = relations(topics, ({one, many}) => ({
  parent: one(topics, {fields: [topics.parentId], references: [topics.id], relationName: 'topic_hierarchy'}),
  children: many(topics, {relationName: 'topic_hierarchy'}),
  talks: many(talkTopics)
}))

export const eventsRelations = relations(events, ({one, many}) => ({
  location: one(locations, {fields: [events.locationId], references: [locations.id]}),
  talkDates: many(talkDates)
}))

export const talksRelations = relations(talks, ({many}) => ({
  persons: many(talkPersons),
  topics: many(talkTopics),
  talkDates: many(talkDates)
}))

export const talkPersonsRelations = relations(talkPersons, ({one}) => ({
  talk: one(talks, {fields: [talkPersons.talkId], references: [talks.id]}),
  person: one(persons, {fields: [talkPersons.personId], references: [persons.id]})
}))

export const talkTopicsRelations = relations(talkTopics, ({one}) => ({
  talk: one(talks, {fields: [talkTopics.talkId], references: [talks.id]}),
  topic: one(topics, {fields: [talkTopics.topicId], references: [topics.id]})
}))

export const talkDatesRelations = relations(talkDates, ({one}) => ({
  talk: one(talks, {fields: [talkDates.talkId], references: [talks.id]}),
  room: one(rooms, {fields: [talkDates.roomId], references: [rooms.id]}),
  event: one(events, {fields: [talkDates.eventId], references: [events.id]})
}))
