import type {StructuredLogger} from '@conference-api/logging'
import {afterEach, beforeEach, describe, expect, it, vi} from 'vitest'

import {openDatabase, type DatabaseHandle} from '../client.js'
import {DbRepositoryError, type DbErrorCode} from '../errors.js'
import {createDbRepositories, type DbRepositories} from '../module.js'

const createLoggerSpy = () => {
  const logger = {
    log: vi.fn(),
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
    isLevelEnabled: vi.fn(() => true)
  } satisfies StructuredLogger

  return logger
}

const captureError = async (promise: Promise<unknown>) => {
  const error = await promise.then(
    () => null,
    (caught: unknown) => caught
  )
  if (!(error instanceof DbRepositoryError)) {
    throw new Error('expected a DbRepositoryError')
  }

  return error
}

const expectDbError = async (promise: Promise<unknown>, code: DbErrorCode) => {
  const error = await captureError(promise)
  expect(error.code).toBe(code)
  return error
}

describe('entity stores', () => {
  let handle: DatabaseHandle
  let repositories: DbRepositories
  let logger: ReturnType<typeof createLoggerSpy>

  beforeEach(() => {
    logger = createLoggerSpy()
    handle = openDatabase({filename: ':memory:', logger})
    repositories = createDbRepositories({db: handle.db, logger})
  })

  afterEach(() => {
    handle.close()
  })

  const seedVenue = async () => {
    const location = await repositories.locationRepository.create({name: 'Congress Center', lat: 48.1, lon: 11.5})
    const room = await repositories.roomRepository.create({name: 'Hall A', capacity: 300, locationId: location.id})
    const event = await repositories.eventRepository.create({
      name: 'TypeConf',
      beginDate: '2026-05-01T08:00:00Z',
      endDate: '2026-05-02T18:00:00Z',
      locationId: location.id
    })

    return {location, room, event}
  }

  describe('locations', () => {
    it('returns a created location unchanged from getById', async () => {
      const created = await repositories.locationRepository.create({name: '  HQ ', lat: 1.0, lon: 2.0})

      expect(created).toEqual({id: 1, name: '  HQ ', lat: 1, lon: 2})
      expect(await repositories.locationRepository.getById(created.id)).toEqual(created)
      expect(await repositories.locationRepository.list()).toEqual([created])
    })

    it('reports not_found for absent ids on get, update and delete', async () => {
      await expectDbError(repositories.locationRepository.getById(999), 'not_found')
      await expectDbError(repositories.locationRepository.update(999, {name: 'HQ', lat: 0, lon: 0}), 'not_found')
      await expectDbError(repositories.locationRepository.delete(999), 'not_found')
    })

    it('reports not_found when deleting twice', async () => {
      const created = await repositories.locationRepository.create({name: 'HQ', lat: 0, lon: 0})

      await repositories.locationRepository.delete(created.id)

      await expectDbError(repositories.locationRepository.delete(created.id), 'not_found')
      await expectDbError(repositories.locationRepository.getById(created.id), 'not_found')
    })

    it('replaces every field on update', async () => {
      const created = await repositories.locationRepository.create({name: 'HQ', lat: 0, lon: 0})

      const updated = await repositories.locationRepository.update(created.id, {name: 'Annex', lat: -10.5, lon: 20})

      expect(updated).toEqual({id: created.id, name: 'Annex', lat: -10.5, lon: 20})
    })

    it('assigns distinct ids to concurrent creates', async () => {
      const created = await Promise.all(
        Array.from({length: 10}, (_, index) =>
          repositories.locationRepository.create({name: `Site ${index}`, lat: index, lon: index})
        )
      )

      expect(new Set(created.map(location => location.id)).size).toBe(10)
      expect(await repositories.locationRepository.list()).toHaveLength(10)
    })

    it('refuses to delete a location still used by rooms', async () => {
      const {location} = await seedVenue()

      await expectDbError(repositories.locationRepository.delete(location.id), 'conflict')
      expect(await repositories.locationRepository.getById(location.id)).toEqual(location)
    })
  })

  describe('validation', () => {
    it('reports every violated constraint and writes nothing', async () => {
      const error = await expectDbError(
        repositories.talkRepository.create({title: '', durationInMinutes: 0, language: 'en', level: 'expert'}),
        'validation_failed'
      )

      expect(error.violations.map(violation => violation.field)).toEqual(['title', 'durationInMinutes'])
      expect(await repositories.talkRepository.list()).toEqual([])
    })

    it('reports unresolved references on their field', async () => {
      const error = await expectDbError(
        repositories.roomRepository.create({name: 'Hall B', locationId: 42}),
        'validation_failed'
      )

      expect(error.violations).toEqual([{field: 'locationId', message: 'location 42 does not exist'}])
      expect(await repositories.roomRepository.list()).toEqual([])
    })

    it('rejects events that end before they begin', async () => {
      const location = await repositories.locationRepository.create({name: 'HQ', lat: 0, lon: 0})

      const error = await expectDbError(
        repositories.eventRepository.create({
          name: 'Backwards',
          beginDate: '2026-05-02T08:00:00Z',
          endDate: '2026-05-01T08:00:00Z',
          locationId: location.id
        }),
        'validation_failed'
      )

      expect(error.violations).toEqual([{field: 'endDate', message: 'must not be before beginDate'}])
    })

    it('does not write a talk when one of its talk dates references a missing room', async () => {
      const {event} = await seedVenue()

      const error = await expectDbError(
        repositories.talkRepository.create({
          title: 'Orphaned',
          durationInMinutes: 30,
          language: 'en',
          level: 'beginner',
          talkDates: [
            {beginDate: '2026-05-01T09:00:00Z', endDate: '2026-05-01T09:30:00Z', roomId: 77, eventId: event.id}
          ]
        }),
        'validation_failed'
      )

      expect(error.violations).toEqual([{field: 'talkDates.0.roomId', message: 'room 77 does not exist'}])
      expect(await repositories.talkRepository.list()).toEqual([])
    })
  })

  describe('rooms and events', () => {
    it('loads the location with each room and event', async () => {
      const {location, room, event} = await seedVenue()

      expect(room).toEqual({id: 1, name: 'Hall A', capacity: 300, locationId: location.id, location})
      expect(event).toEqual({
        id: 1,
        name: 'TypeConf',
        beginDate: '2026-05-01T08:00:00Z',
        endDate: '2026-05-02T18:00:00Z',
        locationId: location.id,
        location
      })
      expect(await repositories.roomRepository.listByRelated('location', location.id)).toEqual([room])
      expect(await repositories.eventRepository.listByRelated('location', location.id)).toEqual([event])
      expect(await repositories.roomRepository.listByRelated('location', 999)).toEqual([])
    })

    it('clears the capacity when an update omits it', async () => {
      const {location, room} = await seedVenue()

      const updated = await repositories.roomRepository.update(room.id, {name: 'Hall A', locationId: location.id})

      expect(updated.capacity).toBeNull()
    })
  })

  describe('persons and organizations', () => {
    it('sets the organization reference to null when the organization is deleted', async () => {
      const organization = await repositories.organizationRepository.create({
        name: 'Acme',
        address: '1 Main Street'
      })
      const person = await repositories.personRepository.create({
        name: 'Ada',
        email: 'ada@example.com',
        organizationId: organization.id
      })

      expect(person).toEqual({
        id: 1,
        name: 'Ada',
        email: 'ada@example.com',
        biography: null,
        organizationId: organization.id,
        organization
      })
      expect(await repositories.personRepository.listByRelated('organization', organization.id)).toEqual([person])

      await repositories.organizationRepository.delete(organization.id)

      expect(await repositories.personRepository.getById(person.id)).toEqual({
        ...person,
        organizationId: null,
        organization: null
      })
    })
  })

  describe('topics', () => {
    it('loads children and detaches them when the parent is deleted', async () => {
      const parent = await repositories.topicRepository.create({name: 'Languages'})
      const child = await repositories.topicRepository.create({name: 'TypeScript', parentId: parent.id})

      expect(await repositories.topicRepository.getById(parent.id)).toEqual({
        id: parent.id,
        name: 'Languages',
        parentId: null,
        children: [{id: child.id, name: 'TypeScript', parentId: parent.id}]
      })

      await repositories.topicRepository.delete(parent.id)

      expect(await repositories.topicRepository.getById(child.id)).toEqual({
        id: child.id,
        name: 'TypeScript',
        parentId: null,
        children: []
      })
    })

    it('rejects a parent that would create a cycle', async () => {
      const root = await repositories.topicRepository.create({name: 'Languages'})
      const child = await repositories.topicRepository.create({name: 'TypeScript', parentId: root.id})

      const selfReference = await expectDbError(
        repositories.topicRepository.update(root.id, {name: 'Languages', parentId: root.id}),
        'validation_failed'
      )
      expect(selfReference.violations).toEqual([
        {field: 'parentId', message: 'must not be the topic itself or one of its descendants'}
      ])

      await expectDbError(
        repositories.topicRepository.update(root.id, {name: 'Languages', parentId: child.id}),
        'validation_failed'
      )
    })
  })

  describe('talks', () => {
    const seedTalk = async () => {
      const venue = await seedVenue()
      const organization = await repositories.organizationRepository.create({name: 'Acme', address: '1 Main Street'})
      const person = await repositories.personRepository.create({
        name: 'Grace',
        email: 'grace@example.com',
        biography: 'Compilers',
        organizationId: organization.id
      })
      const parentTopic = await repositories.topicRepository.create({name: 'Languages'})
      const topic = await repositories.topicRepository.create({name: 'TypeScript', parentId: parentTopic.id})

      const talk = await repositories.talkRepository.create({
        title: 'Typed SQL',
        durationInMinutes: 45,
        language: 'en',
        level: 'advanced',
        personIds: [person.id, person.id],
        topicIds: [topic.id],
        talkDates: [
          {
            beginDate: '2026-05-01T09:00:00Z',
            endDate: '2026-05-01T09:45:00Z',
            roomId: venue.room.id,
            eventId: venue.event.id
          }
        ]
      })

      return {...venue, person, parentTopic, topic, talk}
    }

    it('creates a talk with its speakers, topics and schedule', async () => {
      const {room, event, person, topic, talk} = await seedTalk()

      expect(talk.persons).toEqual([person])
      expect(talk.topics).toEqual([topic])
      expect(talk.talkDates).toEqual([
        {
          id: 1,
          talkId: talk.id,
          beginDate: '2026-05-01T09:00:00Z',
          endDate: '2026-05-01T09:45:00Z',
          roomId: room.id,
          eventId: event.id,
          room: {id: room.id, name: 'Hall A', capacity: 300, locationId: room.locationId},
          event: {
            id: event.id,
            name: 'TypeConf',
            beginDate: '2026-05-01T08:00:00Z',
            endDate: '2026-05-02T18:00:00Z',
            locationId: event.locationId
          }
        }
      ])
      expect(await repositories.talkRepository.getById(talk.id)).toEqual(talk)
    })

    it('lists talks by event, person and topic', async () => {
      const {event, person, parentTopic, topic, talk} = await seedTalk()

      expect(await repositories.talkRepository.listByRelated('event', event.id)).toEqual([talk])
      expect(await repositories.talkRepository.listByRelated('person', person.id)).toEqual([talk])
      expect(await repositories.talkRepository.listByRelated('topic', topic.id)).toEqual([talk])
      expect(await repositories.talkRepository.listByRelated('topic', parentTopic.id)).toEqual([])
      expect(await repositories.talkRepository.listByRelated('event', 999)).toEqual([])
    })

    it('replaces links and schedule on update', async () => {
      const {talk} = await seedTalk()

      const updated = await repositories.talkRepository.update(talk.id, {
        title: 'Typed SQL, revisited',
        durationInMinutes: 30,
        language: 'de',
        level: 'expert'
      })

      expect(updated).toEqual({
        id: talk.id,
        title: 'Typed SQL, revisited',
        durationInMinutes: 30,
        language: 'de',
        level: 'expert',
        persons: [],
        topics: [],
        talkDates: []
      })
    })

    it('leaves a talk untouched when an update fails validation', async () => {
      const {person, talk} = await seedTalk()
      const replacement = {
        title: 'Typed SQL, revisited',
        durationInMinutes: 30,
        language: 'de',
        level: 'expert',
        personIds: [person.id],
        topicIds: [],
        talkDates: []
      }

      const emptyTitle = await expectDbError(
        repositories.talkRepository.update(talk.id, {...replacement, title: ''}),
        'validation_failed'
      )
      expect(emptyTitle.violations).toEqual([{field: 'title', message: 'must not be empty'}])

      const unknownSpeaker = await expectDbError(
        repositories.talkRepository.update(talk.id, {...replacement, personIds: [person.id, 999]}),
        'validation_failed'
      )
      expect(unknownSpeaker.violations).toEqual([{field: 'personIds.1', message: 'person 999 does not exist'}])

      expect(await repositories.talkRepository.getById(talk.id)).toEqual(talk)
    })

    it('drops the speaker link when a person is deleted', async () => {
      const {person, talk} = await seedTalk()

      await repositories.personRepository.delete(person.id)

      expect((await repositories.talkRepository.getById(talk.id)).persons).toEqual([])
    })

    it('reports not_found when updating a missing talk', async () => {
      await expectDbError(
        repositories.talkRepository.update(404, {title: 'Ghost', durationInMinutes: 10, language: 'en', level: 'beginner'}),
        'not_found'
      )
    })
  })

  describe('storage failures', () => {
    it('classifies and logs failures of the storage engine', async () => {
      handle.close()

      await expectDbError(repositories.locationRepository.list(), 'unexpected_error')
      expect(logger.error).toHaveBeenCalledWith(
        expect.objectContaining({
          event: 'store.operation_failed',
          component: 'db.location',
          reason_code: 'unexpected_error'
        })
      )
    })
  })
})
