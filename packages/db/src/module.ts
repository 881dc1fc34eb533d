import type {StructuredLogger} from '@conference-api/logging'

import type {DatabaseClient} from './client.js'
import {EventRepository} from './repositories/eventRepository.js'
import {LocationRepository} from './repositories/locationRepository.js'
import {OrganizationRepository} from './repositories/organizationRepository.js'
import {PersonRepository} from './repositories/personRepository.js'
import {RoomRepository} from './repositories/roomRepository.js'
import {TalkRepository} from './repositories/talkRepository.js'
import {TopicRepository} from './repositories/topicRepository.js'

export type DbRepositories = {
  locationRepository: LocationRepository
  roomRepository: RoomRepository
  organizationRepository: OrganizationRepository
  personRepository: PersonRepository
  topicRepository: TopicRepository
  eventRepository: EventRepository
  talkRepository: TalkRepository
}

export const createDbRepositories = ({db, logger}: {db: DatabaseClient; logger: StructuredLogger}): DbRepositories => {
  const dependencies = {db, logger}

  return {
    locationRepository: new LocationRepository(dependencies),
    roomRepository: new RoomRepository(dependencies),
    organizationRepository: new OrganizationRepository(dependencies),
    personRepository: new PersonRepository(dependencies),
    topicRepository: new TopicRepository(dependencies),
    eventRepository: new EventRepository(dependencies),
    talkRepository: new TalkRepository(dependencies)
  }
}
