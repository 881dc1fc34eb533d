export {EventRepository} from './eventRepository.js'
export {LocationRepository} from './locationRepository.js'
export {OrganizationRepository} from './organizationRepository.js'
export {PersonRepository} from './personRepository.js'
export {RoomRepository} from './roomRepository.js'
export {TalkRepository} from './talkRepository.js'
export {TopicRepository} from './topicRepository.js'
export type {StoreDependencies} from './shared.js'
