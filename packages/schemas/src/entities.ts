import {z} from 'zod'

// Values are stored as sent; whitespace only counts as empty.
const requiredText = z.string().refine(value => value.trim().length > 0, 'must not be empty')
const optionalText = z.string().nullable().optional()
const entityId = z.number().int().positive()
const isoDateTime = z.string().datetime({offset: true})
const uniqueIds = z.array(entityId).transform(ids => [...new Set(ids)])

const endsAfterBeginning = (value: {beginDate: string; endDate: string}, context: z.RefinementCtx) => {
  if (Date.parse(value.endDate) < Date.parse(value.beginDate)) {
    context.addIssue({code: 'custom', message: 'must not be before beginDate', path: ['endDate']})
  }
}

export const LocationInputSchema = z.object({
  name: requiredText,
  lat: z.number().min(-90).max(90),
  lon: z.number().min(-180).max(180)
})
export type LocationInput = z.infer<typeof LocationInputSchema>

export const RoomInputSchema = z.object({
  name: requiredText,
  capacity: z.number().int().positive().nullable().optional(),
  locationId: entityId
})
export type RoomInput = z.infer<typeof RoomInputSchema>

export const OrganizationInputSchema = z.object({
  name: requiredText,
  address: requiredText
})
export type OrganizationInput = z.infer<typeof OrganizationInputSchema>

export const PersonInputSchema = z.object({
  name: requiredText,
  email: z.string().email('must be a valid e-mail address'),
  biography: optionalText,
  organizationId: entityId.nullable().optional()
})
export type PersonInput = z.infer<typeof PersonInputSchema>

export const TopicInputSchema = z.object({
  name: requiredText,
  parentId: entityId.nullable().optional()
})
export type TopicInput = z.infer<typeof TopicInputSchema>

export const EventInputSchema = z
  .object({
    name: requiredText,
    beginDate: isoDateTime,
    endDate: isoDateTime,
    locationId: entityId
  })
  .superRefine(endsAfterBeginning)
export type EventInput = z.infer<typeof EventInputSchema>

export const TalkLevelSchema = z.enum(['beginner', 'advanced', 'expert'])
export type TalkLevel = z.infer<typeof TalkLevelSchema>

export const TalkDateInputSchema = z
  .object({
    beginDate: isoDateTime,
    endDate: isoDateTime,
    roomId: entityId,
    eventId: entityId
  })
  .superRefine(endsAfterBeginning)
export type TalkDateInput = z.infer<typeof TalkDateInputSchema>

export const TalkInputSchema = z.object({
  title: requiredText,
  durationInMinutes: z.number().int().positive(),
  language: requiredText,
  level: TalkLevelSchema,
  personIds: uniqueIds.default([]),
  topicIds: uniqueIds.default([]),
  talkDates: z.array(TalkDateInputSchema).default([])
})
export type TalkInput = z.infer<typeof TalkInputSchema>

export type Location = {
  id: number
  name: string
  lat: number
  lon: number
}

export type RoomSummary = {
  id: number
  name: string
  capacity: number | null
  locationId: number
}

export type Room = RoomSummary & {
  location: Location
}

export type Organization = {
  id: number
  name: string
  address: string
}

export type Person = {
  id: number
  name: string
  email: string
  biography: string | null
  organizationId: number | null
  organization: Organization | null
}

export type TopicSummary = {
  id: number
  name: string
  parentId: number | null
}

export type Topic = TopicSummary & {
  children: TopicSummary[]
}

export type EventSummary = {
  id: number
  name: string
  beginDate: string
  endDate: string
  locationId: number
}

export type ConferenceEvent = EventSummary & {
  location: Location
}

export type TalkDate = {
  id: number
  talkId: number
  beginDate: string
  endDate: string
  roomId: number
  eventId: number
  room: RoomSummary
  event: EventSummary
}

export type Talk = {
  id: number
  title: string
  durationInMinutes: number
  language: string
  level: TalkLevel
  persons: Person[]
  topics: Topic[]
  talkDates: TalkDate[]
}
