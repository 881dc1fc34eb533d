import {describe, expect, it} from 'vitest'

import {
  EventInputSchema,
  LocationInputSchema,
  PersonInputSchema,
  TalkInputSchema,
  validateEntity
} from '../index.js'

const fieldsOf = (result: ReturnType<typeof validateEntity>) => (result.ok ? [] : result.violations.map(item => item.field))

describe('validateEntity', () => {
  it('returns a valid location unchanged', () => {
    expect(validateEntity(LocationInputSchema, {name: ' HQ ', lat: 1, lon: 2})).toEqual({
      ok: true,
      value: {name: ' HQ ', lat: 1, lon: 2}
    })
  })

  it('treats whitespace-only text as empty', () => {
    expect(validateEntity(LocationInputSchema, {name: '   ', lat: 1, lon: 2})).toEqual({
      ok: false,
      violations: [{field: 'name', message: 'must not be empty'}]
    })
  })

  it('reports every violated field instead of stopping at the first', () => {
    const result = validateEntity(LocationInputSchema, {name: '', lat: 91})

    expect(fieldsOf(result)).toEqual(['name', 'lat', 'lon'])
  })

  it('reports a non-object payload against the body', () => {
    expect(fieldsOf(validateEntity(LocationInputSchema, [1, 2]))).toEqual(['body'])
  })

  it('uses dotted paths for nested talk date violations', () => {
    const result = validateEntity(TalkInputSchema, {
      title: 'Typed APIs',
      durationInMinutes: 0,
      language: 'en',
      level: 'guru',
      talkDates: [{beginDate: '2026-05-01T10:00:00Z', endDate: '2026-05-01T11:00:00Z', roomId: 'one', eventId: 1}]
    })

    expect(fieldsOf(result)).toEqual(['durationInMinutes', 'level', 'talkDates.0.roomId'])
  })

  it('defaults talk relations to empty lists and removes duplicate ids', () => {
    const result = validateEntity(TalkInputSchema, {
      title: 'Typed APIs',
      durationInMinutes: 45,
      language: 'en',
      level: 'advanced',
      personIds: [3, 3, 1]
    })

    expect(result).toEqual({
      ok: true,
      value: {
        title: 'Typed APIs',
        durationInMinutes: 45,
        language: 'en',
        level: 'advanced',
        personIds: [3, 1],
        topicIds: [],
        talkDates: []
      }
    })
  })

  it('rejects events that end before they begin', () => {
    const result = validateEntity(EventInputSchema, {
      name: 'Spring Summit',
      beginDate: '2026-05-02T09:00:00Z',
      endDate: '2026-05-01T18:00:00Z',
      locationId: 1
    })

    expect(result).toEqual({
      ok: false,
      violations: [{field: 'endDate', message: 'must not be before beginDate'}]
    })
  })

  it('checks person e-mail format with a readable message', () => {
    const result = validateEntity(PersonInputSchema, {name: 'Ada', email: 'not-an-address'})

    expect(result).toEqual({
      ok: false,
      violations: [{field: 'email', message: 'must be a valid e-mail address'}]
    })
  })
})
