import {describe, expect, it} from 'vitest'

import {AppError} from '../errors'
import {isJsonContentType, parseEntityId} from '../http'
import {hasMalformedPercentEncoding} from '../nest/requestGuards'

const captureError = (operation: () => unknown) => {
  try {
    operation()
  } catch (error) {
    return error
  }
  throw new Error('expected operation to throw')
}

describe('isJsonContentType', () => {
  it('accepts application/json with or without parameters', () => {
    expect(isJsonContentType('application/json')).toBe(true)
    expect(isJsonContentType('application/json; charset=utf-8')).toBe(true)
    expect(isJsonContentType('Application/JSON')).toBe(true)
  })

  it('rejects other media types', () => {
    expect(isJsonContentType(undefined)).toBe(false)
    expect(isJsonContentType('')).toBe(false)
    expect(isJsonContentType('text/plain')).toBe(false)
    expect(isJsonContentType('application/json-patch+json')).toBe(false)
    expect(isJsonContentType('application/problem+json')).toBe(false)
  })
})

describe('parseEntityId', () => {
  it('parses positive decimal identifiers', () => {
    expect(parseEntityId('1')).toBe(1)
    expect(parseEntityId('0042')).toBe(42)
    expect(parseEntityId('9007199254740991')).toBe(9007199254740991)
  })

  it.each(['0', '-1', 'abc', '1.5', '', ' 1', '9007199254740992'])('rejects %j', value => {
    const error = captureError(() => parseEntityId(value))
    expect(error).toBeInstanceOf(AppError)
    if (error instanceof AppError) {
      expect(error.status).toBe(400)
      expect(error.code).toBe('path_param_invalid')
    }
  })

  it('rejects a missing identifier', () => {
    expect(() => parseEntityId(undefined)).toThrow('Identifier must be a positive integer')
  })
})

describe('hasMalformedPercentEncoding', () => {
  it('flags percent signs not followed by two hex digits', () => {
    expect(hasMalformedPercentEncoding('/locations/%E0%A4%A')).toBe(true)
    expect(hasMalformedPercentEncoding('/locations/%zz')).toBe(true)
    expect(hasMalformedPercentEncoding('/locations/%20')).toBe(false)
    expect(hasMalformedPercentEncoding('/locations/1')).toBe(false)
  })
})
