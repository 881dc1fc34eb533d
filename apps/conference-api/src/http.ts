import {randomUUID} from 'node:crypto'
import type {IncomingMessage, ServerResponse} from 'node:http'

import type {FieldViolation} from '@conference-api/schemas'
import {z} from 'zod'

import {badRequest, unsupportedMediaType} from './errors'

// helmet sets the remaining security headers for every response.
const RESPONSE_HEADERS = {
  'cache-control': 'no-store'
} as const

const JSON_MEDIA_TYPE = 'application/json'
const ENTITY_ID_PATTERN = /^[0-9]+$/u
const CorrelationIdSchema = z.string().trim().min(1).max(128)

export const isJsonContentType = (contentTypeHeader: string | undefined) => {
  const [mediaType = ''] = (contentTypeHeader ?? '').split(';', 1)
  return mediaType.trim().toLowerCase() === JSON_MEDIA_TYPE
}

export const requireJsonContentType = (request: IncomingMessage) => {
  if (!isJsonContentType(request.headers['content-type'])) {
    throw unsupportedMediaType('content_type_invalid', 'Content-Type must be application/json')
  }
}

/** The caller's `x-correlation-id` when it is usable, a fresh UUID otherwise. */
export const extractCorrelationId = (request: IncomingMessage) => {
  const header = request.headers['x-correlation-id']
  const parsed = CorrelationIdSchema.safeParse(Array.isArray(header) ? header[0] : header)
  return parsed.success ? parsed.data : randomUUID()
}

const bodyTooLarge = (maxBodyBytes: number) =>
  badRequest('request_body_too_large', `Request body exceeds ${maxBodyBytes} bytes`)

const collectBody = async (request: IncomingMessage, maxBodyBytes: number) => {
  if (Number(request.headers['content-length']) > maxBodyBytes) {
    throw bodyTooLarge(maxBodyBytes)
  }

  const chunks: Buffer[] = []
  let received = 0
  for await (const chunk of request) {
    const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk), 'utf8')
    received += buffer.byteLength
    if (received > maxBodyBytes) {
      throw bodyTooLarge(maxBodyBytes)
    }
    chunks.push(buffer)
  }

  return Buffer.concat(chunks, received)
}

/**
 * Reads the whole request body and decodes it as JSON. The decoded value is returned unvalidated;
 * field constraints are applied by the entity store.
 */
export const readJsonBody = async ({
  request,
  maxBodyBytes
}: {
  request: IncomingMessage
  maxBodyBytes: number
}): Promise<unknown> => {
  const body = await collectBody(request, maxBodyBytes)
  if (body.byteLength === 0) {
    throw badRequest('request_body_missing', 'Request body is required')
  }

  try {
    return JSON.parse(body.toString('utf8')) as unknown
  } catch {
    throw badRequest('request_body_invalid_json', 'Request body contains invalid JSON')
  }
}

export const parseEntityId = (value: string | undefined) => {
  const id = value !== undefined && ENTITY_ID_PATTERN.test(value) ? Number(value) : Number.NaN
  if (!Number.isSafeInteger(id) || id < 1) {
    throw badRequest('path_param_invalid', 'Identifier must be a positive integer')
  }

  return id
}

export const sendJson = ({
  response,
  status,
  correlationId,
  payload
}: {
  response: ServerResponse
  status: number
  correlationId: string
  payload: unknown
}) => {
  const body = Buffer.from(JSON.stringify(payload), 'utf8')

  response.writeHead(status, {
    ...RESPONSE_HEADERS,
    'content-type': `${JSON_MEDIA_TYPE}; charset=utf-8`,
    'content-length': String(body.byteLength),
    'x-correlation-id': correlationId
  })
  response.end(body)
}

export const sendError = ({
  response,
  status,
  error,
  message,
  correlationId,
  violations
}: {
  response: ServerResponse
  status: number
  error: string
  message: string
  correlationId: string
  violations?: FieldViolation[]
}) => {
  const payload = violations
    ? {error, message, correlation_id: correlationId, violations}
    : {error, message, correlation_id: correlationId}

  sendJson({response, status, correlationId, payload})
}

export const sendNoContent = ({response, correlationId}: {response: ServerResponse; correlationId: string}) => {
  response.writeHead(204, {
    ...RESPONSE_HEADERS,
    'x-correlation-id': correlationId
  })
  response.end()
}
