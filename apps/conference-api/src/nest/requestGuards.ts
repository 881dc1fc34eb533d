import type {NextFunction, Request, Response} from 'express'

import {extractCorrelationId, sendError} from '../http'

const MALFORMED_PERCENT_ENCODING = /%(?![0-9A-Fa-f]{2})/u
const PARAM_DECODE_FAILURE = /decode param|uri malformed/iu

export const hasMalformedPercentEncoding = (path: string) => MALFORMED_PERCENT_ENCODING.test(path)

const rejectPath = (request: Request, response: Response) => {
  sendError({
    response,
    status: 400,
    error: 'path_param_invalid',
    message: 'Path parameter encoding is invalid',
    correlationId: extractCorrelationId(request)
  })
}

/** Runs before routing: a path Express could not decode never reaches a controller. */
export const pathEncodingGuard = (request: Request, response: Response, next: NextFunction) => {
  const path = (request.url ?? '/').split('?', 1)[0] ?? '/'
  if (hasMalformedPercentEncoding(path)) {
    rejectPath(request, response)
    return
  }

  next()
}

/** Error-handling middleware for failures Express raises outside a controller. */
export const expressErrorGuard = (error: unknown, request: Request, response: Response, next: NextFunction) => {
  if (response.headersSent) {
    next(error)
    return
  }

  if (error instanceof URIError || (error instanceof Error && PARAM_DECODE_FAILURE.test(error.message))) {
    rejectPath(request, response)
    return
  }

  next(error)
}
