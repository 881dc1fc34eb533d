import type {EntityStore, RelatedEntityStore} from '@conference-api/db'
import type {Request, Response} from 'express'

import {parseEntityId, readJsonBody, sendJson, sendNoContent} from '../http'
import type {ConferenceApiControllerContext} from './controllerContext'

type RouteHandler = (request: Request, response: Response) => Promise<void>

export type EntityRoutes = {
  list: RouteHandler
  getById: RouteHandler
  create: RouteHandler
  update: RouteHandler
  remove: RouteHandler
}

export const createEntityRoutes = <TEntity>({
  context,
  resource,
  store
}: {
  context: ConferenceApiControllerContext
  resource: string
  store: EntityStore<TEntity>
}): EntityRoutes => {
  const collectionRoute = `/${resource}`
  const itemRoute = `/${resource}/:id`

  return {
    list: (request, response) =>
      context.handleRequest({
        request,
        response,
        route: collectionRoute,
        chain: 'bearer',
        handler: async ({correlationId}) => {
          sendJson({response, status: 200, correlationId, payload: await store.list()})
        }
      }),

    getById: (request, response) =>
      context.handleRequest({
        request,
        response,
        route: itemRoute,
        chain: 'bearerWhenStrict',
        handler: async ({correlationId}) => {
          const id = parseEntityId(request.params.id)
          sendJson({response, status: 200, correlationId, payload: await store.getById(id)})
        }
      }),

    create: (request, response) =>
      context.handleRequest({
        request,
        response,
        route: collectionRoute,
        chain: 'jsonBearer',
        handler: async ({correlationId}) => {
          const body = await readJsonBody({request, maxBodyBytes: context.config.maxBodyBytes})
          sendJson({response, status: 201, correlationId, payload: await store.create(body)})
        }
      }),

    update: (request, response) =>
      context.handleRequest({
        request,
        response,
        route: itemRoute,
        chain: 'jsonBearer',
        handler: async ({correlationId}) => {
          const id = parseEntityId(request.params.id)
          const body = await readJsonBody({request, maxBodyBytes: context.config.maxBodyBytes})
          sendJson({response, status: 200, correlationId, payload: await store.update(id, body)})
        }
      }),

    remove: (request, response) =>
      context.handleRequest({
        request,
        response,
        route: itemRoute,
        chain: 'bearerWhenStrict',
        handler: async ({correlationId}) => {
          const id = parseEntityId(request.params.id)
          await store.delete(id)
          sendNoContent({response, correlationId})
        }
      })
  }
}

export const createRelatedListRoute =
  <TEntity, TRelation extends string>({
    context,
    route,
    store,
    relation
  }: {
    context: ConferenceApiControllerContext
    route: string
    store: RelatedEntityStore<TEntity, TRelation>
    relation: TRelation
  }): RouteHandler =>
  (request, response) =>
    context.handleRequest({
      request,
      response,
      route,
      chain: 'bearer',
      handler: async ({correlationId}) => {
        const id = parseEntityId(request.params.id)
        sendJson({response, status: 200, correlationId, payload: await store.listByRelated(relation, id)})
      }
    })
