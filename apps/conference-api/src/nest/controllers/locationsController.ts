import {Controller, Delete, Get, Inject, Post, Put, Req, Res} from '@nestjs/common'
import type {Request, Response} from 'express'

import {ConferenceApiControllerContext} from '../controllerContext'
import {createEntityRoutes, createRelatedListRoute, type EntityRoutes} from '../entityRoutes'

@Controller('locations')
export class LocationsController {
  private readonly routes: EntityRoutes
  private readonly listRoomsRoute: (request: Request, response: Response) => Promise<void>
  private readonly listEventsRoute: (request: Request, response: Response) => Promise<void>

  public constructor(@Inject(ConferenceApiControllerContext) context: ConferenceApiControllerContext) {
    this.routes = createEntityRoutes({context, resource: 'locations', store: context.repositories.locationRepository})
    this.listRoomsRoute = createRelatedListRoute({
      context,
      route: '/locations/:id/rooms',
      store: context.repositories.roomRepository,
      relation: 'location'
    })
    this.listEventsRoute = createRelatedListRoute({
      context,
      route: '/locations/:id/events',
      store: context.repositories.eventRepository,
      relation: 'location'
    })
  }

  @Get()
  public async list(@Req() request: Request, @Res() response: Response): Promise<void> {
    await this.routes.list(request, response)
  }

  @Post()
  public async create(@Req() request: Request, @Res() response: Response): Promise<void> {
    await this.routes.create(request, response)
  }

  @Get(':id')
  public async getById(@Req() request: Request, @Res() response: Response): Promise<void> {
    await this.routes.getById(request, response)
  }

  @Put(':id')
  public async update(@Req() request: Request, @Res() response: Response): Promise<void> {
    await this.routes.update(request, response)
  }

  @Delete(':id')
  public async remove(@Req() request: Request, @Res() response: Response): Promise<void> {
    await this.routes.remove(request, response)
  }

  @Get(':id/rooms')
  public async listRooms(@Req() request: Request, @Res() response: Response): Promise<void> {
    await this.listRoomsRoute(request, response)
  }

  @Get(':id/events')
  public async listEvents(@Req() request: Request, @Res() response: Response): Promise<void> {
    await this.listEventsRoute(request, response)
  }
}
