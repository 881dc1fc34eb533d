import {Controller, Delete, Get, Inject, Post, Put, Req, Res} from '@nestjs/common'
import type {Request, Response} from 'express'

import {ConferenceApiControllerContext} from '../controllerContext'
import {createEntityRoutes, createRelatedListRoute, type EntityRoutes} from '../entityRoutes'

@Controller('organizations')
export class OrganizationsController {
  private readonly routes: EntityRoutes
  private readonly listPersonsRoute: (request: Request, response: Response) => Promise<void>

  public constructor(@Inject(ConferenceApiControllerContext) context: ConferenceApiControllerContext) {
    this.routes = createEntityRoutes({context, resource: 'organizations', store: context.repositories.organizationRepository})
    this.listPersonsRoute = createRelatedListRoute({
      context,
      route: '/organizations/:id/persons',
      store: context.repositories.personRepository,
      relation: 'organization'
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

  @Get(':id/persons')
  public async listPersons(@Req() request: Request, @Res() response: Response): Promise<void> {
    await this.listPersonsRoute(request, response)
  }
}
