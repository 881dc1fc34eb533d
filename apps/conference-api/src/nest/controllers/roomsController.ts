import {Controller, Delete, Get, Inject, Post, Put, Req, Res} from '@nestjs/common'
import type {Request, Response} from 'express'

import {ConferenceApiControllerContext} from '../controllerContext'
import {createEntityRoutes, type EntityRoutes} from '../entityRoutes'

@Controller('rooms')
export class RoomsController {
  private readonly routes: EntityRoutes

  public constructor(@Inject(ConferenceApiControllerContext) context: ConferenceApiControllerContext) {
    this.routes = createEntityRoutes({context, resource: 'rooms', store: context.repositories.roomRepository})
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
}
