import {Controller, Get, Inject, Req, Res} from '@nestjs/common'
import type {Request, Response} from 'express'

import {sendNoContent} from '../../http'
import {ConferenceApiControllerContext} from '../controllerContext'

@Controller()
export class HealthController {
  public constructor(@Inject(ConferenceApiControllerContext) private readonly context: ConferenceApiControllerContext) {}

  @Get()
  public async handle(@Req() request: Request, @Res() response: Response): Promise<void> {
    await this.context.handleRequest({
      request,
      response,
      route: '/',
      chain: 'open',
      handler: ({correlationId}) => {
        sendNoContent({response, correlationId})
      }
    })
  }
}
