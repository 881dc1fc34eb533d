import {Controller, Get, Inject, Req, Res} from '@nestjs/common'
import type {Request, Response} from 'express'

import {ConferenceApiControllerContext} from '../controllerContext'

@Controller()
export class MetricsController {
  public constructor(@Inject(ConferenceApiControllerContext) private readonly context: ConferenceApiControllerContext) {}

  @Get('metrics')
  public async handle(@Req() request: Request, @Res() response: Response): Promise<void> {
    await this.context.handleRequest({
      request,
      response,
      route: '/metrics',
      chain: 'open',
      handler: async ({correlationId}) => {
        const body = await this.context.metrics.render()
        response.writeHead(200, {
          'content-type': this.context.metrics.contentType,
          'cache-control': 'no-store',
          'x-correlation-id': correlationId
        })
        response.end(body)
      }
    })
  }
}
