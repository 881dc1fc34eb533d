import {DynamicModule, Module} from '@nestjs/common'
import type {DbRepositories} from '@conference-api/db'
import type {StructuredLogger} from '@conference-api/logging'

import type {RequestAuthenticator} from '../auth'
import type {ServiceConfig} from '../config'
import type {HttpMetrics} from '../metrics'
import {ConferenceApiControllerContext} from './controllerContext'
import {EventsController} from './controllers/eventsController'
import {FallbackController} from './controllers/fallbackController'
import {HealthController} from './controllers/healthController'
import {LocationsController} from './controllers/locationsController'
import {MetricsController} from './controllers/metricsController'
import {OrganizationsController} from './controllers/organizationsController'
import {PersonsController} from './controllers/personsController'
import {RoomsController} from './controllers/roomsController'
import {TalksController} from './controllers/talksController'
import {TopicsController} from './controllers/topicsController'
import {
  CONFERENCE_API_AUTHENTICATOR,
  CONFERENCE_API_CONFIG,
  CONFERENCE_API_LOGGER,
  CONFERENCE_API_METRICS,
  CONFERENCE_API_REPOSITORIES
} from './tokens'

export type ConferenceApiNestModuleOptions = {
  config: ServiceConfig
  repositories: DbRepositories
  authenticator: RequestAuthenticator
  logger: StructuredLogger
  metrics: HttpMetrics
}

// The fallback controller must stay last: its catch-all route answers whatever the others did not match.
@Module({
  controllers: [
    HealthController,
    MetricsController,
    LocationsController,
    RoomsController,
    OrganizationsController,
    PersonsController,
    TopicsController,
    EventsController,
    TalksController,
    FallbackController
  ]
})
export class ConferenceApiNestModule {
  public static register(options: ConferenceApiNestModuleOptions): DynamicModule {
    return {
      module: ConferenceApiNestModule,
      providers: [
        {
          provide: CONFERENCE_API_CONFIG,
          useValue: options.config
        },
        {
          provide: CONFERENCE_API_REPOSITORIES,
          useValue: options.repositories
        },
        {
          provide: CONFERENCE_API_AUTHENTICATOR,
          useValue: options.authenticator
        },
        {
          provide: CONFERENCE_API_LOGGER,
          useValue: options.logger
        },
        {
          provide: CONFERENCE_API_METRICS,
          useValue: options.metrics
        },
        ConferenceApiControllerContext
      ]
    }
  }
}
