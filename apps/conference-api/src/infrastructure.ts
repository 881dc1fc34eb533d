import {createDbRepositories, openDatabase, type DatabaseHandle, type DbRepositories} from '@conference-api/db'
import type {StructuredLogger} from '@conference-api/logging'

import type {ServiceConfig} from './config'

export type ProcessInfrastructure = {
  database: DatabaseHandle
  repositories: DbRepositories
  close: () => Promise<void>
}

export const createProcessInfrastructure = ({
  config,
  logger
}: {
  config: ServiceConfig
  logger: StructuredLogger
}): ProcessInfrastructure => {
  switch (config.database.driver) {
    case 'sqlite': {
      const database = openDatabase({
        filename: config.database.file,
        logger,
        logQueries: config.database.logQueries
      })

      return {
        database,
        repositories: createDbRepositories({db: database.db, logger}),
        close: async () => {
          database.close()
        }
      }
    }
  }
}
