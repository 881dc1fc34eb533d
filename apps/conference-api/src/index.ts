import 'reflect-metadata'

import {createStructuredLogger} from '@conference-api/logging'

import {createConferenceApiApp, SERVICE_NAME} from './app'
import {loadConfig} from './config'

const main = async () => {
  const config = loadConfig(process.env)
  const app = await createConferenceApiApp({config})

  await app.start()

  let stopping = false
  const shutdown = async (signal: string) => {
    if (stopping) {
      return
    }
    stopping = true

    app.logger.info({
      event: 'process.shutdown',
      component: 'process.entrypoint',
      message: 'Shutdown requested',
      metadata: {signal}
    })
    await app.stop()
    process.exit(0)
  }

  process.on('SIGINT', () => {
    void shutdown('SIGINT')
  })
  process.on('SIGTERM', () => {
    void shutdown('SIGTERM')
  })
}

void main().catch(error => {
  const env =
    process.env.NODE_ENV === 'production'
      ? 'production'
      : process.env.NODE_ENV === 'test'
        ? 'test'
        : 'development'
  const startupLogger = createStructuredLogger({
    service: SERVICE_NAME,
    env,
    level: 'error'
  })
  startupLogger.fatal({
    event: 'process.startup.failed',
    component: 'process.entrypoint',
    message: 'Conference API startup failed',
    reason_code: 'startup_failed',
    metadata: {
      error
    }
  })
  process.exit(1)
})
