import type {Server} from 'node:http'

import type {StructuredLogger} from '@conference-api/logging'

import type {ServiceConfig} from './config'

export const applyServerTimeouts = ({server, timeouts}: {server: Server; timeouts: ServiceConfig['timeouts']}) => {
  server.requestTimeout = timeouts.readMs
  server.headersTimeout = Math.min(server.headersTimeout, timeouts.readMs)
  server.keepAliveTimeout = timeouts.idleMs
  // Sockets without activity for this long are destroyed.
  server.setTimeout(timeouts.writeMs)
}

export const createServerRuntime = ({
  server,
  host,
  port,
  timeouts,
  logger
}: {
  server: Server
  host: string
  port: number
  timeouts: ServiceConfig['timeouts']
  logger: StructuredLogger
}) => {
  applyServerTimeouts({server, timeouts})

  const start = async () =>
    new Promise<void>((resolve, reject) => {
      server.once('error', reject)
      server.listen(port, host, () => {
        server.off('error', reject)
        resolve()
      })
    })

  /**
   * Stops accepting connections and waits for in-flight requests. Connections still open after the
   * grace period are destroyed.
   */
  const stop = async () =>
    new Promise<void>(resolve => {
      if (!server.listening) {
        resolve()
        return
      }

      const graceTimer = setTimeout(() => {
        logger.warn({
          event: 'server.shutdown.forced',
          component: 'http.runtime',
          message: 'Closing connections still open after the shutdown grace period',
          metadata: {grace_ms: timeouts.shutdownGraceMs}
        })
        server.closeAllConnections()
      }, timeouts.shutdownGraceMs)
      graceTimer.unref()

      server.close(() => {
        clearTimeout(graceTimer)
        resolve()
      })
      server.closeIdleConnections()
    })

  return {
    server,
    start,
    stop
  }
}
