import {collectDefaultMetrics, Counter, Histogram, Registry} from 'prom-client'

export type HttpMetrics = {
  registry: Registry
  contentType: string
  observeRequest: (input: {method: string; route: string; statusCode: number; durationMs: number}) => void
  render: () => Promise<string>
}

/**
 * Process and HTTP metrics on a registry owned by one application instance, so several instances
 * (tests) never share counters.
 */
export const createHttpMetrics = ({collectProcessMetrics = true}: {collectProcessMetrics?: boolean} = {}): HttpMetrics => {
  const registry = new Registry()
  if (collectProcessMetrics) {
    collectDefaultMetrics({register: registry})
  }

  const requestsTotal = new Counter({
    name: 'http_requests_total',
    help: 'HTTP requests handled, by method, route and status code',
    labelNames: ['method', 'route', 'status_code'] as const,
    registers: [registry]
  })

  const requestDuration = new Histogram({
    name: 'http_request_duration_seconds',
    help: 'HTTP request handling time in seconds',
    labelNames: ['method', 'route'] as const,
    buckets: [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5],
    registers: [registry]
  })

  return {
    registry,
    contentType: registry.contentType,
    observeRequest: ({method, route, statusCode, durationMs}) => {
      requestsTotal.inc({method, route, status_code: String(statusCode)})
      requestDuration.observe({method, route}, durationMs / 1000)
    },
    render: () => registry.metrics()
  }
}
