import { Injectable } from '@nestjs/common'
import { Counter, Gauge, Histogram, Registry } from 'prom-client'

import { MetricsStore } from './metrics-store'

type MetricType = 'application' | 'system'

// Prometheus metric names allow [a-zA-Z_:][a-zA-Z0-9_:]*
const toMetricName = (name: string): string => {
  const sanitized = name.replace(/[^a-zA-Z0-9_:]/g, '_')
  return /^[a-zA-Z_:]/.test(sanitized) ? sanitized : `_${sanitized}`
}

/**
 * Metrics Service
 *
 * Prometheus exposition of the service:
 * - HTTP request counter and latency histogram, fed by MetricsMiddleware
 * - every MetricsStore value as a gauge labelled `type="application"` or
 *   `type="system"`, refreshed on each scrape
 */
@Injectable()
export class MetricsService {
  readonly registry = new Registry()

  private readonly httpRequests = new Counter({
    name: 'http_requests_total',
    help: 'Total HTTP requests',
    labelNames: ['method', 'route', 'status'],
    registers: [this.registry],
  })

  private readonly httpDuration = new Histogram({
    name: 'http_request_duration_seconds',
    help: 'HTTP request duration in seconds',
    labelNames: ['method', 'route', 'status'],
    buckets: [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5],
    registers: [this.registry],
  })

  private readonly gauges = new Map<string, Gauge>()

  constructor(private readonly store: MetricsStore) {}

  observeRequest(method: string, route: string, status: number, seconds: number): void {
    const labels = { method, route, status: String(status) }
    this.httpRequests.inc(labels)
    this.httpDuration.observe(labels, seconds)
  }

  /**
   * Render the registry in the Prometheus text format.
   */
  async render(): Promise<string> {
    const application = this.store.snapshotApplication()
    const system = this.store.snapshotSystem()

    // Counters dropped by a store reset must not linger with their old value
    for (const gauge of this.gauges.values()) {
      gauge.reset()
    }

    for (const [name, value] of Object.entries(application.counters)) {
      this.setGauge(name, 'application', value)
    }
    this.setGauge('response_time_sum', 'application', application.responseTimeSum)
    this.setGauge('response_time_count', 'application', application.responseTimeCount)
    this.setGauge('response_time_avg', 'application', application.avgResponseTime)
    this.setGauge('success_rate', 'application', application.successRate)
    this.setGauge('error_rate', 'application', application.errorRate)

    this.setGauge('uptime_seconds', 'system', system.uptimeSeconds)
    this.setGauge('cpu_percent', 'system', system.cpuPercent)
    this.setGauge('memory_mb', 'system', system.memoryMB)
    this.setGauge('thread_count', 'system', system.threadCount)

    return this.registry.metrics()
  }

  get contentType(): string {
    return this.registry.contentType
  }

  private setGauge(name: string, type: MetricType, value: number): void {
    const metricName = toMetricName(name)
    let gauge = this.gauges.get(metricName)

    if (!gauge) {
      gauge = new Gauge({
        name: metricName,
        help: `${type} metric ${name}`,
        labelNames: ['type'],
        registers: [this.registry],
      })
      this.gauges.set(metricName, gauge)
    }

    gauge.set({ type }, value)
  }
}
