import { Controller, Get, HttpCode, HttpStatus, Post } from '@nestjs/common'

import { ApplicationMetrics, MetricsStore, SystemMetrics } from '../../../shared/metrics'

export interface MetricsReport {
  application: ApplicationMetrics
  system: SystemMetrics
  status: 'healthy'
  timestamp: string
}

/**
 * Monitoring Controller
 *
 * JSON view of the metrics store; `/metrics` serves the same numbers in
 * the Prometheus format.
 *
 * Endpoints:
 * - GET  /monitoring/metrics        - Application and system snapshots
 * - POST /monitoring/metrics/reset  - Zero all application counters
 */
@Controller('monitoring')
export class MonitoringController {
  constructor(private readonly metrics: MetricsStore) {}

  @Get('metrics')
  getMetrics(): MetricsReport {
    return {
      application: this.metrics.snapshotApplication(),
      system: this.metrics.snapshotSystem(),
      status: 'healthy',
      timestamp: new Date().toISOString(),
    }
  }

  @Post('metrics/reset')
  @HttpCode(HttpStatus.OK)
  reset(): { reset: true; timestamp: string } {
    this.metrics.reset()
    return { reset: true, timestamp: new Date().toISOString() }
  }
}
