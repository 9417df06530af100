import { Global, Module } from '@nestjs/common'

import { MetricsStore } from './metrics-store'
import { MetricsController } from './metrics.controller'
import { MetricsMiddleware } from './metrics.middleware'
import { MetricsService } from './metrics.service'

/**
 * Metrics Module
 *
 * Global so the queue consumer and feature services can count events
 * on the same MetricsStore the HTTP layer reports.
 */
@Global()
@Module({
  controllers: [MetricsController],
  providers: [MetricsStore, MetricsService, MetricsMiddleware],
  exports: [MetricsStore, MetricsService, MetricsMiddleware],
})
export class MetricsModule {}
