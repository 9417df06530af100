import { Module } from '@nestjs/common'
import { TerminusModule } from '@nestjs/terminus'

import { DatabaseHealthIndicator } from './database.health'
import { HealthController } from './health.controller'
import { QueueHealthIndicator } from './queue.health'

/**
 * Health Module
 *
 * Liveness and readiness probes through @nestjs/terminus. Queue and database
 * services come from their global modules.
 */
@Module({
  imports: [TerminusModule],
  controllers: [HealthController],
  providers: [QueueHealthIndicator, DatabaseHealthIndicator],
})
export class HealthModule {}
