import { Controller, Get } from '@nestjs/common'
import { HealthCheck, HealthCheckService, MemoryHealthIndicator } from '@nestjs/terminus'

import { DatabaseHealthIndicator } from './database.health'
import { QueueHealthIndicator } from './queue.health'

const HEAP_LIMIT_BYTES = 300 * 1024 * 1024
const RSS_LIMIT_BYTES = 500 * 1024 * 1024

/**
 * Health Check Controller
 *
 * Endpoints:
 * - GET /health/live: Liveness probe (is the process usable?)
 * - GET /health/ready: Readiness probe (are the queue and database reachable?)
 * - GET /health: Everything above plus RSS
 */
@Controller('health')
export class HealthController {
  constructor(
    private readonly health: HealthCheckService,
    private readonly memory: MemoryHealthIndicator,
    private readonly queue: QueueHealthIndicator,
    private readonly database: DatabaseHealthIndicator
  ) {}

  @Get('live')
  @HealthCheck()
  checkLiveness() {
    return this.health.check([() => this.memory.checkHeap('memory_heap', HEAP_LIMIT_BYTES)])
  }

  @Get('ready')
  @HealthCheck()
  checkReadiness() {
    return this.health.check([
      () => this.queue.isHealthy('queue'),
      () => this.database.pingCheck('database'),
    ])
  }

  @Get()
  @HealthCheck()
  check() {
    return this.health.check([
      () => this.memory.checkHeap('memory_heap', HEAP_LIMIT_BYTES),
      () => this.memory.checkRSS('memory_rss', RSS_LIMIT_BYTES),
      () => this.queue.isHealthy('queue'),
      () => this.database.pingCheck('database'),
    ])
  }
}
