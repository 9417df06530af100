import { Injectable } from '@nestjs/common'
import { HealthCheckError, HealthIndicator, HealthIndicatorResult } from '@nestjs/terminus'

import { DatabaseService } from '../database'

/**
 * Database Health Indicator
 *
 * Pings PostgreSQL with `SELECT 1`. A disabled database reports up with
 * `enabled: false`, since the service can still answer non-task routes.
 */
@Injectable()
export class DatabaseHealthIndicator extends HealthIndicator {
  constructor(private readonly database: DatabaseService) {
    super()
  }

  async pingCheck(key: string): Promise<HealthIndicatorResult> {
    if (!this.database.isEnabled()) {
      return this.getStatus(key, true, { enabled: false })
    }

    const isHealthy = await this.database.healthCheck()
    const result = this.getStatus(key, isHealthy, { enabled: true })

    if (!isHealthy) {
      throw new HealthCheckError('Database check failed', result)
    }

    return result
  }
}
