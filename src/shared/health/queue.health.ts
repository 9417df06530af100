import { Injectable } from '@nestjs/common'
import { HealthCheckError, HealthIndicator, HealthIndicatorResult } from '@nestjs/terminus'

import { ConsumerState, QueueClient, QueueConsumerService } from '../messaging'

/**
 * Queue Health Indicator
 *
 * Healthy when the queue client is usable (online or offline) and the
 * consumer is not stuck cancelling.
 */
@Injectable()
export class QueueHealthIndicator extends HealthIndicator {
  constructor(
    private readonly queueClient: QueueClient,
    private readonly consumer: QueueConsumerService
  ) {
    super()
  }

  async isHealthy(key: string): Promise<HealthIndicatorResult> {
    const status = this.consumer.getStatus()
    const isHealthy =
      this.queueClient.isEnabled() && status.state !== ConsumerState.Cancelling

    const result = this.getStatus(key, isHealthy, {
      mode: status.mode,
      consumer: status.state,
    })

    if (!isHealthy) {
      throw new HealthCheckError('Queue check failed', result)
    }

    return result
  }
}
