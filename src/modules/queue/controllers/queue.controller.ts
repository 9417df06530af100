import { Body, Controller, Get, Inject, Post, Query } from '@nestjs/common'

import { MetricsStore } from '../../../shared/metrics'
import {
  ConsumerStatus,
  QUEUE_CONSUMER_OPTIONS,
  QueueClient,
  QueueConsumerOptions,
  QueueConsumerService,
  QueueMode,
  QueueStats,
} from '../../../shared/messaging'
import { SendMessageDto } from '../dto'

export interface SentMessage {
  messageId: string
  queueName: string
  mode: QueueMode
}

/**
 * Queue Controller
 *
 * Endpoints:
 * - POST /queue/messages   - Send a message (counts in queue_messages_sent)
 * - GET  /queue/stats      - Approximate queue depth
 * - GET  /queue/consumer   - Consumer loop status
 *
 * Sending answers 503 when the queue is not configured and 502 when the
 * backend rejects the call.
 */
@Controller('queue')
export class QueueController {
  constructor(
    private readonly queueClient: QueueClient,
    private readonly consumer: QueueConsumerService,
    private readonly metrics: MetricsStore,
    @Inject(QUEUE_CONSUMER_OPTIONS) private readonly consumerOptions: QueueConsumerOptions
  ) {}

  @Post('messages')
  async send(@Body() sendMessageDto: SendMessageDto): Promise<SentMessage> {
    const queueName = sendMessageDto.queueName ?? this.consumerOptions.queueName

    const messageId = await this.queueClient.send(
      queueName,
      sendMessageDto.body,
      sendMessageDto.delaySeconds ?? 0,
      sendMessageDto.attributes ?? {}
    )
    this.metrics.increment('queue_messages_sent')

    return { messageId, queueName, mode: this.queueClient.getMode() }
  }

  @Get('stats')
  async stats(@Query('queueName') queueName?: string): Promise<QueueStats> {
    return this.queueClient.stats(queueName || this.consumerOptions.queueName)
  }

  @Get('consumer')
  consumerStatus(): ConsumerStatus {
    return this.consumer.getStatus()
  }
}
