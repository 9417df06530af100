import { Module } from '@nestjs/common'

import { QueueController } from './controllers'

/**
 * Queue Module
 *
 * HTTP access to the message queue. The client, dispatcher and consumer
 * themselves live in the global MessagingModule.
 */
@Module({
  controllers: [QueueController],
})
export class QueueModule {}
