import { DynamicModule, Global, Module } from '@nestjs/common'
import { ConfigModule, ConfigService } from '@nestjs/config'

import { MessageDispatcher } from './message-dispatcher.service'
import { QueueClient } from './queue-client'
import {
  QUEUE_CONSUMER_OPTIONS,
  QueueConsumerOptions,
  QueueConsumerService,
} from './queue-consumer.service'

/**
 * Messaging Module
 *
 * Provides the message queue to the rest of the application.
 * Global so that any feature module can send messages or register handlers.
 *
 * Services provided:
 * - QueueClient: send/receive/delete/stats against the queue
 * - MessageDispatcher: handler registry keyed by message type
 * - QueueConsumerService: background poll loop, started on bootstrap
 *
 * The queue client runs offline when QUEUE_OFFLINE=true and disabled when
 * credentials are missing; the consumer refuses to start in the latter case.
 */
@Global()
@Module({})
export class MessagingModule {
  static forRoot(): DynamicModule {
    return {
      module: MessagingModule,
      imports: [ConfigModule],
      providers: [
        {
          provide: QueueClient,
          useFactory: (configService: ConfigService) =>
            new QueueClient({
              enabled: configService.get<boolean>('config.queue.enabled') ?? true,
              offline: configService.get<boolean>('config.queue.offline') ?? false,
              accessKeyId: configService.get<string>('config.queue.accessKeyId'),
              secretAccessKey: configService.get<string>('config.queue.secretAccessKey'),
              region: configService.get<string>('config.queue.region') ?? 'ru-central1',
              endpoint: configService.get<string>('config.queue.endpoint'),
              prefix: configService.get<string>('config.queue.prefix') ?? '',
              visibilityTimeout: configService.get<number>('config.queue.visibilityTimeout') ?? 30,
              source: configService.get<string>('config.service.name') ?? 'task-tracker',
            }),
          inject: [ConfigService],
        },
        {
          provide: QUEUE_CONSUMER_OPTIONS,
          useFactory: (configService: ConfigService): QueueConsumerOptions => ({
            autoStart: configService.get<boolean>('config.queue.consumer.enabled') ?? true,
            queueName:
              configService.get<string>('config.queue.defaultQueue') ?? 'task-tracker-queue',
            batchSize: configService.get<number>('config.queue.consumer.batchSize') ?? 10,
            waitTimeSeconds: configService.get<number>('config.queue.consumer.waitTimeSeconds') ?? 20,
            pollIntervalMs: configService.get<number>('config.queue.consumer.pollIntervalMs') ?? 1000,
            errorBackoffMs: configService.get<number>('config.queue.consumer.errorBackoffMs') ?? 5000,
            shutdownGraceMs:
              configService.get<number>('config.queue.consumer.shutdownGraceMs') ?? 10_000,
          }),
          inject: [ConfigService],
        },
        MessageDispatcher,
        QueueConsumerService,
      ],
      exports: [QueueClient, MessageDispatcher, QueueConsumerService, QUEUE_CONSUMER_OPTIONS],
    }
  }
}
