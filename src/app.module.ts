import { Module } from '@nestjs/common'
import { ConfigModule } from '@nestjs/config'

import { AppController } from './app.controller'
import { environmentConfig, validate } from './config'
import { MonitoringModule } from './modules/monitoring'
import { QueueModule } from './modules/queue'
import { TasksModule } from './modules/tasks'
import { DatabaseModule } from './shared/database'
import { HealthModule } from './shared/health'
import { LoggerModule } from './shared/logger'
import { MessagingModule } from './shared/messaging'
import { MetricsModule } from './shared/metrics'
import { StorageModule } from './shared/storage'

/**
 * App Module
 *
 * Architecture:
 * - Shared modules (global): Logging, Metrics, Messaging, Database, Storage
 * - Infrastructure modules: Health checks, Configuration
 * - Feature modules: Tasks, Queue, Monitoring
 */
@Module({
  imports: [
    // Loads and validates environment variables
    ConfigModule.forRoot({
      isGlobal: true,
      load: [environmentConfig],
      validate,
    }),

    LoggerModule.forRoot(),

    // Postgres is optional; without DATABASE_URL task routes answer 503
    DatabaseModule,
    StorageModule,

    // Queue client, dispatcher and the background consumer
    MessagingModule.forRoot(),

    HealthModule,
    MetricsModule,

    TasksModule,
    QueueModule,
    MonitoringModule,
  ],
  controllers: [AppController],
})
export class AppModule {}
