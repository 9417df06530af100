import { Module } from '@nestjs/common'

import { TasksController } from './controllers'
import { DrizzleTasksRepository, TasksRepository } from './repositories'
import { TaskMessageHandlers, TasksService } from './services'

/**
 * Tasks Module
 *
 * Components:
 * - TasksController: HTTP request handling
 * - TasksService: Business logic over the repository
 * - TaskMessageHandlers: create/update/delete tasks from queue messages
 *
 * Dependencies (global modules): Database, Messaging, Metrics, Storage
 */
@Module({
  controllers: [TasksController],
  providers: [
    TasksService,
    TaskMessageHandlers,
    { provide: TasksRepository, useClass: DrizzleTasksRepository },
  ],
  exports: [TasksService],
})
export class TasksModule {}
