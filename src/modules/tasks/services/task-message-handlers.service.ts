import { Injectable, Logger, NotFoundException, OnModuleInit } from '@nestjs/common'
import { ClassConstructor, plainToInstance } from 'class-transformer'
import { validateSync } from 'class-validator'

import { MessageDispatcher } from '../../../shared/messaging'
import { CreateTaskDto, DeleteTaskMessageDto, TaskMessageType, UpdateTaskMessageDto } from '../dto'
import { TasksService } from './tasks.service'

/**
 * `data` did not match the DTO of its message type.
 */
export class InvalidTaskMessageError extends Error {
  constructor(type: string, details: string) {
    super(`Invalid ${type} message: ${details}`)
    this.name = 'InvalidTaskMessageError'
  }
}

/**
 * Task Message Handlers
 *
 * Registers the tasks module's queue message types with the dispatcher:
 * - create_task: `{ title, description?, status?, priority? }`
 * - update_task: `{ id, ...changes }`
 * - delete_task: `{ id }`; a task that is already gone counts as done
 *
 * A thrown error leaves the message on the queue for redelivery.
 */
@Injectable()
export class TaskMessageHandlers implements OnModuleInit {
  private readonly logger = new Logger(TaskMessageHandlers.name)

  constructor(
    private readonly dispatcher: MessageDispatcher,
    private readonly tasksService: TasksService
  ) {}

  onModuleInit(): void {
    this.dispatcher.register(TaskMessageType.CREATE, (data) => this.handleCreate(data))
    this.dispatcher.register(TaskMessageType.UPDATE, (data) => this.handleUpdate(data))
    this.dispatcher.register(TaskMessageType.DELETE, (data) => this.handleDelete(data))
  }

  async handleCreate(data: unknown): Promise<void> {
    const dto = parse(TaskMessageType.CREATE, CreateTaskDto, data)
    const task = await this.tasksService.create(dto)
    this.logger.log(`Task ${task.id} created from queue message`)
  }

  async handleUpdate(data: unknown): Promise<void> {
    const { id, ...changes } = parse(TaskMessageType.UPDATE, UpdateTaskMessageDto, data)
    await this.tasksService.update(id, changes)
    this.logger.log(`Task ${id} updated from queue message`)
  }

  async handleDelete(data: unknown): Promise<void> {
    const { id } = parse(TaskMessageType.DELETE, DeleteTaskMessageDto, data)

    try {
      await this.tasksService.remove(id)
      this.logger.log(`Task ${id} deleted from queue message`)
    } catch (error) {
      if (!(error instanceof NotFoundException)) {
        throw error
      }
      this.logger.warn(`Task ${id} already deleted, acknowledging message`)
    }
  }
}

function parse<T extends object>(type: string, dto: ClassConstructor<T>, data: unknown): T {
  if (!data || typeof data !== 'object' || Array.isArray(data)) {
    throw new InvalidTaskMessageError(type, 'data must be an object')
  }

  const instance = plainToInstance(dto, data)
  const errors = validateSync(instance, { whitelist: true, forbidNonWhitelisted: true })

  if (errors.length > 0) {
    const details = errors
      .map((error) => `${error.property}: ${Object.values(error.constraints ?? {}).join(', ')}`)
      .join('; ')
    throw new InvalidTaskMessageError(type, details)
  }

  return instance
}
