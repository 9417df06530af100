import { Injectable, Logger, NotFoundException } from '@nestjs/common'

import { type Task, TaskStatus } from '../../../shared/database'
import { MetricsStore } from '../../../shared/metrics'
import { StorageService } from '../../../shared/storage'
import { CreateTaskDto, UpdateTaskDto } from '../dto'
import { type TaskFilter, TasksRepository } from '../repositories'

export interface TaskImage {
  originalName: string
  contentType: string
  body: Buffer
}

/**
 * Tasks Service
 *
 * Task CRUD shared by the HTTP API and the queue message handlers.
 * Every repository call counts once in `db_operations`.
 */
@Injectable()
export class TasksService {
  private readonly logger = new Logger(TasksService.name)

  constructor(
    private readonly repository: TasksRepository,
    private readonly storage: StorageService,
    private readonly metrics: MetricsStore
  ) {}

  async create(createTaskDto: CreateTaskDto): Promise<Task> {
    this.logger.log(`Creating task: ${createTaskDto.title}`)

    const task = await this.track(() =>
      this.repository.create({
        title: createTaskDto.title,
        description: createTaskDto.description ?? null,
        status: createTaskDto.status ?? TaskStatus.PENDING,
        priority: createTaskDto.priority ?? 0,
      })
    )

    this.logger.log(`Created task with ID: ${task.id}`)
    return task
  }

  /**
   * @param filter - Optional status and minimum priority
   */
  async findAll(filter: TaskFilter = {}): Promise<Task[]> {
    this.logger.debug(`Finding tasks with status=${filter.status}, priority>=${filter.minPriority}`)
    return this.track(() => this.repository.findMany(filter))
  }

  /**
   * @throws NotFoundException if task not found
   */
  async findOne(id: string): Promise<Task> {
    const task = await this.track(() => this.repository.findById(id))

    if (!task) {
      throw new NotFoundException(`Task with ID ${id} not found`)
    }

    return task
  }

  /**
   * @throws NotFoundException if task not found
   */
  async update(id: string, updateTaskDto: UpdateTaskDto): Promise<Task> {
    this.logger.log(`Updating task with ID: ${id}`)

    const task = await this.track(() =>
      this.repository.update(id, {
        title: updateTaskDto.title,
        description: updateTaskDto.description,
        status: updateTaskDto.status,
        priority: updateTaskDto.priority,
      })
    )

    if (!task) {
      throw new NotFoundException(`Task with ID ${id} not found`)
    }

    return task
  }

  /**
   * @throws NotFoundException if task not found
   */
  async remove(id: string): Promise<Task> {
    this.logger.log(`Deleting task with ID: ${id}`)

    const task = await this.track(() => this.repository.delete(id))

    if (!task) {
      throw new NotFoundException(`Task with ID ${id} not found`)
    }

    return task
  }

  /**
   * Upload an image to object storage and attach its URL to the task.
   *
   * @throws NotFoundException if task not found
   * @throws ServiceUnavailableException if object storage is not configured
   */
  async attachImage(id: string, image: TaskImage): Promise<Task> {
    await this.findOne(id)

    const uploaded = await this.storage.upload(image)
    const task = await this.track(() => this.repository.update(id, { imageUrl: uploaded.url }))

    if (!task) {
      throw new NotFoundException(`Task with ID ${id} not found`)
    }

    return task
  }

  private async track<T>(operation: () => Promise<T>): Promise<T> {
    const result = await operation()
    this.metrics.increment('db_operations')
    return result
  }
}
