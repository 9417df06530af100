import { Test, TestingModule } from '@nestjs/testing'

import { InMemoryTasksRepository } from '../../../../test/support/in-memory-tasks.repository'
import { MessageDispatcher, MessageHandlerError, type QueueMessage } from '../../../shared/messaging'
import { MetricsStore } from '../../../shared/metrics'
import { StorageService } from '../../../shared/storage'
import { TasksRepository } from '../repositories'
import { InvalidTaskMessageError, TaskMessageHandlers } from './task-message-handlers.service'
import { TasksService } from './tasks.service'

const MISSING_TASK_ID = '0b7a3f0e-5a8c-4d4f-9a51-6f2d1c3e4b5a'

const message = (type: string, data: unknown): QueueMessage => ({
  id: `${type}-1`,
  body: { format: 'json', value: { type, data } },
  receipt: 'receipt-1',
  attributes: {},
})

describe('TaskMessageHandlers', () => {
  let dispatcher: MessageDispatcher
  let tasksService: TasksService

  beforeEach(async () => {
    const moduleRef: TestingModule = await Test.createTestingModule({
      providers: [
        TaskMessageHandlers,
        TasksService,
        MessageDispatcher,
        MetricsStore,
        { provide: TasksRepository, useClass: InMemoryTasksRepository },
        { provide: StorageService, useValue: { upload: jest.fn() } },
      ],
    }).compile()

    // Runs onModuleInit, which registers the handlers
    await moduleRef.init()

    dispatcher = moduleRef.get(MessageDispatcher)
    tasksService = moduleRef.get(TasksService)
  })

  it('should register the task message types', () => {
    expect(dispatcher.registeredTypes()).toEqual(['create_task', 'update_task', 'delete_task'])
  })

  describe('create_task', () => {
    it('should create a task', async () => {
      await expect(
        dispatcher.dispatch(message('create_task', { title: 'From queue', priority: 4 }))
      ).resolves.toBe('handled')

      const tasks = await tasksService.findAll()
      expect(tasks).toHaveLength(1)
      expect(tasks[0]).toMatchObject({ title: 'From queue', priority: 4, status: 'PENDING' })
    })

    it('should fail on invalid data', async () => {
      const dispatched = dispatcher.dispatch(message('create_task', { priority: 4 }))

      await expect(dispatched).rejects.toBeInstanceOf(MessageHandlerError)
      await expect(dispatched).rejects.toMatchObject({
        cause: expect.any(InvalidTaskMessageError),
      })
      await expect(tasksService.findAll()).resolves.toEqual([])
    })

    it('should fail when data is not an object', async () => {
      await expect(dispatcher.dispatch(message('create_task', 'From queue'))).rejects.toThrow(
        'Invalid create_task message: data must be an object'
      )
    })
  })

  describe('update_task', () => {
    it('should apply the changes', async () => {
      const created = await tasksService.create({ title: 'From queue' })

      await dispatcher.dispatch(message('update_task', { id: created.id, status: 'COMPLETED' }))

      await expect(tasksService.findOne(created.id)).resolves.toMatchObject({
        title: 'From queue',
        status: 'COMPLETED',
      })
    })

    it('should reject unknown fields', async () => {
      const created = await tasksService.create({ title: 'From queue' })

      await expect(
        dispatcher.dispatch(message('update_task', { id: created.id, owner: 'someone' }))
      ).rejects.toBeInstanceOf(MessageHandlerError)
    })

    it('should fail for a missing task so the message is retried', async () => {
      await expect(
        dispatcher.dispatch(message('update_task', { id: MISSING_TASK_ID, title: 'x' }))
      ).rejects.toBeInstanceOf(MessageHandlerError)
    })
  })

  describe('delete_task', () => {
    it('should delete the task', async () => {
      const created = await tasksService.create({ title: 'From queue' })

      await dispatcher.dispatch(message('delete_task', { id: created.id }))

      await expect(tasksService.findAll()).resolves.toEqual([])
    })

    it('should treat an already deleted task as done', async () => {
      await expect(
        dispatcher.dispatch(message('delete_task', { id: MISSING_TASK_ID }))
      ).resolves.toBe('handled')
    })

    it('should fail on a malformed id', async () => {
      await expect(
        dispatcher.dispatch(message('delete_task', { id: 'not-a-uuid' }))
      ).rejects.toBeInstanceOf(MessageHandlerError)
    })
  })
})
