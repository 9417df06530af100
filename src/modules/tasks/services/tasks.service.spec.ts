import { NotFoundException } from '@nestjs/common'
import { Test, TestingModule } from '@nestjs/testing'

import { InMemoryTasksRepository } from '../../../../test/support/in-memory-tasks.repository'
import { MetricsStore } from '../../../shared/metrics'
import { StorageService } from '../../../shared/storage'
import { TasksRepository } from '../repositories'
import { TasksService } from './tasks.service'

const MISSING_TASK_ID = '0b7a3f0e-5a8c-4d4f-9a51-6f2d1c3e4b5a'

describe('TasksService', () => {
  let service: TasksService
  let metrics: MetricsStore
  const upload = jest.fn()

  beforeEach(async () => {
    upload.mockReset()

    const moduleRef: TestingModule = await Test.createTestingModule({
      providers: [
        TasksService,
        MetricsStore,
        { provide: TasksRepository, useClass: InMemoryTasksRepository },
        { provide: StorageService, useValue: { upload } },
      ],
    }).compile()

    service = moduleRef.get(TasksService)
    metrics = moduleRef.get(MetricsStore)
  })

  describe('create', () => {
    it('should apply defaults', async () => {
      const task = await service.create({ title: 'Write docs' })

      expect(task).toMatchObject({
        title: 'Write docs',
        description: null,
        status: 'PENDING',
        priority: 0,
        imageUrl: null,
      })
    })

    it('should count the database operation', async () => {
      await service.create({ title: 'Write docs' })

      expect(metrics.get('db_operations')).toBe(1)
    })
  })

  describe('findAll', () => {
    it('should filter by status and minimum priority', async () => {
      await service.create({ title: 'low', priority: 1 })
      await service.create({ title: 'high', priority: 8 })
      await service.create({ title: 'done', priority: 9, status: 'COMPLETED' })

      const tasks = await service.findAll({ status: 'PENDING', minPriority: 5 })

      expect(tasks.map((task) => task.title)).toEqual(['high'])
    })

    it('should list highest priority first', async () => {
      await service.create({ title: 'low', priority: 1 })
      await service.create({ title: 'high', priority: 8 })

      const tasks = await service.findAll()

      expect(tasks.map((task) => task.title)).toEqual(['high', 'low'])
    })
  })

  describe('findOne', () => {
    it('should throw NotFoundException for an unknown id', async () => {
      await expect(service.findOne(MISSING_TASK_ID)).rejects.toBeInstanceOf(NotFoundException)
    })
  })

  describe('update', () => {
    it('should change only the given fields', async () => {
      const created = await service.create({ title: 'Write docs', description: 'API docs' })

      const updated = await service.update(created.id, { status: 'IN_PROGRESS' })

      expect(updated).toMatchObject({
        id: created.id,
        title: 'Write docs',
        description: 'API docs',
        status: 'IN_PROGRESS',
      })
    })

    it('should throw NotFoundException for an unknown id', async () => {
      await expect(service.update(MISSING_TASK_ID, { title: 'x' })).rejects.toBeInstanceOf(
        NotFoundException
      )
    })
  })

  describe('remove', () => {
    it('should delete the task', async () => {
      const created = await service.create({ title: 'Write docs' })

      await expect(service.remove(created.id)).resolves.toMatchObject({ id: created.id })
      await expect(service.findOne(created.id)).rejects.toBeInstanceOf(NotFoundException)
    })

    it('should throw NotFoundException for an unknown id', async () => {
      await expect(service.remove(MISSING_TASK_ID)).rejects.toBeInstanceOf(NotFoundException)
    })
  })

  describe('attachImage', () => {
    const image = {
      originalName: 'cover.png',
      contentType: 'image/png',
      body: Buffer.from('png'),
    }

    it('should store the uploaded URL on the task', async () => {
      upload.mockResolvedValue({
        key: 'a.png',
        url: 'https://storage.example.test/task-images/a.png',
      })
      const created = await service.create({ title: 'Write docs' })

      const task = await service.attachImage(created.id, image)

      expect(upload).toHaveBeenCalledWith(image)
      expect(task.imageUrl).toBe('https://storage.example.test/task-images/a.png')
    })

    it('should not upload for an unknown task', async () => {
      await expect(service.attachImage(MISSING_TASK_ID, image)).rejects.toBeInstanceOf(
        NotFoundException
      )
      expect(upload).not.toHaveBeenCalled()
    })
  })
})
