import { ConfigService } from '@nestjs/config'
import { Test, TestingModule } from '@nestjs/testing'

import { AppController } from './app.controller'
import { QueueClient, type QueueClientOptions } from './shared/messaging'

const queueOptions: QueueClientOptions = {
  enabled: true,
  offline: false,
  region: 'ru-central1',
  prefix: 'https://queue.example.test/000000',
  visibilityTimeout: 30,
  source: 'task-tracker-test',
}

const createController = async (queueClient: QueueClient): Promise<AppController> => {
  const moduleRef: TestingModule = await Test.createTestingModule({
    controllers: [AppController],
    providers: [
      {
        provide: ConfigService,
        useValue: new ConfigService({
          config: {
            service: { name: 'task-tracker-test', version: '2.3.0' },
            app: { env: 'staging' },
          },
        }),
      },
      { provide: QueueClient, useValue: queueClient },
    ],
  }).compile()

  return moduleRef.get(AppController)
}

describe('AppController', () => {
  it('should identify the service from its configuration', async () => {
    const controller = await createController(new QueueClient({ ...queueOptions, offline: true }))

    expect(controller.getInfo()).toMatchObject({
      service: 'task-tracker-test',
      version: '2.3.0',
      environment: 'staging',
    })
  })

  it.each<[string, Partial<QueueClientOptions>, string]>([
    ['offline', { offline: true }, 'offline'],
    ['credentials', { accessKeyId: 'test-key-id', secretAccessKey: 'test-secret' }, 'online'],
    ['no credentials', {}, 'disabled'],
    ['queue switched off', { enabled: false, offline: true }, 'disabled'],
  ])('should report the queue mode resolved with %s', async (_label, overrides, mode) => {
    const controller = await createController(new QueueClient({ ...queueOptions, ...overrides }))

    expect(controller.getInfo().queueMode).toBe(mode)
  })

  it('should stamp each response with the current time', async () => {
    const controller = await createController(new QueueClient({ ...queueOptions, offline: true }))
    const before = Date.now()

    const { timestamp } = controller.getInfo()

    expect(Date.parse(timestamp)).toBeGreaterThanOrEqual(before - 1)
    expect(Date.parse(timestamp)).toBeLessThanOrEqual(Date.now())
  })
})
