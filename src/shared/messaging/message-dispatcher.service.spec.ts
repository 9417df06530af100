import { MessageDispatcher } from './message-dispatcher.service'
import { MessageHandlerError } from './messaging.errors'
import type { QueueMessage } from './queue-message'

const jsonMessage = (value: unknown, id = 'm1'): QueueMessage => ({
  id,
  body: { format: 'json', value },
  receipt: `receipt-${id}`,
  attributes: {},
})

describe('MessageDispatcher', () => {
  let dispatcher: MessageDispatcher

  beforeEach(() => {
    dispatcher = new MessageDispatcher()
  })

  it('should route data to the handler of its type', async () => {
    const handler = jest.fn()
    dispatcher.register('create_task', handler)
    const message = jsonMessage({ type: 'create_task', data: { title: 'a' } })

    await expect(dispatcher.dispatch(message)).resolves.toBe('handled')
    expect(handler).toHaveBeenCalledWith({ title: 'a' }, message)
  })

  it('should wait for async handlers', async () => {
    const order: string[] = []
    dispatcher.register('slow', async () => {
      await new Promise((resolve) => setTimeout(resolve, 5))
      order.push('handler')
    })

    await dispatcher.dispatch(jsonMessage({ type: 'slow' }))
    order.push('dispatched')

    expect(order).toEqual(['handler', 'dispatched'])
  })

  it('should reject a second handler for the same type', () => {
    dispatcher.register('create_task', jest.fn())

    expect(() => dispatcher.register('create_task', jest.fn())).toThrow(
      'A handler for message type "create_task" is already registered'
    )
    expect(dispatcher.registeredTypes()).toEqual(['create_task'])
  })

  it('should drop types without a handler', async () => {
    await expect(dispatcher.dispatch(jsonMessage({ type: 'archive_task' }))).resolves.toBe(
      'dropped'
    )
  })

  it('should drop unrecognized bodies', async () => {
    const handler = jest.fn()
    dispatcher.register('unknown', handler)

    const raw: QueueMessage = {
      id: 'm2',
      body: { format: 'raw', text: 'not json' },
      receipt: 'r2',
      attributes: {},
    }

    await expect(dispatcher.dispatch(raw)).resolves.toBe('dropped')
    expect(handler).not.toHaveBeenCalled()
  })

  it('should wrap handler failures', async () => {
    const failure = new Error('database unavailable')
    dispatcher.register('create_task', () => {
      throw failure
    })

    const dispatched = dispatcher.dispatch(jsonMessage({ type: 'create_task' }, 'm3'))

    await expect(dispatched).rejects.toBeInstanceOf(MessageHandlerError)
    await expect(dispatched).rejects.toMatchObject({
      messageType: 'create_task',
      messageId: 'm3',
      cause: failure,
    })
  })
})
