import { Injectable, Logger } from '@nestjs/common'

import { MessageHandlerError } from './messaging.errors'
import { type QueueMessage, toEnvelope } from './queue-message'

/**
 * Handles the `data` of one message type.
 *
 * Throwing (or rejecting) marks the delivery as failed; the message stays in
 * the queue and is redelivered after its visibility timeout.
 */
export type MessageHandler = (data: unknown, message: QueueMessage) => void | Promise<void>

export type DispatchOutcome = 'handled' | 'dropped'

/**
 * Message Dispatcher
 *
 * Routes a delivered message to the handler registered for its `type`.
 * Feature modules register their handlers during module init:
 *
 * ```typescript
 * this.dispatcher.register('create_task', (data) => this.createTask(data))
 * ```
 *
 * Types nobody registered are logged and dropped, since producers are free
 * to put anything on the queue.
 */
@Injectable()
export class MessageDispatcher {
  private readonly logger = new Logger(MessageDispatcher.name)
  private readonly handlers = new Map<string, MessageHandler>()

  register(type: string, handler: MessageHandler): void {
    if (this.handlers.has(type)) {
      throw new Error(`A handler for message type "${type}" is already registered`)
    }

    this.handlers.set(type, handler)
    this.logger.log(`Registered handler for message type ${type}`)
  }

  registeredTypes(): string[] {
    return [...this.handlers.keys()]
  }

  /**
   * @throws MessageHandlerError when the handler fails
   */
  async dispatch(message: QueueMessage): Promise<DispatchOutcome> {
    const envelope = toEnvelope(message.body)
    const handler = envelope.kind === 'envelope' ? this.handlers.get(envelope.type) : undefined

    if (envelope.kind === 'unrecognized' || !handler) {
      this.logger.warn(`Dropping message ${message.id} of unhandled type ${envelope.type}`)
      return 'dropped'
    }

    try {
      await handler(envelope.data, message)
    } catch (error) {
      throw new MessageHandlerError(envelope.type, message.id, { cause: error })
    }

    this.logger.debug(`Handled message ${message.id} of type ${envelope.type}`)
    return 'handled'
  }
}
