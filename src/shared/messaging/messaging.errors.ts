/**
 * The queue client was built without credentials (or explicitly disabled),
 * so nothing can be sent.
 */
export class QueueNotConfiguredError extends Error {
  constructor(message = 'Message queue is not configured') {
    super(message)
    this.name = 'QueueNotConfiguredError'
  }
}

/**
 * The queue backend or the network between us failed a call.
 */
export class QueueTransportError extends Error {
  constructor(
    readonly operation: 'send' | 'receive' | 'delete' | 'stats',
    readonly queueName: string,
    options?: { cause?: unknown }
  ) {
    super(`Queue ${operation} failed for ${queueName}: ${describeError(options?.cause)}`, options)
    this.name = 'QueueTransportError'
  }
}

/**
 * A message handler threw while processing one delivery.
 */
export class MessageHandlerError extends Error {
  constructor(
    readonly messageType: string,
    readonly messageId: string,
    options?: { cause?: unknown }
  ) {
    super(
      `Handler for ${messageType} failed on message ${messageId}: ${describeError(options?.cause)}`,
      options
    )
    this.name = 'MessageHandlerError'
  }
}

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error)
