import {
  DeleteMessageCommand,
  GetQueueAttributesCommand,
  type Message,
  type MessageAttributeValue,
  ReceiveMessageCommand,
  SendMessageCommand,
  SQSClient,
} from '@aws-sdk/client-sqs'
import { Logger, type OnApplicationShutdown } from '@nestjs/common'
import { createHash } from 'node:crypto'

import { describeError, QueueNotConfiguredError, QueueTransportError } from './messaging.errors'
import { type AttributeValue, decodeBody, type QueueMessage } from './queue-message'

export type QueueMode = 'online' | 'offline' | 'disabled'

export interface QueueClientOptions {
  enabled: boolean
  offline: boolean
  accessKeyId?: string
  secretAccessKey?: string
  region: string
  endpoint?: string
  /** Base URL; a queue's URL is `{prefix}/{queueName}` */
  prefix: string
  visibilityTimeout: number
  /** Reported in the `Source` attribute of every sent message */
  source: string
  /** Clock used for offline message ids and the `Timestamp` attribute */
  now?: () => Date
}

export interface QueueStats {
  queueName: string
  enabled: boolean
  mode: QueueMode
  available: number
  inFlight: number
  delayed: number
  createdAt: string | null
  modifiedAt: string | null
}

const MAX_DELAY_SECONDS = 900
const MAX_BATCH_SIZE = 10
const MAX_WAIT_TIME_SECONDS = 20

// A receipt that no longer matches a delivery means the message is already gone
const GONE_RECEIPT_ERRORS = new Set(['ReceiptHandleIsInvalid', 'InvalidParameterValue'])

const clamp = (value: number, min: number, max: number): number =>
  Math.min(max, Math.max(min, Math.trunc(value)))

/**
 * Queue Client
 *
 * Thin wrapper over an SQS-compatible message queue.
 *
 * The mode is fixed at construction:
 * - online: every call goes to the backend
 * - offline: nothing leaves the process; sends get a reproducible id,
 *   receives are always empty, deletes and stats succeed
 * - disabled: credentials are missing; sends throw, everything else is empty
 *
 * `receive`, `delete` and `stats` never throw. Failures there are logged and
 * reported as "nothing happened", which keeps the consumer loop simple at
 * the cost of not telling it why.
 */
export class QueueClient implements OnApplicationShutdown {
  private readonly logger = new Logger(QueueClient.name)
  private readonly mode: QueueMode
  private readonly client: SQSClient | null
  private readonly now: () => Date

  constructor(private readonly options: QueueClientOptions) {
    this.now = options.now ?? (() => new Date())
    this.mode = QueueClient.resolveMode(options)

    if (this.mode === 'offline') {
      this.logger.log('Queue client running in offline mode, no network calls will be made')
    } else if (this.mode === 'disabled') {
      this.logger.warn('Queue credentials not set, queue client disabled')
    }

    this.client =
      this.mode === 'online' && options.accessKeyId && options.secretAccessKey
        ? new SQSClient({
            region: options.region,
            ...(options.endpoint ? { endpoint: options.endpoint } : {}),
            credentials: {
              accessKeyId: options.accessKeyId,
              secretAccessKey: options.secretAccessKey,
            },
          })
        : null
  }

  static resolveMode(options: QueueClientOptions): QueueMode {
    if (!options.enabled) {
      return 'disabled'
    }
    if (options.offline) {
      return 'offline'
    }
    return options.accessKeyId && options.secretAccessKey ? 'online' : 'disabled'
  }

  getMode(): QueueMode {
    return this.mode
  }

  isEnabled(): boolean {
    return this.mode !== 'disabled'
  }

  /**
   * Send one message.
   *
   * @returns The backend message id (or a synthesized one offline)
   * @throws QueueNotConfiguredError when the client is disabled
   * @throws QueueTransportError when the backend rejects the call
   */
  async send(
    queueName: string,
    body: unknown,
    delaySeconds = 0,
    attributes: Record<string, AttributeValue> = {}
  ): Promise<string> {
    const serialized = JSON.stringify(body)

    if (this.mode === 'offline') {
      const messageId = this.offlineMessageId(serialized)
      this.logger.log(`[offline] Sent message ${messageId} to ${queueName}`)
      return messageId
    }

    const client = this.requireClient()

    try {
      const response = await client.send(
        new SendMessageCommand({
          QueueUrl: this.queueUrl(queueName),
          MessageBody: serialized,
          DelaySeconds: clamp(delaySeconds, 0, MAX_DELAY_SECONDS),
          MessageAttributes: this.prepareAttributes(attributes),
        })
      )

      if (!response.MessageId) {
        throw new Error('Backend response carried no MessageId')
      }

      this.logger.log(`Message sent to queue ${queueName}, ID: ${response.MessageId}`)
      return response.MessageId
    } catch (error) {
      this.logger.error(`Failed to send message to queue ${queueName}: ${describeError(error)}`)
      throw new QueueTransportError('send', queueName, { cause: error })
    }
  }

  /**
   * Long-poll for up to `maxMessages` deliveries.
   *
   * Returns an empty list on timeout, when disabled, when `signal` aborts
   * the poll, and on any failure.
   */
  async receive(
    queueName: string,
    maxMessages = MAX_BATCH_SIZE,
    waitTimeSeconds = MAX_WAIT_TIME_SECONDS,
    signal?: AbortSignal
  ): Promise<QueueMessage[]> {
    if (this.mode === 'offline') {
      this.logger.debug(`[offline] Receiving from queue ${queueName}`)
      return []
    }

    if (!this.client) {
      this.logger.warn('Queue client disabled, nothing to receive')
      return []
    }

    if (signal?.aborted) {
      return []
    }

    try {
      const response = await this.client.send(
        new ReceiveMessageCommand({
          QueueUrl: this.queueUrl(queueName),
          MaxNumberOfMessages: clamp(maxMessages, 1, MAX_BATCH_SIZE),
          WaitTimeSeconds: clamp(waitTimeSeconds, 0, MAX_WAIT_TIME_SECONDS),
          MessageAttributeNames: ['All'],
          VisibilityTimeout: this.options.visibilityTimeout,
        }),
        { abortSignal: signal }
      )

      const messages = (response.Messages ?? []).flatMap((message) => this.toQueueMessage(message))
      if (messages.length > 0) {
        this.logger.log(`Received ${messages.length} messages from queue ${queueName}`)
      }
      return messages
    } catch (error) {
      if (signal?.aborted || (error instanceof Error && error.name === 'AbortError')) {
        this.logger.debug(`Long poll on ${queueName} aborted`)
        return []
      }

      this.logger.error(`Failed to receive messages from queue ${queueName}: ${describeError(error)}`)
      return []
    }
  }

  /**
   * Acknowledge one delivery.
   *
   * A receipt that is already deleted or expired counts as success.
   */
  async delete(queueName: string, receipt: string): Promise<boolean> {
    if (this.mode === 'offline') {
      this.logger.debug(`[offline] Deleting message from ${queueName}`)
      return true
    }

    if (!this.client) {
      return false
    }

    try {
      await this.client.send(
        new DeleteMessageCommand({
          QueueUrl: this.queueUrl(queueName),
          ReceiptHandle: receipt,
        })
      )
      this.logger.debug(`Message deleted from queue ${queueName}`)
      return true
    } catch (error) {
      if (error instanceof Error && GONE_RECEIPT_ERRORS.has(error.name)) {
        this.logger.warn(`Receipt for ${queueName} already gone (${error.name}), treating as deleted`)
        return true
      }

      this.logger.error(`Failed to delete message from queue ${queueName}: ${describeError(error)}`)
      return false
    }
  }

  /**
   * Approximate queue depth. Best effort: zeros when the backend cannot answer.
   */
  async stats(queueName: string): Promise<QueueStats> {
    const empty: QueueStats = {
      queueName,
      enabled: this.isEnabled(),
      mode: this.mode,
      available: 0,
      inFlight: 0,
      delayed: 0,
      createdAt: null,
      modifiedAt: null,
    }

    if (!this.client) {
      return empty
    }

    try {
      const response = await this.client.send(
        new GetQueueAttributesCommand({
          QueueUrl: this.queueUrl(queueName),
          AttributeNames: [
            'ApproximateNumberOfMessages',
            'ApproximateNumberOfMessagesNotVisible',
            'ApproximateNumberOfMessagesDelayed',
            'CreatedTimestamp',
            'LastModifiedTimestamp',
          ],
        })
      )
      const attributes = response.Attributes ?? {}

      return {
        ...empty,
        available: toCount(attributes.ApproximateNumberOfMessages),
        inFlight: toCount(attributes.ApproximateNumberOfMessagesNotVisible),
        delayed: toCount(attributes.ApproximateNumberOfMessagesDelayed),
        createdAt: epochSecondsToIso(attributes.CreatedTimestamp),
        modifiedAt: epochSecondsToIso(attributes.LastModifiedTimestamp),
      }
    } catch (error) {
      this.logger.error(`Failed to get queue stats for ${queueName}: ${describeError(error)}`)
      return empty
    }
  }

  /**
   * Release the SDK's HTTP agents. Runs after the consumer has stopped.
   */
  onApplicationShutdown(): void {
    this.client?.destroy()
  }

  private requireClient(): SQSClient {
    if (!this.client) {
      throw new QueueNotConfiguredError()
    }
    return this.client
  }

  private queueUrl(queueName: string): string {
    return `${this.options.prefix.replace(/\/+$/, '')}/${queueName}`
  }

  // Same body at the same second always yields the same id
  private offlineMessageId(serialized: string): string {
    const seconds = Math.floor(this.now().getTime() / 1000)
    const digest = createHash('sha256').update(`${serialized}:${seconds}`).digest('hex')
    return `offline-${seconds}-${digest.slice(0, 16)}`
  }

  private prepareAttributes(
    attributes: Record<string, AttributeValue>
  ): Record<string, MessageAttributeValue> {
    const merged: Record<string, AttributeValue> = {
      Source: this.options.source,
      Timestamp: this.now().toISOString(),
      MessageType: 'task',
      ...attributes,
    }

    return Object.fromEntries(
      Object.entries(merged).map(([key, value]): [string, MessageAttributeValue] => [
        key,
        typeof value === 'number'
          ? { DataType: 'Number', StringValue: String(value) }
          : { DataType: 'String', StringValue: String(value) },
      ])
    )
  }

  private toQueueMessage(message: Message): QueueMessage[] {
    if (!message.MessageId || !message.ReceiptHandle) {
      this.logger.warn('Received message without id or receipt handle, skipping')
      return []
    }

    const attributes: Record<string, string> = {}
    for (const [key, value] of Object.entries(message.MessageAttributes ?? {})) {
      if (value.StringValue !== undefined) {
        attributes[key] = value.StringValue
      }
    }

    return [
      {
        id: message.MessageId,
        body: decodeBody(message.Body ?? ''),
        receipt: message.ReceiptHandle,
        attributes,
      },
    ]
  }
}

const toCount = (value: string | undefined): number => {
  const parsed = Number.parseInt(value ?? '0', 10)
  return Number.isNaN(parsed) ? 0 : parsed
}

const epochSecondsToIso = (value: string | undefined): string | null => {
  if (!value) {
    return null
  }

  const seconds = Number.parseInt(value, 10)
  return Number.isNaN(seconds) ? null : new Date(seconds * 1000).toISOString()
}
