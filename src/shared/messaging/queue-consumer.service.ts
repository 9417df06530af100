import {
  Inject,
  Injectable,
  Logger,
  OnApplicationBootstrap,
  OnModuleDestroy,
} from '@nestjs/common'

import { MetricsStore } from '../metrics/metrics-store'
import { MessageDispatcher } from './message-dispatcher.service'
import { describeError } from './messaging.errors'
import { QueueClient, type QueueMode } from './queue-client'
import type { QueueMessage } from './queue-message'

export const QUEUE_CONSUMER_OPTIONS = 'QUEUE_CONSUMER_OPTIONS'

export interface QueueConsumerOptions {
  /** Start polling when the application boots */
  autoStart: boolean
  queueName: string
  batchSize: number
  waitTimeSeconds: number
  /** Pause between two polls */
  pollIntervalMs: number
  /** Pause after a cycle failed outside per-message isolation */
  errorBackoffMs: number
  /** How long shutdown waits for the current cycle before giving up */
  shutdownGraceMs: number
}

export enum ConsumerState {
  Stopped = 'stopped',
  Running = 'running',
  Cancelling = 'cancelling',
}

export interface ConsumerStatus {
  state: ConsumerState
  queueName: string
  mode: QueueMode
  cyclesCompleted: number
  lastPollAt: string | null
}

/**
 * Queue Consumer Service
 *
 * Owns the poll → dispatch → acknowledge cycle for one queue.
 *
 * - A message is deleted only after its handler succeeded.
 * - A failing handler increments `queue_messages_failed` and leaves the
 *   message for the backend to redeliver; sibling messages are unaffected.
 * - An error escaping a whole cycle is logged and followed by a longer
 *   backoff. The loop only ends on `stop()`.
 *
 * Cancellation is cooperative: it aborts a pending long poll, is checked
 * between cycles and cuts sleeps short, but a batch already received is
 * processed to the end.
 *
 * The loop stops in `onModuleDestroy`, so the last batch drains while the
 * providers it uses are still open; those release their connections in
 * `onApplicationShutdown`.
 */
@Injectable()
export class QueueConsumerService implements OnApplicationBootstrap, OnModuleDestroy {
  private readonly logger = new Logger(QueueConsumerService.name)
  private state = ConsumerState.Stopped
  private abortController: AbortController | null = null
  private loop: Promise<void> | null = null
  private cyclesCompleted = 0
  private lastPollAt: Date | null = null

  constructor(
    private readonly queueClient: QueueClient,
    private readonly dispatcher: MessageDispatcher,
    private readonly metrics: MetricsStore,
    @Inject(QUEUE_CONSUMER_OPTIONS) private readonly options: QueueConsumerOptions
  ) {}

  onApplicationBootstrap(): void {
    if (!this.options.autoStart) {
      this.logger.log('Queue consumer disabled, not starting')
      return
    }
    this.start()
  }

  async onModuleDestroy(): Promise<void> {
    await this.stop()
  }

  getState(): ConsumerState {
    return this.state
  }

  getStatus(): ConsumerStatus {
    return {
      state: this.state,
      queueName: this.options.queueName,
      mode: this.queueClient.getMode(),
      cyclesCompleted: this.cyclesCompleted,
      lastPollAt: this.lastPollAt?.toISOString() ?? null,
    }
  }

  /**
   * Start the background loop.
   *
   * @returns false when already active or the queue client is disabled
   */
  start(): boolean {
    if (this.state !== ConsumerState.Stopped) {
      this.logger.warn(`Queue consumer already ${this.state}`)
      return false
    }

    if (!this.queueClient.isEnabled()) {
      this.logger.warn('Queue client disabled, queue consumer not started')
      return false
    }

    const abortController = new AbortController()
    this.abortController = abortController
    this.state = ConsumerState.Running
    this.loop = this.run(abortController.signal)

    this.logger.log(
      `Queue consumer started for ${this.options.queueName} (${this.queueClient.getMode()} mode)`
    )
    return true
  }

  /**
   * Request cancellation and wait for the current cycle to finish,
   * at most `shutdownGraceMs`.
   */
  async stop(): Promise<void> {
    if (this.state !== ConsumerState.Running || !this.abortController || !this.loop) {
      return
    }

    this.logger.log('Stopping queue consumer...')
    this.state = ConsumerState.Cancelling
    this.abortController.abort()

    let graceTimer: NodeJS.Timeout | undefined
    const timedOut = new Promise<boolean>((resolve) => {
      graceTimer = setTimeout(() => resolve(true), this.options.shutdownGraceMs)
    })
    const finished = this.loop.then(() => false)

    const expired = await Promise.race([finished, timedOut])
    clearTimeout(graceTimer)

    if (expired) {
      this.logger.warn(
        `Queue consumer did not finish within ${this.options.shutdownGraceMs}ms, continuing shutdown`
      )
      return
    }

    this.logger.log('Queue consumer stopped')
  }

  /**
   * Run one receive/dispatch cycle. Aborting `signal` ends a pending long
   * poll with an empty batch.
   *
   * @returns The number of messages received
   */
  async pollOnce(signal?: AbortSignal): Promise<number> {
    const { queueName, batchSize, waitTimeSeconds } = this.options

    this.lastPollAt = new Date()
    const messages = await this.queueClient.receive(queueName, batchSize, waitTimeSeconds, signal)

    for (const message of messages) {
      await this.processMessage(message)
    }

    this.cyclesCompleted += 1
    return messages.length
  }

  private async run(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      try {
        await this.pollOnce(signal)
        await sleep(this.options.pollIntervalMs, signal)
      } catch (error) {
        this.metrics.increment('queue_poll_errors')
        this.logger.error(`Error in queue consumer loop: ${describeError(error)}`)
        await sleep(this.options.errorBackoffMs, signal)
      }
    }

    this.state = ConsumerState.Stopped
    this.abortController = null
    this.loop = null
  }

  private async processMessage(message: QueueMessage): Promise<void> {
    const { queueName } = this.options

    try {
      const outcome = await this.dispatcher.dispatch(message)

      const deleted = await this.queueClient.delete(queueName, message.receipt)
      if (!deleted) {
        this.logger.warn(`Message ${message.id} handled but not deleted, expect a redelivery`)
      }

      this.metrics.increment('queue_messages_processed')
      if (outcome === 'dropped') {
        this.metrics.increment('queue_messages_dropped')
      }
    } catch (error) {
      this.metrics.increment('queue_messages_failed')
      this.logger.error(`Failed to process message ${message.id}: ${describeError(error)}`)
    }
  }
}

// Resolves after `ms`, or as soon as the signal aborts
function sleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve()
      return
    }

    const done = (): void => {
      clearTimeout(timer)
      signal.removeEventListener('abort', done)
      resolve()
    }
    const timer = setTimeout(done, ms)
    signal.addEventListener('abort', done, { once: true })
  })
}
