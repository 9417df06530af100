import { Injectable, Logger } from '@nestjs/common'
import { readFileSync } from 'node:fs'

/**
 * Counter names the service always reports, even before the first increment.
 */
export const DEFAULT_COUNTERS = [
  'requests_total',
  'requests_success',
  'requests_error',
  'queue_messages_sent',
  'queue_messages_processed',
  'queue_messages_failed',
  'queue_messages_dropped',
  'queue_poll_errors',
  'db_operations',
] as const

export interface ApplicationMetrics {
  counters: Record<string, number>
  responseTimeSum: number
  responseTimeCount: number
  avgResponseTime: number
  successRate: number
  errorRate: number
  timestamp: string
}

export interface SystemMetrics {
  uptimeSeconds: number
  cpuPercent: number
  memoryMB: number
  threadCount: number
  timestamp: string
}

interface MetricsState {
  counters: Map<string, number>
  responseTime: { sum: number; count: number }
}

const createState = (): MetricsState => ({
  counters: new Map(DEFAULT_COUNTERS.map((name): [string, number] => [name, 0])),
  responseTime: { sum: 0, count: 0 },
})

/**
 * Metrics Store
 *
 * In-process registry of application counters and the response time
 * accumulator, shared by the queue consumer and every HTTP request.
 *
 * Every mutation and every snapshot runs as one synchronous section with no
 * `await` inside, so the event loop cannot interleave another caller between
 * reading and writing. A snapshot therefore never sees `requests_total`
 * incremented without its matching success/error counter.
 */
@Injectable()
export class MetricsStore {
  private readonly logger = new Logger(MetricsStore.name)
  private state: MetricsState = createState()
  private readonly startedAt = process.hrtime.bigint()
  private cpuSample = { usage: process.cpuUsage(), at: process.hrtime.bigint() }

  /**
   * Add `delta` to a counter, creating it at zero first if unseen.
   *
   * @throws RangeError when delta is negative or not an integer
   */
  increment(name: string, delta = 1): void {
    if (!Number.isSafeInteger(delta) || delta < 0) {
      throw new RangeError(`Counter delta must be a non-negative integer, got ${delta}`)
    }

    const counters = this.state.counters
    counters.set(name, (counters.get(name) ?? 0) + delta)
  }

  /**
   * Record one response duration, in seconds.
   */
  recordDuration(seconds: number): void {
    if (!Number.isFinite(seconds) || seconds < 0) {
      throw new RangeError(`Duration must be a finite non-negative number, got ${seconds}`)
    }

    const responseTime = this.state.responseTime
    responseTime.sum += seconds
    responseTime.count += 1
  }

  /**
   * Current value of a single counter (0 when unseen).
   */
  get(name: string): number {
    return this.state.counters.get(name) ?? 0
  }

  snapshotApplication(): ApplicationMetrics {
    const { counters, responseTime } = this.state
    const copy = Object.fromEntries(counters)
    const total = copy.requests_total ?? 0
    const rate = (value = 0): number => (total > 0 ? (value / total) * 100 : 0)

    return {
      counters: copy,
      responseTimeSum: responseTime.sum,
      responseTimeCount: responseTime.count,
      avgResponseTime: responseTime.count > 0 ? responseTime.sum / responseTime.count : 0,
      successRate: rate(copy.requests_success),
      errorRate: rate(copy.requests_error),
      timestamp: new Date().toISOString(),
    }
  }

  /**
   * Process-level introspection. Any value the platform cannot supply is 0.
   */
  snapshotSystem(): SystemMetrics {
    return {
      uptimeSeconds: this.safely(() => Number(process.hrtime.bigint() - this.startedAt) / 1e9),
      cpuPercent: this.safely(() => this.sampleCpuPercent()),
      memoryMB: this.safely(() => process.memoryUsage().rss / 1024 / 1024),
      threadCount: this.safely(() => readThreadCount()),
      timestamp: new Date().toISOString(),
    }
  }

  /**
   * Zero every counter and the response time accumulator.
   * Administrative use only.
   */
  reset(): void {
    this.state = createState()
    this.logger.warn('Application metrics reset')
  }

  // CPU time used since the previous sample, relative to wall time elapsed
  private sampleCpuPercent(): number {
    const now = process.hrtime.bigint()
    const usage = process.cpuUsage(this.cpuSample.usage)
    const elapsedMicros = Number(now - this.cpuSample.at) / 1000
    this.cpuSample = { usage: process.cpuUsage(), at: now }

    if (elapsedMicros <= 0) {
      return 0
    }

    return ((usage.user + usage.system) / elapsedMicros) * 100
  }

  private safely(read: () => number): number {
    try {
      const value = read()
      return Number.isFinite(value) ? value : 0
    } catch (error) {
      this.logger.debug(`System metric unavailable: ${String(error)}`)
      return 0
    }
  }
}

// Linux only; other platforms report 0
function readThreadCount(): number {
  if (process.platform !== 'linux') {
    return 0
  }

  const status = readFileSync('/proc/self/status', 'utf8')
  const match = /^Threads:\s+(\d+)$/m.exec(status)
  return match ? Number.parseInt(match[1], 10) : 0
}
