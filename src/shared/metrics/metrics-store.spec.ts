import { DEFAULT_COUNTERS, MetricsStore } from './metrics-store'

describe('MetricsStore', () => {
  let store: MetricsStore

  beforeEach(() => {
    store = new MetricsStore()
  })

  describe('increment', () => {
    it('should report every default counter at zero', () => {
      const { counters } = store.snapshotApplication()

      expect(Object.keys(counters)).toEqual([...DEFAULT_COUNTERS])
      expect(Object.values(counters).every((value) => value === 0)).toBe(true)
    })

    it('should create unseen counters', () => {
      store.increment('cache_hits', 3)
      store.increment('cache_hits')

      expect(store.get('cache_hits')).toBe(4)
      expect(store.snapshotApplication().counters.cache_hits).toBe(4)
    })

    it.each([-1, 1.5, Number.NaN, Number.POSITIVE_INFINITY])(
      'should reject a delta of %p',
      (delta) => {
        expect(() => store.increment('requests_total', delta)).toThrow(RangeError)
        expect(store.get('requests_total')).toBe(0)
      }
    )

    it('should accept a zero delta', () => {
      store.increment('requests_total', 0)

      expect(store.get('requests_total')).toBe(0)
    })

    it('should not lose updates from interleaved callers', async () => {
      const worker = async (index: number): Promise<void> => {
        for (let i = 0; i < 100; i += 1) {
          store.increment('requests_total')
          store.increment(index % 2 === 0 ? 'requests_success' : 'requests_error')
          store.recordDuration(0.001)
          await Promise.resolve()
        }
      }

      await Promise.all(Array.from({ length: 50 }, (_, index) => worker(index)))

      const snapshot = store.snapshotApplication()
      expect(snapshot.counters.requests_total).toBe(5000)
      expect(snapshot.counters.requests_success).toBe(2500)
      expect(snapshot.counters.requests_error).toBe(2500)
      expect(snapshot.responseTimeCount).toBe(5000)
    })
  })

  describe('snapshotApplication', () => {
    it('should derive rates from the request counters', () => {
      store.increment('requests_total', 4)
      store.increment('requests_success', 3)
      store.increment('requests_error', 1)

      const snapshot = store.snapshotApplication()

      expect(snapshot.successRate).toBe(75)
      expect(snapshot.errorRate).toBe(25)
    })

    it('should report zero rates before any request', () => {
      const snapshot = store.snapshotApplication()

      expect(snapshot.successRate).toBe(0)
      expect(snapshot.errorRate).toBe(0)
      expect(snapshot.avgResponseTime).toBe(0)
    })

    it('should average recorded durations', () => {
      store.recordDuration(0.5)
      store.recordDuration(1.5)

      const snapshot = store.snapshotApplication()

      expect(snapshot.responseTimeSum).toBe(2)
      expect(snapshot.responseTimeCount).toBe(2)
      expect(snapshot.avgResponseTime).toBe(1)
    })

    it('should hand out copies', () => {
      const snapshot = store.snapshotApplication()
      snapshot.counters.requests_total = 99

      expect(store.get('requests_total')).toBe(0)
    })
  })

  describe('recordDuration', () => {
    it.each([-0.1, Number.NaN, Number.POSITIVE_INFINITY])('should reject %p', (seconds) => {
      expect(() => store.recordDuration(seconds)).toThrow(RangeError)
    })
  })

  describe('snapshotSystem', () => {
    it('should report finite non-negative values', () => {
      const snapshot = store.snapshotSystem()

      for (const value of [
        snapshot.uptimeSeconds,
        snapshot.cpuPercent,
        snapshot.memoryMB,
        snapshot.threadCount,
      ]) {
        expect(Number.isFinite(value)).toBe(true)
        expect(value).toBeGreaterThanOrEqual(0)
      }
      expect(snapshot.memoryMB).toBeGreaterThan(0)
    })
  })

  describe('reset', () => {
    it('should zero counters and durations', () => {
      store.increment('requests_total', 5)
      store.increment('custom_counter')
      store.recordDuration(2)

      store.reset()

      const snapshot = store.snapshotApplication()
      expect(snapshot.counters).toEqual(
        Object.fromEntries(DEFAULT_COUNTERS.map((name) => [name, 0]))
      )
      expect(snapshot.responseTimeCount).toBe(0)
      expect(snapshot.responseTimeSum).toBe(0)
    })
  })
})
