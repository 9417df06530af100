import { Injectable, NestMiddleware } from '@nestjs/common'
import type { NextFunction, Request, Response } from 'express'

import { MetricsStore } from './metrics-store'
import { MetricsService } from './metrics.service'

// Label for requests no route matched, keeps 404 paths out of label values
const UNMATCHED_ROUTE = 'unmatched'

/**
 * Metrics Middleware
 *
 * Counts every HTTP request as exactly one success (2xx/3xx) or error once
 * the response is written. Installed with `app.use` ahead of routing, so
 * unknown paths and requests rejected before a handler count too.
 */
@Injectable()
export class MetricsMiddleware implements NestMiddleware<Request, Response> {
  constructor(
    private readonly store: MetricsStore,
    private readonly metricsService: MetricsService
  ) {}

  use(request: Request, response: Response, next: NextFunction): void {
    const startedAt = process.hrtime.bigint()

    response.once('finish', () => {
      const status = response.statusCode
      const seconds = Number(process.hrtime.bigint() - startedAt) / 1e9
      const route: unknown = request.route?.path

      this.store.increment('requests_total')
      this.store.increment(status >= 200 && status < 400 ? 'requests_success' : 'requests_error')
      this.store.recordDuration(seconds)
      this.metricsService.observeRequest(
        request.method,
        typeof route === 'string' ? route : UNMATCHED_ROUTE,
        status,
        seconds
      )
    })

    next()
  }
}
