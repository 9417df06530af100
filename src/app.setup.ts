import type { INestApplication } from '@nestjs/common'
import { ConfigService } from '@nestjs/config'

import { GlobalExceptionFilter } from './shared/filters'
import { RequestIdInterceptor, ResponseTimeInterceptor } from './shared/interceptors'
import { MetricsMiddleware } from './shared/metrics'
import { GlobalValidationPipe } from './shared/pipes'

/**
 * Apply the HTTP conventions shared by `main.ts` and the e2e suite:
 * route prefix, CORS, request metrics, validation, error shape and
 * request interceptors.
 */
export function configureApp(app: INestApplication): void {
  const configService = app.get(ConfigService)
  const apiPrefix = configService.get<string>('config.app.apiPrefix') ?? 'api'

  // Health and Prometheus endpoints stay at the root for probes and scrapers
  if (apiPrefix) {
    app.setGlobalPrefix(apiPrefix, {
      exclude: ['health', 'health/live', 'health/ready', 'metrics'],
    })
  }

  app.enableCors({
    origin: configService.get<string>('config.cors.origin') ?? '*',
    methods: ['GET', 'POST', 'PUT', 'DELETE', 'PATCH', 'OPTIONS'],
    credentials: true,
  })

  // Ahead of routing, so 404s and requests rejected before a handler count
  if (configService.get<boolean>('config.metrics.enabled') ?? true) {
    const metrics = app.get(MetricsMiddleware)
    app.use(metrics.use.bind(metrics))
  }

  app.useGlobalPipes(new GlobalValidationPipe())
  app.useGlobalFilters(new GlobalExceptionFilter())

  // Order matters: the request id is set before anything else runs
  app.useGlobalInterceptors(new RequestIdInterceptor(), new ResponseTimeInterceptor())
}
