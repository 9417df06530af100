import { CallHandler, ExecutionContext, Injectable, NestInterceptor } from '@nestjs/common'
import type { Response } from 'express'
import { Observable, tap } from 'rxjs'

export const RESPONSE_TIME_HEADER = 'X-Response-Time'

/**
 * Response Time Interceptor
 *
 * Reports handler time in seconds in the `X-Response-Time` header.
 */
@Injectable()
export class ResponseTimeInterceptor implements NestInterceptor {
  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    if (context.getType() !== 'http') {
      return next.handle()
    }

    const response = context.switchToHttp().getResponse<Response>()
    const startedAt = process.hrtime.bigint()

    const stamp = (): void => {
      if (!response.headersSent) {
        const elapsed = Number(process.hrtime.bigint() - startedAt) / 1e9
        response.setHeader(RESPONSE_TIME_HEADER, elapsed.toFixed(6))
      }
    }

    return next.handle().pipe(tap({ next: stamp, error: stamp }))
  }
}
