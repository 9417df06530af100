import { CallHandler, ExecutionContext, Injectable, NestInterceptor } from '@nestjs/common'
import type { Request, Response } from 'express'
import { randomUUID } from 'node:crypto'
import { Observable } from 'rxjs'

export const REQUEST_ID_HEADER = 'X-Request-Id'

/**
 * Request ID Interceptor
 *
 * Reuses the caller's `X-Request-Id` or generates one, and echoes it back
 * so a request can be followed through logs.
 */
@Injectable()
export class RequestIdInterceptor implements NestInterceptor {
  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    if (context.getType() !== 'http') {
      return next.handle()
    }

    const http = context.switchToHttp()
    const request = http.getRequest<Request>()
    const response = http.getResponse<Response>()

    const incoming = request.header(REQUEST_ID_HEADER)
    const requestId = incoming && incoming.length <= 128 ? incoming : randomUUID()

    response.setHeader(REQUEST_ID_HEADER, requestId)
    return next.handle()
  }
}
