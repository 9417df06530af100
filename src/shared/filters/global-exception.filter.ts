import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common'
import type { Request, Response } from 'express'

import { QueueNotConfiguredError, QueueTransportError } from '../messaging/messaging.errors'

interface ErrorBody {
  statusCode: number
  message: string | string[]
  error: string
  [key: string]: unknown
}

/**
 * Global Exception Filter
 *
 * Gives every error response the same shape:
 * `{ statusCode, message, error, timestamp, path }` plus any extra fields the
 * exception carried (validation errors, for instance).
 *
 * Queue failures map to 503 (not configured) and 502 (backend failed).
 */
@Catch()
export class GlobalExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(GlobalExceptionFilter.name)

  catch(exception: unknown, host: ArgumentsHost): void {
    const http = host.switchToHttp()
    const request = http.getRequest<Request>()
    const response = http.getResponse<Response>()

    const body = this.toBody(exception)

    if (body.statusCode >= HttpStatus.INTERNAL_SERVER_ERROR) {
      this.logger.error(`${request.method} ${request.url} failed`, exception)
    }

    response.status(body.statusCode).json({
      ...body,
      timestamp: new Date().toISOString(),
      path: request.url,
    })
  }

  private toBody(exception: unknown): ErrorBody {
    if (exception instanceof HttpException) {
      const statusCode = exception.getStatus()
      const payload = exception.getResponse()

      if (typeof payload === 'string') {
        return { statusCode, message: payload, error: exception.name }
      }

      return {
        error: exception.name,
        message: exception.message,
        ...payload,
        statusCode,
      }
    }

    if (exception instanceof QueueNotConfiguredError) {
      return {
        statusCode: HttpStatus.SERVICE_UNAVAILABLE,
        message: exception.message,
        error: 'Service Unavailable',
      }
    }

    if (exception instanceof QueueTransportError) {
      return {
        statusCode: HttpStatus.BAD_GATEWAY,
        message: exception.message,
        error: 'Bad Gateway',
      }
    }

    return {
      statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
      message: 'Internal server error',
      error: 'Internal Server Error',
    }
  }
}
