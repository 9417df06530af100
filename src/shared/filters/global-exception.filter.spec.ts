import { BadRequestException, NotFoundException } from '@nestjs/common'
import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host'

import { QueueNotConfiguredError, QueueTransportError } from '../messaging/messaging.errors'
import { GlobalExceptionFilter } from './global-exception.filter'

describe('GlobalExceptionFilter', () => {
  const filter = new GlobalExceptionFilter()

  const respond = (exception: unknown): { status: number; body: unknown } => {
    const response = {
      status: jest.fn().mockReturnThis(),
      json: jest.fn(),
    }
    const host = new ExecutionContextHost([{ method: 'POST', url: '/api/queue/messages' }, response])

    filter.catch(exception, host)

    return {
      status: response.status.mock.calls[0][0],
      body: response.json.mock.calls[0][0],
    }
  }

  it('should map a missing queue configuration to 503', () => {
    const { status, body } = respond(new QueueNotConfiguredError())

    expect(status).toBe(503)
    expect(body).toMatchObject({
      statusCode: 503,
      message: 'Message queue is not configured',
      error: 'Service Unavailable',
      path: '/api/queue/messages',
    })
  })

  it('should map queue backend failures to 502', () => {
    const { status, body } = respond(
      new QueueTransportError('send', 'tasks', { cause: new Error('connection reset') })
    )

    expect(status).toBe(502)
    expect(body).toMatchObject({
      statusCode: 502,
      message: 'Queue send failed for tasks: connection reset',
      error: 'Bad Gateway',
    })
  })

  it('should keep the shape of HTTP exceptions', () => {
    const { status, body } = respond(new NotFoundException('Task with ID 1 not found'))

    expect(status).toBe(404)
    expect(body).toMatchObject({
      statusCode: 404,
      message: 'Task with ID 1 not found',
      error: 'Not Found',
    })
  })

  it('should carry validation details through', () => {
    const errors = [{ field: 'title', constraints: ['title should not be empty'] }]

    const { body } = respond(new BadRequestException({ message: 'Validation failed', errors }))

    expect(body).toMatchObject({ statusCode: 400, message: 'Validation failed', errors })
  })

  it('should hide unexpected errors behind a 500', () => {
    const { status, body } = respond(new Error('secret internals'))

    expect(status).toBe(500)
    expect(body).toMatchObject({ statusCode: 500, message: 'Internal server error' })
  })
})
