import 'reflect-metadata'

import { ConfigService } from '@nestjs/config'
import { NestFactory } from '@nestjs/core'

import { AppModule } from './app.module'
import { configureApp } from './app.setup'
import { AppLogger } from './shared/logger'

/**
 * Bootstrap the task tracker
 *
 * Setup process:
 * 1. Create NestJS application
 * 2. Install the structured logger
 * 3. Register global middleware (validation, error handling, interceptors)
 * 4. Enable graceful shutdown, which stops the queue consumer
 * 5. Start listening on configured port
 */
async function bootstrap(): Promise<void> {
  const app = await NestFactory.create(AppModule, {
    bufferLogs: true,
  })

  const configService = app.get(ConfigService)
  const port = configService.get<number>('config.app.port') ?? 3000
  const apiPrefix = configService.get<string>('config.app.apiPrefix') ?? 'api'
  const serviceName = configService.get<string>('config.service.name')
  const serviceVersion = configService.get<string>('config.service.version')

  const logger = app.get(AppLogger)
  app.useLogger(logger)

  process.on('unhandledRejection', (reason) => {
    logger.error('Unhandled rejection', reason, 'Bootstrap')
  })

  configureApp(app)

  // SIGTERM/SIGINT run OnApplicationShutdown hooks before the process exits
  app.enableShutdownHooks()

  await app.listen(port)

  const baseUrl = `http://localhost:${port}`
  const fullUrl = apiPrefix ? `${baseUrl}/${apiPrefix}` : baseUrl
  logger.log(`${serviceName} v${serviceVersion} is running on: ${fullUrl}`, 'Bootstrap')
  logger.log(`Metrics available at: ${baseUrl}/metrics`, 'Bootstrap')
  logger.log(`Health check available at: ${baseUrl}/health`, 'Bootstrap')
}

bootstrap().catch((error: unknown) => {
  process.stderr.write(`Failed to start application: ${String(error)}\n`)
  process.exitCode = 1
})
