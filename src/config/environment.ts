import { registerAs } from '@nestjs/config'

const toInt = (value: string | undefined, fallback: number): number => {
  const parsed = Number.parseInt(value ?? '', 10)
  return Number.isNaN(parsed) ? fallback : parsed
}

/**
 * Environment Configuration
 *
 * Centralizes all environment variables for the task tracker.
 * Read once at startup; services receive the resolved values.
 */
export default registerAs('config', () => ({
  service: {
    name: process.env.SERVICE_NAME || 'task-tracker',
    version: process.env.npm_package_version || '0.0.0',
  },

  app: {
    env: process.env.NODE_ENV || 'development',
    port: toInt(process.env.PORT, 3000),
    apiPrefix: process.env.API_PREFIX ?? 'api',
  },

  cors: {
    origin: process.env.CORS_ORIGIN || '*',
  },

  database: {
    url: process.env.DATABASE_URL,
    enabled: process.env.DATABASE_ENABLED === 'true',
  },

  // Managed message queue (SQS-compatible API)
  queue: {
    enabled: process.env.QUEUE_ENABLED !== 'false',
    // Offline mode simulates every queue call without touching the network
    offline: process.env.QUEUE_OFFLINE === 'true',
    accessKeyId: process.env.QUEUE_ACCESS_KEY_ID,
    secretAccessKey: process.env.QUEUE_SECRET_ACCESS_KEY,
    region: process.env.QUEUE_REGION || 'ru-central1',
    endpoint: process.env.QUEUE_ENDPOINT,
    prefix: process.env.QUEUE_PREFIX || '',
    defaultQueue: process.env.QUEUE_DEFAULT_NAME || 'task-tracker-queue',
    visibilityTimeout: toInt(process.env.QUEUE_VISIBILITY_TIMEOUT, 30),
    consumer: {
      enabled: process.env.QUEUE_CONSUMER_ENABLED !== 'false',
      batchSize: toInt(process.env.QUEUE_BATCH_SIZE, 10),
      waitTimeSeconds: toInt(process.env.QUEUE_WAIT_TIME_SECONDS, 20),
      pollIntervalMs: toInt(process.env.QUEUE_POLL_INTERVAL_MS, 1000),
      errorBackoffMs: toInt(process.env.QUEUE_ERROR_BACKOFF_MS, 5000),
      shutdownGraceMs: toInt(process.env.QUEUE_SHUTDOWN_GRACE_MS, 10_000),
    },
  },

  // Object storage for task attachments (S3-compatible API)
  storage: {
    bucket: process.env.STORAGE_BUCKET,
    endpoint: process.env.STORAGE_ENDPOINT,
    region: process.env.STORAGE_REGION || 'ru-central1',
    accessKeyId: process.env.STORAGE_ACCESS_KEY_ID,
    secretAccessKey: process.env.STORAGE_SECRET_ACCESS_KEY,
  },

  metrics: {
    enabled: process.env.METRICS_ENABLED !== 'false',
  },

  logging: {
    level: process.env.LOG_LEVEL || 'info',
    enableConsole: process.env.ENABLE_CONSOLE_LOGS !== 'false',
  },
}))
