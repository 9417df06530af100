import { plainToInstance } from 'class-transformer'
import {
  IsBoolean,
  IsEnum,
  IsIn,
  IsInt,
  IsOptional,
  IsString,
  Max,
  Min,
  validateSync,
} from 'class-validator'

/**
 * Environment Variables Validation Schema
 *
 * The application refuses to start when a variable is present but malformed.
 * Queue credentials stay optional: without them the queue client runs disabled.
 */

enum Environment {
  Development = 'development',
  Production = 'production',
  Test = 'test',
  Staging = 'staging',
}

class EnvironmentVariables {
  @IsString()
  @IsOptional()
  SERVICE_NAME?: string

  @IsEnum(Environment)
  @IsOptional()
  NODE_ENV?: Environment = Environment.Development

  @IsInt()
  @IsOptional()
  PORT?: number = 3000

  @IsString()
  @IsOptional()
  API_PREFIX?: string = 'api'

  @IsString()
  @IsOptional()
  CORS_ORIGIN?: string

  // Database
  @IsBoolean()
  @IsOptional()
  DATABASE_ENABLED?: boolean

  @IsString()
  @IsOptional()
  DATABASE_URL?: string

  // Queue
  @IsBoolean()
  @IsOptional()
  QUEUE_ENABLED?: boolean

  @IsBoolean()
  @IsOptional()
  QUEUE_OFFLINE?: boolean

  @IsString()
  @IsOptional()
  QUEUE_ACCESS_KEY_ID?: string

  @IsString()
  @IsOptional()
  QUEUE_SECRET_ACCESS_KEY?: string

  @IsString()
  @IsOptional()
  QUEUE_REGION?: string

  @IsString()
  @IsOptional()
  QUEUE_ENDPOINT?: string

  @IsString()
  @IsOptional()
  QUEUE_PREFIX?: string

  @IsString()
  @IsOptional()
  QUEUE_DEFAULT_NAME?: string

  @IsInt()
  @Min(0)
  @Max(43_200)
  @IsOptional()
  QUEUE_VISIBILITY_TIMEOUT?: number

  @IsBoolean()
  @IsOptional()
  QUEUE_CONSUMER_ENABLED?: boolean

  @IsInt()
  @Min(1)
  @Max(10)
  @IsOptional()
  QUEUE_BATCH_SIZE?: number

  @IsInt()
  @Min(0)
  @Max(20)
  @IsOptional()
  QUEUE_WAIT_TIME_SECONDS?: number

  // At least 1ms, otherwise an idle consumer spins on empty polls
  @IsInt()
  @Min(1)
  @IsOptional()
  QUEUE_POLL_INTERVAL_MS?: number

  @IsInt()
  @Min(1)
  @IsOptional()
  QUEUE_ERROR_BACKOFF_MS?: number

  @IsInt()
  @Min(0)
  @IsOptional()
  QUEUE_SHUTDOWN_GRACE_MS?: number

  // Object storage
  @IsString()
  @IsOptional()
  STORAGE_BUCKET?: string

  @IsString()
  @IsOptional()
  STORAGE_ENDPOINT?: string

  @IsString()
  @IsOptional()
  STORAGE_REGION?: string

  @IsString()
  @IsOptional()
  STORAGE_ACCESS_KEY_ID?: string

  @IsString()
  @IsOptional()
  STORAGE_SECRET_ACCESS_KEY?: string

  // Metrics
  @IsBoolean()
  @IsOptional()
  METRICS_ENABLED?: boolean

  // Logging
  @IsIn(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'])
  @IsOptional()
  LOG_LEVEL?: string = 'info'

  @IsBoolean()
  @IsOptional()
  ENABLE_CONSOLE_LOGS?: boolean
}

/**
 * Validate environment variables
 *
 * @param config - Raw environment variables
 * @returns Validated configuration
 */
export function validate(config: Record<string, unknown>): EnvironmentVariables {
  const validatedConfig = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: true,
  })

  const errors = validateSync(validatedConfig, {
    skipMissingProperties: false,
  })

  if (errors.length > 0) {
    throw new Error(errors.toString())
  }

  return validatedConfig
}
