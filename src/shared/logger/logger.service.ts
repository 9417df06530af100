import { Injectable, LoggerService } from '@nestjs/common'
import { ConfigService } from '@nestjs/config'
import pino, { type Logger, type LevelWithSilent } from 'pino'

const LEVELS: readonly LevelWithSilent[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']

const toLevel = (value: string | undefined): LevelWithSilent =>
  LEVELS.find((level) => level === value) ?? 'info'

/**
 * Application Logger
 *
 * Structured JSON logging through pino, plugged into Nest so every
 * `new Logger(Context.name)` in the codebase ends up here.
 */
@Injectable()
export class AppLogger implements LoggerService {
  private readonly logger: Logger
  private context?: string

  constructor(configService: ConfigService) {
    this.logger = pino({
      level: toLevel(configService.get<string>('config.logging.level')),
      enabled: configService.get<boolean>('config.logging.enableConsole') ?? true,
      base: {
        service: configService.get<string>('config.service.name') ?? 'task-tracker',
      },
      timestamp: pino.stdTimeFunctions.isoTime,
      formatters: {
        level: (label) => ({ level: label }),
      },
    })
  }

  setContext(context: string): void {
    this.context = context
  }

  log(message: unknown, ...optionalParams: unknown[]): void {
    this.write('info', message, optionalParams)
  }

  error(message: unknown, ...optionalParams: unknown[]): void {
    this.write('error', message, optionalParams)
  }

  warn(message: unknown, ...optionalParams: unknown[]): void {
    this.write('warn', message, optionalParams)
  }

  debug(message: unknown, ...optionalParams: unknown[]): void {
    this.write('debug', message, optionalParams)
  }

  verbose(message: unknown, ...optionalParams: unknown[]): void {
    this.write('trace', message, optionalParams)
  }

  fatal(message: unknown, ...optionalParams: unknown[]): void {
    this.write('fatal', message, optionalParams)
  }

  /**
   * Nest passes the context as the last string parameter;
   * anything before it is extra detail (an error or its stack).
   */
  private write(
    level: 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal',
    message: unknown,
    params: unknown[]
  ): void {
    const last = params.at(-1)
    const context = typeof last === 'string' && params.length > 0 ? last : this.context
    const details = typeof last === 'string' ? params.slice(0, -1) : params

    const bindings: Record<string, unknown> = { context }
    const error = details.find((detail): detail is Error => detail instanceof Error)
    if (error) {
      bindings.err = error
    } else if (details.length > 0) {
      bindings.details = details
    }

    if (message instanceof Error) {
      this.logger[level]({ ...bindings, err: message }, message.message)
      return
    }

    this.logger[level](bindings, typeof message === 'string' ? message : JSON.stringify(message))
  }
}
