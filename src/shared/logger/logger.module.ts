import { DynamicModule, Global, Module } from '@nestjs/common'

import { AppLogger } from './logger.service'

/**
 * Logger Module
 *
 * Provides AppLogger application-wide. `main.ts` installs it as the Nest
 * logger so framework and service logs share one structured format.
 */
@Global()
@Module({})
export class LoggerModule {
  static forRoot(): DynamicModule {
    return {
      module: LoggerModule,
      providers: [AppLogger],
      exports: [AppLogger],
    }
  }
}
