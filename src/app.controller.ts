import { Controller, Get } from '@nestjs/common'
import { ConfigService } from '@nestjs/config'

import { QueueClient, QueueMode } from './shared/messaging'

export interface ServiceInfo {
  service: string | undefined
  version: string | undefined
  environment: string | undefined
  queueMode: QueueMode
  timestamp: string
}

/**
 * App Controller
 *
 * Root controller for basic service information.
 */
@Controller()
export class AppController {
  constructor(
    private readonly configService: ConfigService,
    private readonly queueClient: QueueClient
  ) {}

  /**
   * Identifies the running service and the queue mode it resolved at startup.
   */
  @Get()
  getInfo(): ServiceInfo {
    return {
      service: this.configService.get<string>('config.service.name'),
      version: this.configService.get<string>('config.service.version'),
      environment: this.configService.get<string>('config.app.env'),
      queueMode: this.queueClient.getMode(),
      timestamp: new Date().toISOString(),
    }
  }
}
