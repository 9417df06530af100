import { Controller, Get, Header, Res } from '@nestjs/common'
import type { Response } from 'express'

import { MetricsService } from './metrics.service'

/**
 * Prometheus scrape endpoint, served outside the API prefix.
 */
@Controller('metrics')
export class MetricsController {
  constructor(private readonly metricsService: MetricsService) {}

  @Get()
  @Header('Cache-Control', 'no-store')
  async scrape(@Res() response: Response): Promise<void> {
    const body = await this.metricsService.render()
    response.setHeader('Content-Type', this.metricsService.contentType)
    response.send(body)
  }
}
