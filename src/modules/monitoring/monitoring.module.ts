import { Module } from '@nestjs/common'

import { MonitoringController } from './controllers'

@Module({
  controllers: [MonitoringController],
})
export class MonitoringModule {}
