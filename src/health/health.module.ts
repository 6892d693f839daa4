import { Module } from '@nestjs/common';
import { AcquisitionModule } from '../acquisition/acquisition.module';
import { HealthController } from './health.controller';

@Module({
  imports: [AcquisitionModule],
  controllers: [HealthController],
})
export class HealthModule {}
