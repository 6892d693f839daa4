import { Module } from '@nestjs/common';
import { AcquisitionModule } from '../acquisition/acquisition.module';
import { ControlController } from './control.controller';
import { ControlService } from './control.service';

@Module({
  imports: [AcquisitionModule],
  controllers: [ControlController],
  providers: [ControlService],
})
export class ControlModule {}
