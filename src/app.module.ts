import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { AcquisitionModule } from './acquisition';
import { validateEnv } from './config/env.validation';
import { ControlModule } from './control/control.module';
import { DiagnosticsModule } from './diagnostics/diagnostics.module';
import { HealthModule } from './health/health.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      validate: validateEnv,
    }),
    AcquisitionModule,
    ControlModule,
    DiagnosticsModule,
    HealthModule,
  ],
})
export class AppModule {}
