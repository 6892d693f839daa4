import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { buildDeviceConfig, DEVICE_CONFIG } from '../config/device.config';
import type { Env } from '../config/env.validation';
import { DeviceHttpClient } from './client/device-http.client';
import { RetryingDeviceClient } from './client/retrying-device.client';
import { PollCoordinatorService } from './coordinator/poll-coordinator.service';
import { DeviceController } from './device.controller';
import { SnapshotNormalizer } from './normalizer/snapshot.normalizer';
import { SnapshotController } from './snapshot.controller';

/**
 * AcquisitionModule
 *
 * Everything between the device's local HTTP API and the canonical snapshot.
 *
 * Components:
 * - DeviceHttpClient: one authenticated request, typed failures
 * - RetryingDeviceClient: backoff and per-endpoint stale cache
 * - SnapshotNormalizer: raw documents -> CanonicalSnapshot
 * - PollCoordinatorService: 10 s poll loop, publication, re-auth
 * - SnapshotController / DeviceController: HTTP surface
 */
@Module({
  controllers: [SnapshotController, DeviceController],
  providers: [
    {
      provide: DEVICE_CONFIG,
      useFactory: (configService: ConfigService<Env, true>) =>
        buildDeviceConfig(configService),
      inject: [ConfigService],
    },
    DeviceHttpClient,
    RetryingDeviceClient,
    SnapshotNormalizer,
    PollCoordinatorService,
  ],
  exports: [
    DEVICE_CONFIG,
    DeviceHttpClient,
    RetryingDeviceClient,
    PollCoordinatorService,
  ],
})
export class AcquisitionModule {}
