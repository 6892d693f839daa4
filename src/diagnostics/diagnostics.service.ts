import { Inject, Injectable } from '@nestjs/common';
import { PollCoordinatorService } from '../acquisition/coordinator/poll-coordinator.service';
import { deriveDeviceIdentity } from '../acquisition/device-identity';
import { DEVICE_CONFIG, DeviceConfig } from '../config/device.config';
import { redact } from './redact';

/**
 * Each section is already redacted, hence untyped.
 */
export interface DiagnosticsReport {
  config: unknown;
  coordinator: unknown;
  snapshot: unknown;
}

/**
 * Builds the redacted diagnostics export: resolved configuration,
 * coordinator status and the current snapshot.
 */
@Injectable()
export class DiagnosticsService {
  constructor(
    private readonly coordinator: PollCoordinatorService,
    @Inject(DEVICE_CONFIG) private readonly config: DeviceConfig,
  ) {}

  buildReport(): DiagnosticsReport {
    const snapshot = this.coordinator.getSnapshot();
    const identity = deriveDeviceIdentity(snapshot, this.config.baseUrl);
    const isLeader = identity.role === 'leader';

    return {
      config: redact({
        baseUrl: this.config.baseUrl,
        username: this.config.credentials.username,
        password: this.config.credentials.password,
        requestTimeoutMs: this.config.requestTimeoutMs,
        retry: this.config.retry,
        cacheTtlMs: this.config.cacheTtlMs,
      }),
      coordinator: redact({
        deviceId: identity.deviceId,
        deviceName: identity.name,
        firmwareVersion: identity.firmwareVersion ?? null,
        isLeader,
        state: this.coordinator.getState(),
        lastSuccessAt: this.coordinator.getLastSuccessAt(),
        // cluster identity only exists for leaders
        ...(isLeader
          ? { clusterId: identity.clusterId, clusterName: identity.clusterName }
          : {}),
      }),
      snapshot: snapshot ? redact(snapshot) : null,
    };
  }
}
