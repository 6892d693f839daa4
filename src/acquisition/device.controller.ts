import {
  BadRequestException,
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Inject,
  Logger,
  Post,
} from '@nestjs/common';
import { z } from 'zod';
import { DEVICE_CONFIG, DeviceConfig } from '../config/device.config';
import { PollCoordinatorService } from './coordinator/poll-coordinator.service';
import type { PollerState } from './coordinator/coordinator.types';
import { deriveDeviceIdentity, DeviceIdentity } from './device-identity';
import { rethrowAsHttp } from './errors/http-error.mapper';

export const ReauthenticateSchema = z.object({
  username: z.string().trim().min(1).default('admin'),
  password: z.string().min(1, 'password is required'),
});

export interface DeviceStatusResponse {
  identity: DeviceIdentity;
  state: PollerState;
  lastSuccessAt: string | null;
}

@Controller('device')
export class DeviceController {
  private readonly logger = new Logger(DeviceController.name);

  constructor(
    private readonly coordinator: PollCoordinatorService,
    @Inject(DEVICE_CONFIG) private readonly config: DeviceConfig,
  ) {}

  @Get()
  status(): DeviceStatusResponse {
    return {
      identity: deriveDeviceIdentity(
        this.coordinator.getSnapshot(),
        this.config.baseUrl,
      ),
      state: this.coordinator.getState(),
      lastSuccessAt: this.coordinator.getLastSuccessAt(),
    };
  }

  /**
   * Supply new credentials after the device rejected the old ones.
   * Answers 401 when the device still refuses them.
   */
  @Post('reauthenticate')
  @HttpCode(HttpStatus.OK)
  async reauthenticate(@Body() body: unknown): Promise<DeviceStatusResponse> {
    const parsed = ReauthenticateSchema.safeParse(body ?? {});
    if (!parsed.success) {
      throw new BadRequestException(
        parsed.error.issues.map((issue) => issue.message).join('; '),
      );
    }

    this.logger.log(`Re-authentication requested for user ${parsed.data.username}`);
    try {
      await this.coordinator.reauthenticate(parsed.data);
    } catch (error) {
      this.logger.warn(
        `Re-authentication failed: ${error instanceof Error ? error.message : String(error)}`,
      );
      rethrowAsHttp(error);
    }
    return this.status();
  }
}
