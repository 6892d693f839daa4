import { Injectable, Logger } from '@nestjs/common';
import {
  ConsoleReply,
  DeviceHttpClient,
} from '../acquisition/client/device-http.client';
import { RetryingDeviceClient } from '../acquisition/client/retrying-device.client';
import { PollCoordinatorService } from '../acquisition/coordinator/poll-coordinator.service';
import {
  InvalidRequestError,
  PreconditionFailedError,
} from '../acquisition/errors/device-api.error';
import { DEVICE_ENDPOINTS } from '../acquisition/interfaces/endpoint.interface';
import { readPath } from '../acquisition/normalizer/field-resolution';
import { CONTROL_ACTIONS, ControlActionName } from './control-actions';
import { findWritableParam, renderParamValue } from './writable-params';

export interface ControlResult {
  action: ControlActionName;
  commands: string[];
  replies: ConsoleReply[];
}

export interface ParamWriteResult {
  name: string;
  value: string;
}

export const NOT_LOCAL_MODE_MESSAGE =
  'Cannot set schedule: device is not in local mode. ' +
  'Enable local mode first to prevent remote overrides.';

/**
 * ControlService
 *
 * Executes control actions and parameter writes against the device.
 *
 * Flow for an action:
 * 1. Validate the body and render console commands (no I/O)
 * 2. Check local mode, from the current snapshot when there is one,
 *    otherwise from a fresh schedule document (reboot skips this)
 * 3. Send the commands in order; the first failure aborts the rest
 * 4. Ask the coordinator for a refresh so the snapshot reflects the change
 */
@Injectable()
export class ControlService {
  private readonly logger = new Logger(ControlService.name);

  constructor(
    private readonly http: DeviceHttpClient,
    private readonly client: RetryingDeviceClient,
    private readonly coordinator: PollCoordinatorService,
  ) {}

  async execute(name: ControlActionName, body: unknown): Promise<ControlResult> {
    const action = CONTROL_ACTIONS[name];
    const commands = action.render(body);

    if (action.requiresLocalMode) {
      await this.assertLocalMode();
    }

    const replies: ConsoleReply[] = [];
    for (const command of commands) {
      this.logger.log(`Sending console command: ${command}`);
      replies.push(await this.http.sendConsoleCommand(command));
    }

    this.requestRefresh();
    return { action: name, commands, replies };
  }

  /**
   * Write a device parameter. Not gated by local mode: turning local mode on
   * is itself a parameter write.
   */
  async writeParam(name: string, body: unknown): Promise<ParamWriteResult> {
    const param = findWritableParam(name);
    if (!param) {
      throw new InvalidRequestError(`Parameter ${name} is not writable`);
    }
    const value = renderParamValue(param, body);

    this.logger.log(`Writing parameter ${name}=${value}`);
    await this.http.writeParam(name, value);

    this.requestRefresh();
    return { name, value };
  }

  private async assertLocalMode(): Promise<void> {
    const snapshot = this.coordinator.getSnapshot();
    const localMode = snapshot
      ? snapshot.schedule.localMode
      : await this.fetchLocalMode();
    if (!localMode) {
      throw new PreconditionFailedError(
        NOT_LOCAL_MODE_MESSAGE,
        DEVICE_ENDPOINTS.schedule.path,
      );
    }
  }

  private async fetchLocalMode(): Promise<boolean> {
    const { data } = await this.client.fetchWithRetry(
      DEVICE_ENDPOINTS.schedule.path,
    );
    return readPath(data, ['local_mode']) === true;
  }

  private requestRefresh(): void {
    this.coordinator.refresh().catch((error: unknown) => {
      this.logger.warn(
        `Refresh after control action failed: ${error instanceof Error ? error.message : String(error)}`,
      );
    });
  }
}
