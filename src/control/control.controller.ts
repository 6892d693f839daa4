import {
  Body,
  Controller,
  HttpCode,
  HttpStatus,
  Logger,
  NotFoundException,
  Param,
  Post,
  Put,
} from '@nestjs/common';
import { rethrowAsHttp } from '../acquisition/errors/http-error.mapper';
import { isControlActionName } from './control-actions';
import { ControlResult, ControlService, ParamWriteResult } from './control.service';
import { findWritableParam } from './writable-params';

/**
 * ControlController
 *
 * Usage:
 *   POST /control/grid_charge        {"setpoint": 3000, "maxSoc": 90}
 *   POST /control/schedule_replace   {"entries": [{"type": 3, "from": "..."}]}
 *   PUT  /control/params/ledstrip_mode {"value": "soc"}
 *
 * Errors: 400 invalid body, 412 local mode off, 401/429 auth, 502 device
 * rejected the command, 503 device unreachable.
 */
@Controller('control')
export class ControlController {
  private readonly logger = new Logger(ControlController.name);

  constructor(private readonly controlService: ControlService) {}

  @Post(':action')
  @HttpCode(HttpStatus.OK)
  async runAction(
    @Param('action') action: string,
    @Body() body: unknown,
  ): Promise<ControlResult> {
    if (!isControlActionName(action)) {
      throw new NotFoundException(`Unknown control action: ${action}`);
    }
    try {
      return await this.controlService.execute(action, body);
    } catch (error) {
      this.logger.warn(
        `Control action ${action} failed: ${error instanceof Error ? error.message : String(error)}`,
      );
      return rethrowAsHttp(error);
    }
  }

  @Put('params/:name')
  async writeParam(
    @Param('name') name: string,
    @Body() body: unknown,
  ): Promise<ParamWriteResult> {
    if (!findWritableParam(name)) {
      throw new NotFoundException(`Unknown writable parameter: ${name}`);
    }
    try {
      return await this.controlService.writeParam(name, body);
    } catch (error) {
      this.logger.warn(
        `Parameter write ${name} failed: ${error instanceof Error ? error.message : String(error)}`,
      );
      return rethrowAsHttp(error);
    }
  }
}
