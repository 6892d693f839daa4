import { Controller, Get } from '@nestjs/common';
import { PollCoordinatorService } from '../acquisition/coordinator/poll-coordinator.service';
import type { PollerState } from '../acquisition/coordinator/coordinator.types';

export interface HealthResponse {
  status: 'ok';
  timestamp: string;
  poller: PollerState;
}

@Controller('health')
export class HealthController {
  constructor(private readonly coordinator: PollCoordinatorService) {}

  @Get()
  check(): HealthResponse {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      poller: this.coordinator.getState(),
    };
  }
}
