import { Controller, Get, Logger, Req, Res } from '@nestjs/common';
import type { Request, Response } from 'express';
import { PollCoordinatorService } from './coordinator/poll-coordinator.service';
import type { CoordinatorEvent, PollerState } from './coordinator/coordinator.types';
import type { CanonicalSnapshot } from './dto/canonical-snapshot.dto';

export interface SnapshotResponse {
  state: PollerState;
  lastSuccessAt: string | null;
  snapshot: CanonicalSnapshot | null;
}

/**
 * SnapshotController
 *
 * Pull and push access to the current canonical snapshot.
 *
 *   GET /snapshot         current snapshot (null until the first publication)
 *   GET /snapshot/stream  Server-Sent Events, one event per publication
 */
@Controller('snapshot')
export class SnapshotController {
  private readonly logger = new Logger(SnapshotController.name);

  constructor(private readonly coordinator: PollCoordinatorService) {}

  @Get()
  current(): SnapshotResponse {
    return {
      state: this.coordinator.getState(),
      lastSuccessAt: this.coordinator.getLastSuccessAt(),
      snapshot: this.coordinator.getSnapshot(),
    };
  }

  @Get('stream')
  stream(@Req() req: Request, @Res() res: Response): void {
    res.setHeader('Content-Type', 'text/event-stream');
    res.setHeader('Cache-Control', 'no-cache');
    res.setHeader('Connection', 'keep-alive');
    res.setHeader('X-Accel-Buffering', 'no');
    res.flushHeaders();

    const write = (event: CoordinatorEvent): void => {
      res.write(`data: ${JSON.stringify(event)}\n\n`);
    };

    const current = this.coordinator.getSnapshot();
    if (current) {
      write({
        type: 'snapshot',
        state: this.coordinator.getState() === 'degraded' ? 'degraded' : 'published',
        snapshot: current,
      });
    }

    const unsubscribe = this.coordinator.subscribe(write);
    this.logger.debug('Snapshot stream opened');

    req.on('close', () => {
      unsubscribe();
      res.end();
      this.logger.debug('Snapshot stream closed');
    });
  }
}
