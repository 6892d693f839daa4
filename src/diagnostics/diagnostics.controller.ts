import { Controller, Get, Logger } from '@nestjs/common';
import { DiagnosticsReport, DiagnosticsService } from './diagnostics.service';

@Controller('diagnostics')
export class DiagnosticsController {
  private readonly logger = new Logger(DiagnosticsController.name);

  constructor(private readonly diagnosticsService: DiagnosticsService) {}

  /**
   * Redacted dump of configuration, coordinator status and snapshot,
   * safe to attach to a bug report.
   */
  @Get()
  export(): DiagnosticsReport {
    this.logger.log('Diagnostics export requested');
    return this.diagnosticsService.buildReport();
  }
}
