import { Body, Controller, Get, HttpCode, Logger, Post, Put } from '@nestjs/common';
import { BufferTagSession, ScanOrchestratorService } from '@core/scan';
import { ScanDto, SetScanModeDto } from '../dto/building.dto';

/**
 * Scan mode and submitted scans
 */
@Controller('scan')
export class ScanController {
  private readonly logger = new Logger(ScanController.name);

  constructor(private readonly orchestrator: ScanOrchestratorService) {}

  /**
   * GET /api/v1/scan/mode
   */
  @Get('mode')
  getMode() {
    return { deleteMode: this.orchestrator.isDeleteMode() };
  }

  /**
   * PUT /api/v1/scan/mode
   * Body: { deleteMode: boolean }
   */
  @Put('mode')
  setMode(@Body() body: SetScanModeDto) {
    this.orchestrator.setDeleteMode(body.deleteMode);
    return { deleteMode: this.orchestrator.isDeleteMode() };
  }

  /**
   * Process a scan captured elsewhere, e.g. by a handheld reader
   * POST /api/v1/scan
   * Body: { uid: "04A1B2C3", data?: "0305d101014207fe" }
   */
  @Post()
  @HttpCode(200)
  async scan(@Body() body: ScanDto) {
    this.logger.log(`📥 Scan submitted for ${body.uid.toUpperCase()}`);

    const session = BufferTagSession.fromHex(body.uid, body.data);
    const result = await this.orchestrator.processToken(session);

    return {
      ...result,
      deleteMode: this.orchestrator.isDeleteMode(),
      timestamp: new Date().toISOString(),
    };
  }
}
