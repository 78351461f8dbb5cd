import { Controller, Get, Inject } from '@nestjs/common';
import { APP_CONFIG, AppConfig } from '@infra/config';
import { MessagingService } from '@infra/messaging';
import { BuildingRegistryService } from '@core/registry';
import { ScanOrchestratorService } from '@core/scan';

/**
 * Health check controller
 */
@Controller('health')
export class HealthController {
  constructor(
    @Inject(APP_CONFIG) private readonly config: AppConfig,
    private readonly registry: BuildingRegistryService,
    private readonly orchestrator: ScanOrchestratorService,
    private readonly messagingService: MessagingService,
  ) {}

  /**
   * Health check endpoint
   * GET /api/v1/health
   *
   * Returns:
   * - status: overall health status
   * - mode: service mode (API/NFC/IOT)
   * - registry: card count and scan mode
   * - messaging: MQTT connection (degraded when configured but down)
   */
  @Get()
  check() {
    const messaging = this.messagingService.getStatus();
    const mqttExpected = this.config.MODE === 'IOT' && messaging.brokerUrl !== null;
    const isHealthy = !mqttExpected || messaging.isConnected;

    return {
      status: isHealthy ? 'healthy' : 'degraded',
      timestamp: new Date().toISOString(),
      mode: this.config.MODE,
      registry: {
        buildings: this.registry.size(),
        deleteMode: this.orchestrator.isDeleteMode(),
      },
      messaging,
    };
  }
}
