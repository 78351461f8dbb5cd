import { Global, Module } from '@nestjs/common';
import { MessagingModule } from '@infra/messaging';
import { BuildingRegistryService } from './registry';
import { ScanOrchestratorService } from './scan';
import { BuildingEventsService, BuildingEventProcessorService } from './events';

/**
 * Core module containing the registry and scan services
 * @Global decorator makes these services available everywhere without explicit imports
 */
@Global()
@Module({
  imports: [MessagingModule],
  providers: [
    BuildingRegistryService,
    ScanOrchestratorService,
    BuildingEventsService,
    BuildingEventProcessorService,
  ],
  exports: [BuildingRegistryService, ScanOrchestratorService, MessagingModule],
})
export class CoreModule {}
