import { Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { BuildingRegistryService } from '@core/registry';
import { BUILDING_EVENTS, BuildingEventData } from './building-events';

/**
 * Owns the registry listeners and forwards them to the event bus
 */
@Injectable()
export class BuildingEventsService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(BuildingEventsService.name);

  constructor(
    private readonly registry: BuildingRegistryService,
    private readonly eventEmitter: EventEmitter2,
  ) {}

  onModuleInit() {
    this.registry.setOnAdded((buildingType, uid) => this.emit(BUILDING_EVENTS.ADDED, buildingType, uid));
    this.registry.setOnRemoved((buildingType, uid) =>
      this.emit(BUILDING_EVENTS.REMOVED, buildingType, uid),
    );
    this.logger.log('Registry listeners installed');
  }

  onModuleDestroy() {
    this.registry.setOnAdded(undefined);
    this.registry.setOnRemoved(undefined);
  }

  private emit(event: string, buildingType: number, uid: string) {
    const data: BuildingEventData = { uid, buildingType, timestamp: new Date() };
    this.eventEmitter.emit(event, data);
  }
}
