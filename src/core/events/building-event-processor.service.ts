import { Injectable, Logger } from '@nestjs/common';
import { OnEvent } from '@nestjs/event-emitter';
import { BuildingRegistryService } from '@core/registry';
import { MessagingService } from '@infra/messaging';
import { BUILDING_EVENTS, BuildingEventData } from './building-events';

/**
 * Reacts to registry changes: logs them and publishes them over MQTT
 */
@Injectable()
export class BuildingEventProcessorService {
  private readonly logger = new Logger(BuildingEventProcessorService.name);

  constructor(
    private readonly registry: BuildingRegistryService,
    private readonly messagingService: MessagingService,
  ) {}

  @OnEvent(BUILDING_EVENTS.ADDED)
  async handleBuildingAdded(data: BuildingEventData) {
    this.logger.log(
      `🏗️  Building added: UID=${data.uid}, Type=${data.buildingType} ` +
        `(${this.registry.countByType(data.buildingType)} of this type, ${this.registry.size()} total)`,
    );
    this.logRegistry();
    await this.forward('added', data);
  }

  @OnEvent(BUILDING_EVENTS.REMOVED)
  async handleBuildingRemoved(data: BuildingEventData) {
    this.logger.log(
      `🗑️  Building removed: UID=${data.uid}, Type=${data.buildingType} ` +
        `(${this.registry.countByType(data.buildingType)} of this type left)`,
    );
    this.logRegistry();
    await this.forward('removed', data);
  }

  /**
   * Dump the registry at debug level, one line per card
   */
  logRegistry(): void {
    const cards = this.registry.snapshot();
    this.logger.debug(`=== Building Database (${cards.length}) ===`);
    for (const card of cards) {
      this.logger.debug(
        `UID: ${card.uid} | Type: ${card.buildingType} | First: ${card.firstSeen} | Last: ${card.lastSeen}`,
      );
    }
  }

  private async forward(kind: 'added' | 'removed', data: BuildingEventData) {
    try {
      await this.messagingService.publish(this.messagingService.topic(kind), {
        uid: data.uid,
        buildingType: data.buildingType,
        timestamp: data.timestamp.toISOString(),
      });
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      this.logger.error(`Failed to publish building ${kind} event: ${err.message}`, err.stack);
    }
  }
}
