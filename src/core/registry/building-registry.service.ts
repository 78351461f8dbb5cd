import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import { performance } from 'perf_hooks';
import { BuildingCard, BuildingEventCallback, Clock, REGISTRY_CLOCK } from './building-card';

const monotonicClock: Clock = () => Math.floor(performance.now());

/**
 * In-memory registry of building cards keyed by UID.
 *
 * Shared by the scan loop, REST handlers and event handlers. Every method is
 * synchronous and never yields to the event loop, so each call runs as one
 * critical section. Records leave the registry only as copies.
 *
 * Listeners run after the map has been updated, so they may call back into
 * the registry.
 */
@Injectable()
export class BuildingRegistryService {
  private readonly logger = new Logger(BuildingRegistryService.name);
  private readonly buildings = new Map<string, BuildingCard>();
  private readonly now: Clock;

  private onAdded?: BuildingEventCallback;
  private onRemoved?: BuildingEventCallback;

  constructor(@Optional() @Inject(REGISTRY_CLOCK) clock?: Clock) {
    this.now = clock ?? monotonicClock;
  }

  /**
   * Register a card. A known UID only gets its lastSeen refreshed; its
   * building type is kept.
   * @returns true if a new card was inserted
   */
  add(uid: string, buildingType: number): boolean {
    if (uid.length === 0) {
      return false;
    }
    if (!Number.isInteger(buildingType) || buildingType < 0 || buildingType > 0xff) {
      this.logger.warn(`Rejected building type ${buildingType} for ${uid}`);
      return false;
    }

    const now = this.now();
    const existing = this.buildings.get(uid);

    if (existing) {
      existing.lastSeen = Math.max(existing.lastSeen, now);
      return false;
    }

    this.buildings.set(uid, { uid, buildingType, firstSeen: now, lastSeen: now });
    this.logger.debug(`Building added: UID=${uid}, Type=${buildingType}`);

    this.notify(this.onAdded, 'onAdded', buildingType, uid);
    return true;
  }

  /**
   * Refresh lastSeen of a known card
   * @returns false if the UID is not registered
   */
  touch(uid: string): boolean {
    const existing = this.buildings.get(uid);
    if (!existing) {
      return false;
    }
    existing.lastSeen = Math.max(existing.lastSeen, this.now());
    return true;
  }

  /**
   * @returns true if a card was removed
   */
  remove(uid: string): boolean {
    const existing = this.buildings.get(uid);
    if (!existing) {
      return false;
    }

    this.buildings.delete(uid);
    this.logger.debug(`Building removed: UID=${uid}, Type=${existing.buildingType}`);

    this.notify(this.onRemoved, 'onRemoved', existing.buildingType, uid);
    return true;
  }

  contains(uid: string): boolean {
    return this.buildings.has(uid);
  }

  get(uid: string): BuildingCard | undefined {
    const card = this.buildings.get(uid);
    return card ? { ...card } : undefined;
  }

  size(): number {
    return this.buildings.size;
  }

  countByType(buildingType: number): number {
    let count = 0;
    for (const card of this.buildings.values()) {
      if (card.buildingType === buildingType) count++;
    }
    return count;
  }

  hasType(buildingType: number): boolean {
    for (const card of this.buildings.values()) {
      if (card.buildingType === buildingType) return true;
    }
    return false;
  }

  allOfType(buildingType: number): Map<string, BuildingCard> {
    const result = new Map<string, BuildingCard>();
    for (const [uid, card] of this.buildings) {
      if (card.buildingType === buildingType) {
        result.set(uid, { ...card });
      }
    }
    return result;
  }

  /**
   * Point-in-time copy of every card
   */
  snapshot(): BuildingCard[] {
    return Array.from(this.buildings.values(), (card) => ({ ...card }));
  }

  allEntries(): Map<string, BuildingCard> {
    return new Map(Array.from(this.buildings, ([uid, card]) => [uid, { ...card }]));
  }

  /**
   * Remove every card. Does not notify onRemoved.
   */
  clear(): void {
    const count = this.buildings.size;
    this.buildings.clear();
    this.logger.log(`Building registry cleared (${count} cards)`);
  }

  /**
   * Replace the add listener; pass undefined to remove it
   */
  setOnAdded(callback: BuildingEventCallback | undefined): void {
    this.onAdded = callback;
  }

  /**
   * Replace the remove listener; pass undefined to remove it
   */
  setOnRemoved(callback: BuildingEventCallback | undefined): void {
    this.onRemoved = callback;
  }

  private notify(
    callback: BuildingEventCallback | undefined,
    name: string,
    buildingType: number,
    uid: string,
  ): void {
    if (!callback) {
      return;
    }
    try {
      callback(buildingType, uid);
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      this.logger.error(`${name} listener failed for ${uid}: ${err.message}`, err.stack);
    }
  }
}
