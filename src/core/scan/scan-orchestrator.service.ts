import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import { APP_CONFIG, AppConfig } from '@infra/config';
import { parseClassification } from '@core/ndef';
import { BuildingRegistryService } from '@core/registry';
import { formatUid, uidToString } from '@core/token-identifier';
import { BuildingTypeSource, ScanResult } from './scan-result';
import { TagSession } from './tag-session';

/**
 * Applies scanned cards to the building registry.
 *
 * In add mode a new card is registered with the building type read from it;
 * a known card only has its lastSeen refreshed. In delete mode a known card
 * is removed. Registry listeners fire from the registry itself.
 */
@Injectable()
export class ScanOrchestratorService {
  private readonly logger = new Logger(ScanOrchestratorService.name);
  private deleteMode: boolean;

  constructor(
    private readonly registry: BuildingRegistryService,
    @Optional() @Inject(APP_CONFIG) config?: Pick<AppConfig, 'DELETE_MODE'>,
  ) {
    this.deleteMode = config?.DELETE_MODE ?? false;
  }

  setDeleteMode(enabled: boolean): void {
    this.deleteMode = enabled;
    this.logger.log(`Delete mode: ${enabled ? 'ENABLED' : 'DISABLED'}`);
  }

  isDeleteMode(): boolean {
    return this.deleteMode;
  }

  /**
   * Handle one card in the field. The session is released before the
   * registry is touched; the registry update and its listener run in one
   * synchronous step.
   */
  async processToken(session: TagSession | null | undefined): Promise<ScanResult> {
    if (!session) {
      this.logger.warn('Scan requested without a tag session');
      return { action: 'failed', error: 'No tag session available' };
    }

    let uidBytes: Buffer;
    try {
      uidBytes = await session.identifierOfPresentToken();
    } catch (error) {
      const err = toError(error);
      this.logger.error(`Failed to read card UID: ${err.message}`, err.stack);
      await this.release(session);
      return { action: 'failed', error: err.message };
    }

    const uid = uidToString(uidBytes);
    if (!uid) {
      await this.release(session);
      return { action: 'failed', error: 'Card reported an empty UID' };
    }

    const { buildingType, source } = await this.readBuildingType(session, uidBytes);
    await this.release(session);

    this.logger.debug(`Card ${formatUid(uidBytes)}: type ${buildingType} (${source})`);

    return this.deleteMode
      ? this.applyRemoval(uid)
      : this.applyAddition(uid, buildingType, source);
  }

  private async readBuildingType(
    session: TagSession,
    uidBytes: Buffer,
  ): Promise<{ buildingType: number; source: BuildingTypeSource }> {
    let data: Buffer | null;
    try {
      data = await session.readRawPages();
    } catch (error) {
      this.logger.warn(`Tag read failed: ${toError(error).message}`);
      data = null;
    }

    if (data) {
      const { buildingType, found } = parseClassification(data);
      if (!found) {
        this.logger.warn(`No building record on card ${uidToString(uidBytes)}; defaulting to 0`);
      }
      return { buildingType, source: found ? 'ndef' : 'default' };
    }

    // Unreadable card (wrong family, no NDEF): derive a stable type from the UID
    return { buildingType: uidBytes[0], source: 'uid' };
  }

  private applyRemoval(uid: string): ScanResult {
    const card = this.registry.get(uid);

    if (!card || !this.registry.remove(uid)) {
      this.logger.log(`Building not found for deletion: UID=${uid}`);
      return { action: 'not-registered', uid };
    }

    this.logger.log(`Building removed: UID=${uid}, Type=${card.buildingType}`);
    return { action: 'removed', uid, buildingType: card.buildingType };
  }

  private applyAddition(uid: string, buildingType: number, source: BuildingTypeSource): ScanResult {
    if (this.registry.add(uid, buildingType)) {
      this.logger.log(`New building added: UID=${uid}, Type=${buildingType}`);
      return { action: 'added', uid, buildingType, source };
    }

    // add() refreshed lastSeen; the stored type wins over what was just read
    const stored = this.registry.get(uid);
    this.logger.log(`Building already registered: UID=${uid}`);
    return { action: 'refreshed', uid, buildingType: stored?.buildingType ?? buildingType, source };
  }

  private async release(session: TagSession): Promise<void> {
    try {
      await session.releaseToken();
    } catch (error) {
      const err = toError(error);
      this.logger.error(`Failed to release card: ${err.message}`, err.stack);
    }
  }
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
