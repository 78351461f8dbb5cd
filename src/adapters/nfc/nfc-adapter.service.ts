import {
  Inject,
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
  Optional,
} from '@nestjs/common';
import { APP_CONFIG, AppConfig } from '@infra/config';
import { ScanOrchestratorService, ScanResult, TAG_READER, TagReader } from '@core/scan';

/**
 * NFC scan loop: polls the reader and hands every detected card to the
 * scan orchestrator
 */
@Injectable()
export class NfcAdapterService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(NfcAdapterService.name);
  private timer: NodeJS.Timeout | null = null;
  private polling = false;
  private scans = 0;
  private lastScan: ScanResult | null = null;

  constructor(
    private readonly orchestrator: ScanOrchestratorService,
    @Inject(APP_CONFIG) private readonly config: AppConfig,
    @Optional() @Inject(TAG_READER) private readonly reader?: TagReader,
  ) {}

  onModuleInit() {
    this.startReader();
  }

  onModuleDestroy() {
    this.stopReader();
  }

  /**
   * Start polling the reader every NFC_POLLING_INTERVAL ms
   * @returns false when no reader is configured
   */
  startReader(): boolean {
    if (!this.reader) {
      this.logger.warn('No NFC reader configured; scan loop not started');
      return false;
    }
    if (this.timer) {
      return true;
    }

    this.timer = setInterval(() => {
      void this.pollOnce();
    }, this.config.NFC_POLLING_INTERVAL);

    this.logger.log(`📡 NFC reader polling every ${this.config.NFC_POLLING_INTERVAL}ms`);
    return true;
  }

  stopReader() {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
      this.logger.log('NFC reader stopped');
    }
  }

  /**
   * Run one detect-and-process cycle. Returns null when no card was processed,
   * including when a previous cycle is still running.
   */
  async pollOnce(): Promise<ScanResult | null> {
    if (!this.reader || this.polling) {
      return null;
    }

    this.polling = true;
    try {
      const session = await this.reader.detect();
      if (!session) {
        return null;
      }

      const result = await this.orchestrator.processToken(session);
      this.scans++;
      this.lastScan = result;
      return result;
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      this.logger.error(`NFC poll failed: ${err.message}`, err.stack);
      return null;
    } finally {
      this.polling = false;
    }
  }

  getStatus() {
    return {
      readerConfigured: this.reader !== undefined,
      isPolling: this.timer !== null,
      pollingInterval: this.config.NFC_POLLING_INTERVAL,
      scans: this.scans,
      lastScan: this.lastScan,
    };
  }
}
