import { Logger } from '@nestjs/common';
import { TLV, TYPE2_CC_MAGIC } from '@core/ndef';
import { TagSession } from './tag-session';

/** Bytes returned by one READ command (four 4-byte pages) */
const READ_BLOCK_SIZE = 16;
const CAPABILITY_CONTAINER_PAGE = 3;
const FIRST_DATA_PAGE = 4;
const DEFAULT_MAX_PAGE = 20;

/** SAK value of MIFARE Ultralight / NTAG after masking bit 7 */
const SAK_MIFARE_ULTRALIGHT = 0x00;

/**
 * Low-level access to an ISO 14443-A card, e.g. an MFRC522 or PN532 driver
 */
export interface Type2TagTransport {
  readonly uid: Buffer;
  readonly sak: number;
  /** READ command: returns at least 16 bytes starting at `page`, rejects on error */
  readPages(page: number): Promise<Buffer>;
  /** HLTA */
  halt(): Promise<void>;
}

export interface Type2TagSessionOptions {
  /** Pages are read from 4 up to, but not including, this page */
  maxPage?: number;
}

/**
 * Reads the NDEF data area of an NFC Forum Type 2 tag
 */
export class Type2TagSession implements TagSession {
  private readonly logger = new Logger(Type2TagSession.name);
  private readonly maxPage: number;

  constructor(
    private readonly transport: Type2TagTransport,
    options: Type2TagSessionOptions = {},
  ) {
    this.maxPage = options.maxPage ?? DEFAULT_MAX_PAGE;
  }

  async identifierOfPresentToken(): Promise<Buffer> {
    return this.transport.uid;
  }

  async readRawPages(): Promise<Buffer | null> {
    if ((this.transport.sak & 0x7f) !== SAK_MIFARE_ULTRALIGHT) {
      this.logger.debug(`SAK 0x${this.transport.sak.toString(16)} is not a Type 2 tag`);
      return null;
    }

    let cc: Buffer;
    try {
      cc = await this.transport.readPages(CAPABILITY_CONTAINER_PAGE);
    } catch (error) {
      this.logger.debug(`Capability container read failed: ${describe(error)}`);
      return null;
    }
    if (cc.length === 0 || cc[0] !== TYPE2_CC_MAGIC) {
      return null;
    }

    const blocks: Buffer[] = [];

    for (let page = FIRST_DATA_PAGE; page < this.maxPage; page += 4) {
      let block: Buffer;
      try {
        block = await this.transport.readPages(page);
      } catch (error) {
        this.logger.debug(`Read of page ${page} failed: ${describe(error)}`);
        break;
      }
      if (block.length < READ_BLOCK_SIZE) {
        break;
      }

      const data = block.subarray(0, READ_BLOCK_SIZE);
      blocks.push(Buffer.from(data));

      if (data.includes(TLV.TERMINATOR)) {
        break;
      }
    }

    return blocks.length > 0 ? Buffer.concat(blocks) : null;
  }

  async releaseToken(): Promise<void> {
    await this.transport.halt();
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
