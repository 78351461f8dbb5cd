import { TagSession } from './tag-session';

/**
 * Session over bytes already in memory, for scans submitted over the API
 */
export class BufferTagSession implements TagSession {
  released = false;

  constructor(
    private readonly uid: Buffer,
    private readonly data: Buffer | null,
  ) {}

  static fromHex(uid: string, data?: string): BufferTagSession {
    return new BufferTagSession(
      Buffer.from(uid, 'hex'),
      data === undefined ? null : Buffer.from(data, 'hex'),
    );
  }

  async identifierOfPresentToken(): Promise<Buffer> {
    return Buffer.from(this.uid);
  }

  async readRawPages(): Promise<Buffer | null> {
    return this.data ? Buffer.from(this.data) : null;
  }

  async releaseToken(): Promise<void> {
    this.released = true;
  }
}
