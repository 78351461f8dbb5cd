import { TagReader, TagSession, Type2TagSession, Type2TagTransport, Type2TagSessionOptions } from '@core/scan';

/**
 * Returns the transport of a newly selected card, or null when the field is empty
 */
export type Type2TransportSource = () => Promise<Type2TagTransport | null>;

/**
 * TagReader for NFC Forum Type 2 tags on top of a card-selecting driver
 */
export class Type2TagReader implements TagReader {
  constructor(
    private readonly selectCard: Type2TransportSource,
    private readonly options: Type2TagSessionOptions = {},
  ) {}

  async detect(): Promise<TagSession | null> {
    const transport = await this.selectCard();
    return transport ? new Type2TagSession(transport, this.options) : null;
  }
}
