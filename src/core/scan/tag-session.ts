/**
 * One card in the field of the reader, from selection until it is released.
 * Implemented by the hardware integration; the core never talks to the radio.
 */
export interface TagSession {
  /** Raw UID bytes of the selected card */
  identifierOfPresentToken(): Promise<Buffer>;
  /** Data area bytes from page 4 on, or null when the card cannot be read */
  readRawPages(): Promise<Buffer | null>;
  /** Halt the card so it is not selected again until it leaves the field */
  releaseToken(): Promise<void>;
}

/**
 * Polled by the scan loop. Resolves to a session when a new card is present.
 */
export interface TagReader {
  detect(): Promise<TagSession | null>;
}

export const TAG_READER = Symbol('TAG_READER');
