/**
 * Render card UID bytes as an uppercase hex string, zero-padded, no separators.
 * Used as the registry key, so the same card must always give the same string.
 */
export function uidToString(uid: Uint8Array): string {
  return Buffer.from(uid.buffer, uid.byteOffset, uid.byteLength).toString('hex').toUpperCase();
}

/**
 * Human-readable form for logs, e.g. "04 A1 B2 C3"
 */
export function formatUid(uid: Uint8Array): string {
  return Array.from(uid, (byte) => byte.toString(16).padStart(2, '0').toUpperCase()).join(' ');
}

const HEX_PATTERN = /^(?:[0-9a-fA-F]{2})+$/;

/**
 * Normalise a UID typed by a user or sent over the API. Returns null when the
 * string is not an even number of hex digits.
 */
export function normalizeUid(uid: string): string | null {
  const trimmed = uid.trim();
  return HEX_PATTERN.test(trimmed) ? trimmed.toUpperCase() : null;
}
