import {
  BUILDING_RECORD_TYPE,
  RECORD_FLAGS,
  TLV,
} from './ndef.constants';

/**
 * Outcome of a parse. `buildingType` is 0 whenever `found` is false.
 */
export interface ClassificationResult {
  buildingType: number;
  found: boolean;
}

/**
 * Outcome of the TLV walk. `abort` means the walk hit a malformed length
 * header and no further strategy may run.
 */
type TlvOutcome =
  | { kind: 'found'; result: ClassificationResult }
  | { kind: 'continue' }
  | { kind: 'abort' };

function notFound(): ClassificationResult {
  return { buildingType: 0, found: false };
}

function found(buildingType: number): ClassificationResult {
  return { buildingType, found: true };
}

/**
 * Extract the building type from raw tag bytes (Type 2 data area, page 4 on).
 *
 * Walks the TLV blocks looking for an NDEF message and, inside it, a record
 * of type 'B'. When that yields nothing, falls back to a raw scan for a short
 * 'B' record, which recovers tags whose TLV envelope was cut off by the reader.
 *
 * Never throws and never indexes outside `data`.
 *
 * @example
 * parseClassification(Buffer.from([0x03, 0x05, 0xd1, 0x01, 0x01, 0x42, 0x2a]));
 * // => { buildingType: 42, found: true }
 */
export function parseClassification(data: Uint8Array): ClassificationResult {
  if (data.length === 0) {
    return notFound();
  }

  const outcome = walkTlvBlocks(data);
  if (outcome.kind === 'found') {
    return outcome.result;
  }
  if (outcome.kind === 'abort') {
    return notFound();
  }

  return scanForShortRecord(data);
}

function walkTlvBlocks(data: Uint8Array): TlvOutcome {
  let i = 0;

  while (i < data.length) {
    const tlvType = data[i];

    if (tlvType === TLV.NULL) {
      i += 1;
      continue;
    }
    if (tlvType === TLV.TERMINATOR) {
      return { kind: 'continue' };
    }

    const length = readTlvLength(data, i + 1);

    if (tlvType === TLV.NDEF_MESSAGE) {
      if (!length) {
        return { kind: 'abort' };
      }

      const start = i + 1 + length.fieldBytes;
      if (start >= data.length) {
        return { kind: 'abort' };
      }
      // A reader that stopped early leaves fewer bytes than declared
      const end = Math.min(start + length.value, data.length);

      const result = findBuildingRecord(data, start, end);
      return result ? { kind: 'found', result } : { kind: 'continue' };
    }

    // Lock control, memory control and proprietary TLVs
    if (!length) {
      return { kind: 'continue' };
    }
    i += 1 + length.fieldBytes + length.value;
  }

  return { kind: 'continue' };
}

function readTlvLength(
  data: Uint8Array,
  at: number,
): { value: number; fieldBytes: number } | null {
  if (at >= data.length) {
    return null;
  }
  if (data[at] !== TLV.EXTENDED_LENGTH) {
    return { value: data[at], fieldBytes: 1 };
  }
  if (at + 2 >= data.length) {
    return null;
  }
  return { value: (data[at + 1] << 8) | data[at + 2], fieldBytes: 3 };
}

/**
 * Parse NDEF records in `[start, end)` and return the payload of the first
 * 'B' record, or null when no such record can be read.
 */
function findBuildingRecord(
  data: Uint8Array,
  start: number,
  end: number,
): ClassificationResult | null {
  let p = start;

  while (p < end) {
    const header = data[p++];
    const shortRecord = (header & RECORD_FLAGS.SHORT_RECORD) !== 0;
    const hasId = (header & RECORD_FLAGS.ID_LENGTH) !== 0;

    if (p >= end) return null;
    const typeLength = data[p++];

    let payloadLength: number;
    if (shortRecord) {
      if (p >= end) return null;
      payloadLength = data[p++];
    } else {
      if (p + 4 > end) return null;
      // Multiplication keeps lengths above 2^31 positive
      payloadLength =
        data[p] * 0x1000000 + ((data[p + 1] << 16) | (data[p + 2] << 8) | data[p + 3]);
      p += 4;
    }

    let idLength = 0;
    if (hasId) {
      if (p >= end) return null;
      idLength = data[p++];
    }

    if (p + typeLength > end) return null;
    const typeStart = p;
    p += typeLength;

    if (p + idLength > end) return null;
    p += idLength;

    if (p + payloadLength > end) return null;

    if (typeLength === 1 && data[typeStart] === BUILDING_RECORD_TYPE) {
      return payloadLength >= 1 ? found(data[p]) : notFound();
    }

    p += payloadLength;

    if (header & RECORD_FLAGS.MESSAGE_END) {
      break;
    }
  }

  return null;
}

/**
 * Look for `flags(SR) 0x01 len>=1 'B' value` anywhere in the buffer.
 */
function scanForShortRecord(data: Uint8Array): ClassificationResult {
  for (let k = 0; k + 4 < data.length; k++) {
    if ((data[k] & RECORD_FLAGS.SHORT_RECORD) === 0) continue;

    if (data[k + 1] === 1 && data[k + 2] >= 1 && data[k + 3] === BUILDING_RECORD_TYPE) {
      return found(data[k + 4]);
    }
  }

  return notFound();
}
