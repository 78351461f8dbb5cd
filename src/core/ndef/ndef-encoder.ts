import {
  BUILDING_RECORD_TYPE,
  RECORD_FLAGS,
  TLV,
  TNF_WELL_KNOWN,
} from './ndef.constants';

export interface EncodeOptions {
  /** Append a terminator TLV after the message (default true) */
  terminator?: boolean;
}

function assertBuildingType(buildingType: number): void {
  if (!Number.isInteger(buildingType) || buildingType < 0 || buildingType > 0xff) {
    throw new RangeError(`Building type must be an integer between 0 and 255, got ${buildingType}`);
  }
}

/**
 * Single short well-known record of type 'B' holding one payload byte.
 * This is the layout written to building cards by the provisioning tool.
 */
export function encodeClassificationRecord(buildingType: number): Buffer {
  assertBuildingType(buildingType);

  const header =
    RECORD_FLAGS.MESSAGE_BEGIN |
    RECORD_FLAGS.MESSAGE_END |
    RECORD_FLAGS.SHORT_RECORD |
    TNF_WELL_KNOWN;

  return Buffer.from([header, 0x01, 0x01, BUILDING_RECORD_TYPE, buildingType]);
}

/**
 * The record wrapped in an NDEF message TLV, ready to be written from page 4.
 */
export function encodeClassificationMessage(buildingType: number, options: EncodeOptions = {}): Buffer {
  const record = encodeClassificationRecord(buildingType);
  const tlv = Buffer.concat([Buffer.from([TLV.NDEF_MESSAGE, record.length]), record]);

  return options.terminator === false ? tlv : Buffer.concat([tlv, Buffer.from([TLV.TERMINATOR])]);
}
