/**
 * TLV block types found in the data area of an NFC Forum Type 2 tag
 */
export const TLV = {
  NULL: 0x00,
  NDEF_MESSAGE: 0x03,
  TERMINATOR: 0xfe,
  /** First length byte announcing a 2-byte big-endian length */
  EXTENDED_LENGTH: 0xff,
} as const;

/**
 * NDEF record header flags
 */
export const RECORD_FLAGS = {
  MESSAGE_BEGIN: 0x80,
  MESSAGE_END: 0x40,
  CHUNK: 0x20,
  SHORT_RECORD: 0x10,
  ID_LENGTH: 0x08,
  TNF_MASK: 0x07,
} as const;

/** TNF value for NFC Forum well-known types */
export const TNF_WELL_KNOWN = 0x01;

/** Record type carrying the building type ('B') */
export const BUILDING_RECORD_TYPE = 0x42;

/** Capability container magic byte of a Type 2 tag holding NDEF data */
export const TYPE2_CC_MAGIC = 0xe1;
