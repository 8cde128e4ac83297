/**
 * SPP protocol constants.
 */

/**
 * Message identifiers used by the core.
 */
export enum MessageId {
  STATUS_UPDATED = 0x60,
  EXTENDED_STATUS_UPDATED = 0x61,
  GET_STATUS = 0x62,

  // Firmware over-the-air update
  FOTA_OPEN = 0xba,
  FOTA_CONTROL = 0xbb,
  FOTA_DOWNLOAD_DATA = 0xbc,
  FOTA_UPDATE = 0xbd,
  FOTA_RESULT = 0xbe,
  FOTA_ABORT = 0xbf,
}

// Frame layout
export const HEADER_SIZE = 2; // [TYPE][SIZE] or [SIZE_AND_FLAGS:2]
export const CRC_SIZE = 2;
export const FRAME_OVERHEAD = 7; // SOM + header + id + crc + EOM
export const MIN_FRAME_SIZE = 6;
export const MIN_DECODABLE_SIZE = 5;

// Packed header bits
export const HEADER_SIZE_MASK = 0x03ff;
export const HEADER_RESPONSE_BIT = 1 << 12;
export const HEADER_FRAGMENT_BIT = 1 << 13;

export const MAX_MODERN_SIZE = HEADER_SIZE_MASK; // id + payload + crc
export const MAX_LEGACY_SIZE = 0xff;
export const MAX_MODERN_PAYLOAD = MAX_MODERN_SIZE - 3; // 1020 bytes
export const MAX_LEGACY_PAYLOAD = MAX_LEGACY_SIZE - 3; // 252 bytes
export const MAX_PACKET_SIZE = MAX_MODERN_SIZE + 4;

// Reassembly bounds
export const MAX_DECODE_ITERATIONS = 100;
export const MAX_CONSECUTIVE_FAILURES = 5;

// Acknowledgement payload for FOTA_UPDATE / FOTA_RESULT
export const ACK_OK = 0x01;
