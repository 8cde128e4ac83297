/**
 * Checksums used on the wire and inside firmware images.
 */

const CRC16_TABLE = buildCrc16Table(0x1021);
const CRC32_TABLE = buildCrc32Table(0xedb88320);

function buildCrc16Table(poly: number): Uint16Array {
  const table = new Uint16Array(256);
  for (let i = 0; i < 256; i++) {
    let crc = i << 8;
    for (let bit = 0; bit < 8; bit++) {
      crc = crc & 0x8000 ? ((crc << 1) ^ poly) & 0xffff : (crc << 1) & 0xffff;
    }
    table[i] = crc;
  }
  return table;
}

function buildCrc32Table(poly: number): Uint32Array {
  const table = new Uint32Array(256);
  for (let i = 0; i < 256; i++) {
    let crc = i;
    for (let bit = 0; bit < 8; bit++) {
      crc = crc & 1 ? (crc >>> 1) ^ poly : crc >>> 1;
    }
    table[i] = crc >>> 0;
  }
  return table;
}

/**
 * CRC-16/CCITT (XMODEM variant: poly 0x1021, init 0x0000, no reflection).
 *
 * Running it over data followed by its own CRC (high byte first) yields 0.
 */
export function crc16(data: Uint8Array): number {
  let crc = 0;
  for (const byte of data) {
    crc = ((crc << 8) & 0xffff) ^ CRC16_TABLE[((crc >> 8) ^ byte) & 0xff];
  }
  return crc;
}

/**
 * CRC-32 (reflected, poly 0xEDB88320, init 0xFFFFFFFF, final complement).
 */
export function crc32(data: Uint8Array): number {
  let crc = 0xffffffff;
  for (const byte of data) {
    crc = (crc >>> 8) ^ CRC32_TABLE[(crc ^ byte) & 0xff];
  }
  return (crc ^ 0xffffffff) >>> 0;
}
