const CRC16_POLYNOMIAL = 0x8005;
const CRC16_INITIAL = 0xffff;

/**
 * CRC of the low `bits` bits of `value`, MSB first
 */
export function crc16Bits(value: number, bits: number, start: number = CRC16_INITIAL): number {
  let crc = start;
  for (let bit = bits - 1; bit >= 0; bit--) {
    const inputBit = (value >> bit) & 0x01;
    const topBit = (crc >> 15) & 0x01;
    crc = (crc << 1) & 0xffff;
    if (inputBit !== topBit) {
      crc ^= CRC16_POLYNOMIAL;
    }
  }
  return crc;
}

const CRC16_TABLE: readonly number[] = Array.from({ length: 256 }, (_, byte) =>
  crc16Bits(byte, 8, 0),
);

/**
 * MPEG audio CRC-16 (polynomial 0x8005) over whole bytes
 * @param data - Bytes to checksum
 * @param start - Running CRC to continue from
 */
export function crc16(data: Uint8Array, start: number = CRC16_INITIAL): number {
  let crc = start;
  for (const byte of data) {
    crc = ((crc << 8) & 0xffff) ^ CRC16_TABLE[(crc >> 8) ^ byte];
  }
  return crc;
}
