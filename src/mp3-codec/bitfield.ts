import { InvalidFieldValueError } from "./mp3-codec.errors";

const MAX_FIELD_BITS = 30;

function checkRange(buffer: Buffer, bitOffset: number, bitCount: number): void {
  if (
    !Number.isInteger(bitOffset) ||
    !Number.isInteger(bitCount) ||
    bitOffset < 0 ||
    bitCount < 1 ||
    bitCount > MAX_FIELD_BITS
  ) {
    throw new RangeError(`Invalid bit field: offset ${bitOffset}, ${bitCount} bits`);
  }
  if (bitOffset + bitCount > buffer.length * 8) {
    throw new RangeError(
      `Bit field at ${bitOffset} (${bitCount} bits) exceeds ${buffer.length}-byte buffer`,
    );
  }
}

/**
 * Reads an unsigned big-endian (MSB first) bit field
 * @param buffer - Buffer holding the field
 * @param bitOffset - Offset of the field's first bit, counted from the MSB of byte 0
 * @param bitCount - Field width, at most 30 bits
 */
export function readBits(buffer: Buffer, bitOffset: number, bitCount: number): number {
  checkRange(buffer, bitOffset, bitCount);

  let value = 0;
  for (let i = 0; i < bitCount; i++) {
    const bit = bitOffset + i;
    value = (value << 1) | ((buffer[bit >> 3] >> (7 - (bit & 7))) & 0x01);
  }
  return value;
}

/**
 * Writes an unsigned big-endian (MSB first) bit field, leaving surrounding bits untouched
 * @throws InvalidFieldValueError if the value does not fit in `bitCount` bits
 */
export function writeBits(
  buffer: Buffer,
  bitOffset: number,
  bitCount: number,
  value: number,
): void {
  checkRange(buffer, bitOffset, bitCount);
  if (!Number.isInteger(value) || value < 0 || value >= 2 ** bitCount) {
    throw new InvalidFieldValueError(`Value ${value} does not fit in ${bitCount} bits`);
  }

  for (let i = 0; i < bitCount; i++) {
    const bit = bitOffset + i;
    const shift = 7 - (bit & 7);
    const bitValue = (value >> (bitCount - 1 - i)) & 0x01;
    buffer[bit >> 3] = (buffer[bit >> 3] & ~(1 << shift)) | (bitValue << shift);
  }
}
