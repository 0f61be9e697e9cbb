import { TAG_CONSTANTS } from "./consts";
import { TagType } from "./types";

/**
 * Returned by the size functions when the bytes seen so far could still
 * turn out to be a tag
 */
export const NEED_MORE_DATA = -1;

export type TagMatch =
  | { kind: "tag"; tagType: TagType; size: number }
  | { kind: "none" }
  | { kind: "need-more" };

const LYRICS_BEGIN = Buffer.from(TAG_CONSTANTS.LYRICS_BEGIN, "latin1");
const LYRICS_END = Buffer.from(TAG_CONSTANTS.LYRICS_END, "latin1");
const LYRICS_200 = Buffer.from(TAG_CONSTANTS.LYRICS_200, "latin1");

const ASCII_ZERO = 0x30;
const ASCII_NINE = 0x39;
const ASCII_A = 0x41;
const ASCII_Z = 0x5a;

/**
 * Compares `magic` against the bytes at `offset`, looking only at the bytes
 * that are available. A short buffer that agrees so far counts as a match.
 */
function matchesMagic(data: Buffer, magic: ArrayLike<number>, offset: number = 0): boolean {
  const available = Math.min(magic.length, data.length - offset);
  for (let i = 0; i < available; i++) {
    if (data[offset + i] !== magic[i]) {
      return false;
    }
  }
  return true;
}

/**
 * Size of an ID3v2 tag at the start of `data`
 * @returns Tag size including header and footer, 0 if not a tag, or NEED_MORE_DATA
 */
export function id3v2Size(data: Buffer): number {
  if (!matchesMagic(data, TAG_CONSTANTS.ID3V2_MAGIC)) {
    return 0;
  }
  if (data.length < TAG_CONSTANTS.ID3V2_HEADER_SIZE) {
    return NEED_MORE_DATA;
  }
  if (data[3] === 0xff || data[4] === 0xff) {
    return 0;
  }
  for (let i = 6; i < 10; i++) {
    if (data[i] >= 0x80) {
      return 0;
    }
  }

  // Synchsafe integer: 7 bits per byte
  let size =
    TAG_CONSTANTS.ID3V2_HEADER_SIZE +
    ((data[6] << 21) | (data[7] << 14) | (data[8] << 7) | data[9]);
  if (data[5] & TAG_CONSTANTS.ID3V2_FOOTER_FLAG) {
    size += TAG_CONSTANTS.ID3V2_HEADER_SIZE;
  }
  return size;
}

/**
 * Size of an ID3v1 tag starting at `offset`. The tag must be exactly the
 * last 128 bytes of the stream.
 */
export function id3v1Size(data: Buffer, eof: boolean, offset: number = 0): number {
  const length = data.length - offset;
  if (!matchesMagic(data, TAG_CONSTANTS.ID3V1_MAGIC, offset)) {
    return 0;
  }
  if (eof) {
    return length === TAG_CONSTANTS.ID3V1_SIZE ? TAG_CONSTANTS.ID3V1_SIZE : 0;
  }
  return length <= TAG_CONSTANTS.ID3V1_SIZE ? NEED_MORE_DATA : 0;
}

/**
 * Size of an APEv2 tag that starts with its header
 */
export function apev2Size(data: Buffer): number {
  if (!matchesMagic(data, TAG_CONSTANTS.APEV2_MAGIC)) {
    return 0;
  }
  if (data.length < 16) {
    return NEED_MORE_DATA;
  }
  return TAG_CONSTANTS.APEV2_HEADER_SIZE + data.readUInt32LE(12);
}

function isUpperCase(byte: number): boolean {
  return byte >= ASCII_A && byte <= ASCII_Z;
}

function readDecimal(data: Buffer, offset: number, digits: number): number | null {
  let value = 0;
  for (let i = offset; i < offset + digits; i++) {
    const byte = data[i];
    if (byte < ASCII_ZERO || byte > ASCII_NINE) {
      return null;
    }
    value = value * 10 + (byte - ASCII_ZERO);
  }
  return value;
}

type LyricsField = { kind: "field"; name: string; size: number } | { kind: "end"; size: number };

/**
 * Reads a Lyrics3 v2 field header (3-letter id + 5-digit size) or the
 * 6-digit tag size that precedes the end marker. Needs 8 bytes at `offset`.
 */
export function readLyricsField(data: Buffer, offset: number): LyricsField | null {
  if (isUpperCase(data[offset]) && isUpperCase(data[offset + 1]) && isUpperCase(data[offset + 2])) {
    const size = readDecimal(data, offset + 3, 5);
    if (size === null) {
      return null;
    }
    return { kind: "field", name: data.toString("latin1", offset, offset + 3), size };
  }

  const size = readDecimal(data, offset, 6);
  return size === null ? null : { kind: "end", size };
}

/**
 * Size of a Lyrics3 v2 tag: LYRICSBEGIN, fields, 6-digit size, LYRICS200
 */
export function lyrics3v2Size(data: Buffer): number {
  if (!matchesMagic(data, LYRICS_BEGIN)) {
    return 0;
  }

  let pos = LYRICS_BEGIN.length;
  while (pos + 8 < data.length) {
    if (pos >= TAG_CONSTANTS.LYRICS3V2_MAX_SIZE) {
      return 0;
    }

    const field = readLyricsField(data, pos);
    if (!field) {
      return 0;
    }
    if (field.kind === "end") {
      if (field.size !== pos) {
        return 0;
      }
      pos += 6;
      break;
    }
    pos += field.size + 8;
  }

  if (pos + LYRICS_200.length > data.length) {
    return NEED_MORE_DATA;
  }
  return matchesMagic(data, LYRICS_200, pos) ? pos + LYRICS_200.length : 0;
}

/**
 * Size of a Lyrics3 v1 tag, which can only be found at the end of the
 * stream (optionally followed by an ID3v1 tag)
 */
export function lyrics3v1Size(data: Buffer, eof: boolean): number {
  if (!matchesMagic(data, LYRICS_BEGIN)) {
    return 0;
  }

  let length = data.length;
  if (length > TAG_CONSTANTS.LYRICS3V1_MAX_SIZE + TAG_CONSTANTS.ID3V1_SIZE) {
    return 0;
  }
  if (!eof) {
    return NEED_MORE_DATA;
  }
  const minimum = LYRICS_BEGIN.length + LYRICS_END.length;
  if (length < minimum) {
    return 0;
  }
  if (
    length >= TAG_CONSTANTS.ID3V1_SIZE + minimum &&
    id3v1Size(data, true, length - TAG_CONSTANTS.ID3V1_SIZE) === TAG_CONSTANTS.ID3V1_SIZE
  ) {
    length -= TAG_CONSTANTS.ID3V1_SIZE;
  }

  return matchesMagic(data, LYRICS_END, length - LYRICS_END.length) ? length : 0;
}

/**
 * Identifies the tag at the start of `data`.
 * Tag types are tried in order: ID3v2, ID3v1, APEv2, Lyrics3 v2, Lyrics3 v1.
 * "need-more" is never returned once `eof` is true.
 */
export function identifyTag(data: Buffer, eof: boolean): TagMatch {
  const detectors: Array<[TagType, () => number]> = [
    [TagType.ID3v2, () => id3v2Size(data)],
    [TagType.ID3v1, () => id3v1Size(data, eof)],
    [TagType.APEv2, () => apev2Size(data)],
    [TagType.Lyrics3v2, () => lyrics3v2Size(data)],
    [TagType.Lyrics3v1, () => lyrics3v1Size(data, eof)],
  ];

  let needMore = false;
  for (const [tagType, detect] of detectors) {
    const size = detect();
    if (size > 0) {
      return { kind: "tag", tagType, size };
    }
    if (size === NEED_MORE_DATA) {
      needMore = true;
    }
  }

  return needMore && !eof ? { kind: "need-more" } : { kind: "none" };
}
