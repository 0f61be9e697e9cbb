import {
  COMMON_MP3_CONSTANTS,
  FRAME_LENGTH_CONSTANTS,
  FREE_FORMAT_CONSTANTS,
  MPEG_HEADER_VALUES,
  MPEG1_LAYER1_BITRATES,
  MPEG1_LAYER2_BITRATES,
  MPEG1_LAYER3_BITRATES,
  MPEG2_LAYER1_BITRATES,
  MPEG2_LAYER2_LAYER3_BITRATES,
  MPEG1_SAMPLE_RATES,
  MPEG2_SAMPLE_RATES,
  MPEG25_SAMPLE_RATES,
  SIDE_INFO_CONSTANTS,
} from "./consts";
import { InvalidFieldValueError } from "./mp3-codec.errors";
import { ChannelMode, FrameHeader, Mp3Layer, Mp3Version } from "./types";

/**
 * Map from MPEG version bit value to Mp3Version enum
 */
const VERSION_MAP: ReadonlyMap<number, Mp3Version> = new Map([
  [MPEG_HEADER_VALUES.VERSION_25, Mp3Version.MPEG25],
  [MPEG_HEADER_VALUES.VERSION_RESERVED, Mp3Version.Unknown],
  [MPEG_HEADER_VALUES.VERSION_2, Mp3Version.MPEG2],
  [MPEG_HEADER_VALUES.VERSION_1, Mp3Version.MPEG1],
]);

/**
 * Map from MPEG layer bit value to Mp3Layer enum
 */
const LAYER_MAP: ReadonlyMap<number, Mp3Layer> = new Map([
  [MPEG_HEADER_VALUES.LAYER_RESERVED, Mp3Layer.Unknown],
  [MPEG_HEADER_VALUES.LAYER3, Mp3Layer.Layer3],
  [MPEG_HEADER_VALUES.LAYER2, Mp3Layer.Layer2],
  [MPEG_HEADER_VALUES.LAYER1, Mp3Layer.Layer1],
]);

export function getVersionName(versionIndex: number): Mp3Version {
  return VERSION_MAP.get(versionIndex) ?? Mp3Version.Unknown;
}

export function getLayerName(layerIndex: number): Mp3Layer {
  return LAYER_MAP.get(layerIndex) ?? Mp3Layer.Unknown;
}

function bitrateTable(versionIndex: number, layerIndex: number): readonly number[] | null {
  const isMpeg1 = versionIndex === MPEG_HEADER_VALUES.VERSION_1;
  switch (layerIndex) {
    case MPEG_HEADER_VALUES.LAYER1:
      return isMpeg1 ? MPEG1_LAYER1_BITRATES : MPEG2_LAYER1_BITRATES;
    case MPEG_HEADER_VALUES.LAYER2:
      return isMpeg1 ? MPEG1_LAYER2_BITRATES : MPEG2_LAYER2_LAYER3_BITRATES;
    case MPEG_HEADER_VALUES.LAYER3:
      return isMpeg1 ? MPEG1_LAYER3_BITRATES : MPEG2_LAYER2_LAYER3_BITRATES;
    default:
      return null;
  }
}

function sampleRateTable(versionIndex: number): readonly number[] | null {
  switch (versionIndex) {
    case MPEG_HEADER_VALUES.VERSION_1:
      return MPEG1_SAMPLE_RATES;
    case MPEG_HEADER_VALUES.VERSION_2:
      return MPEG2_SAMPLE_RATES;
    case MPEG_HEADER_VALUES.VERSION_25:
      return MPEG25_SAMPLE_RATES;
    default:
      return null;
  }
}

/**
 * Bitrate in bits per second, or 0 for reserved, bad and free-format values
 */
export function lookupBitrate(
  versionIndex: number,
  layerIndex: number,
  bitrateIndex: number,
): number {
  const table = bitrateTable(versionIndex, layerIndex);
  if (!table || sampleRateTable(versionIndex) === null) {
    return 0;
  }
  return (table[bitrateIndex] ?? 0) * 1000;
}

/**
 * Sample rate in Hz, or 0 for reserved values
 */
export function lookupSampleRate(versionIndex: number, sampleRateIndex: number): number {
  return sampleRateTable(versionIndex)?.[sampleRateIndex] ?? 0;
}

/**
 * Calculates frame length in bytes (lightweight, no validation)
 * @returns Frame length in bytes, or 0 if the fields are invalid (no exceptions thrown)
 */
export function calculateFrameLength(
  versionIndex: number,
  layerIndex: number,
  bitrateIndex: number,
  sampleRateIndex: number,
  padding: number,
): number {
  const bitrate = lookupBitrate(versionIndex, layerIndex, bitrateIndex);
  const sampleRate = lookupSampleRate(versionIndex, sampleRateIndex);
  if (bitrate === 0 || sampleRate === 0) {
    return 0;
  }

  if (layerIndex === MPEG_HEADER_VALUES.LAYER1) {
    const slots = Math.floor((FRAME_LENGTH_CONSTANTS.LAYER1_MULTIPLIER * bitrate) / sampleRate);
    return (slots + padding) * FRAME_LENGTH_CONSTANTS.LAYER1_SLOT_SIZE;
  }

  const multiplier =
    layerIndex === MPEG_HEADER_VALUES.LAYER3 && versionIndex !== MPEG_HEADER_VALUES.VERSION_1
      ? FRAME_LENGTH_CONSTANTS.LSF_LAYER3_MULTIPLIER
      : FRAME_LENGTH_CONSTANTS.DEFAULT_MULTIPLIER;

  return Math.floor((multiplier * bitrate) / sampleRate) + padding;
}

/**
 * Layer III side info size in bytes for a version and channel mode
 */
export function sideInfoSize(versionIndex: number, channelMode: number): number {
  const mono = channelMode === COMMON_MP3_CONSTANTS.CHANNEL_MODE_MONO;
  if (versionIndex === MPEG_HEADER_VALUES.VERSION_1) {
    return mono ? SIDE_INFO_CONSTANTS.MPEG1_MONO_SIZE : SIDE_INFO_CONSTANTS.MPEG1_STEREO_SIZE;
  }
  return mono ? SIDE_INFO_CONSTANTS.LSF_MONO_SIZE : SIDE_INFO_CONSTANTS.LSF_STEREO_SIZE;
}

/**
 * Checks if a position contains a frame sync pattern:
 * 0xFF followed by a byte with its top 3 bits set
 */
export function isFrameSync(buffer: Buffer, position: number): boolean {
  return (
    position + 1 < buffer.length &&
    buffer[position] === COMMON_MP3_CONSTANTS.SYNC_BYTE &&
    (buffer[position + 1] & COMMON_MP3_CONSTANTS.SYNC_MASK) === COMMON_MP3_CONSTANTS.SYNC_MASK
  );
}

/**
 * Decodes the 4 header bytes at `position`
 * A free-format header decodes with a bitrate and frame length of 0; its
 * length is only known once the next header has been found.
 * @returns The header, or null if there is no sync word or a field holds a
 * reserved value
 */
export function decodeFrameHeader(buffer: Buffer, position: number = 0): FrameHeader | null {
  if (
    position + COMMON_MP3_CONSTANTS.FRAME_HEADER_SIZE > buffer.length ||
    !isFrameSync(buffer, position)
  ) {
    return null;
  }

  const b1 = buffer[position + 1];
  const b2 = buffer[position + 2];
  const b3 = buffer[position + 3];

  const versionIndex = (b1 >> 3) & 0x03;
  const layerIndex = (b1 >> 1) & 0x03;
  const bitrateIndex = (b2 >> 4) & 0x0f;
  const sampleRateIndex = (b2 >> 2) & 0x03;
  const padding = (b2 >> 1) & 0x01;
  const emphasis = b3 & 0x03;

  if (
    versionIndex === MPEG_HEADER_VALUES.VERSION_RESERVED ||
    layerIndex === MPEG_HEADER_VALUES.LAYER_RESERVED ||
    bitrateIndex === MPEG_HEADER_VALUES.BITRATE_BAD ||
    sampleRateIndex === MPEG_HEADER_VALUES.SAMPLE_RATE_RESERVED ||
    emphasis === MPEG_HEADER_VALUES.EMPHASIS_RESERVED
  ) {
    return null;
  }

  const freeFormat = bitrateIndex === MPEG_HEADER_VALUES.BITRATE_FREE;
  const frameLength = calculateFrameLength(
    versionIndex,
    layerIndex,
    bitrateIndex,
    sampleRateIndex,
    padding,
  );
  if (frameLength === 0 && !freeFormat) {
    return null;
  }

  return {
    versionIndex,
    layerIndex,
    protectionBit: b1 & 0x01,
    bitrateIndex,
    sampleRateIndex,
    padding,
    privateBit: b2 & 0x01,
    channelMode: (b3 >> 6) & 0x03,
    modeExtension: (b3 >> 4) & 0x03,
    copyright: (b3 >> 3) & 0x01,
    original: (b3 >> 2) & 0x01,
    emphasis,
    version: getVersionName(versionIndex),
    layer: getLayerName(layerIndex),
    bitrate: lookupBitrate(versionIndex, layerIndex, bitrateIndex),
    sampleRate: lookupSampleRate(versionIndex, sampleRateIndex),
    freeFormat,
    frameLength,
  };
}

/**
 * Bytes added by the padding bit: one Layer I slot (4 bytes), else 1 byte
 */
export function paddingSize(layerIndex: number): number {
  return layerIndex === MPEG_HEADER_VALUES.LAYER1 ? FRAME_LENGTH_CONSTANTS.LAYER1_SLOT_SIZE : 1;
}

/**
 * Frame length without the padding slot
 */
export function unpaddedFrameLength(header: FrameHeader): number {
  return header.frameLength - header.padding * paddingSize(header.layerIndex);
}

/**
 * Checks for a header at `position` that continues the free-format stream
 * started by `first`: same version, layer, protection, bitrate and sample
 * rate. Padding, private bit and the last header byte may differ.
 */
export function continuesFreeFormat(buffer: Buffer, position: number, first: Buffer): boolean {
  return (
    position + COMMON_MP3_CONSTANTS.FRAME_HEADER_SIZE <= buffer.length &&
    buffer[position] === COMMON_MP3_CONSTANTS.SYNC_BYTE &&
    buffer[position + 1] === first[1] &&
    (buffer[position + 2] & FREE_FORMAT_CONSTANTS.HEADER_MASK) ===
      (first[2] & FREE_FORMAT_CONSTANTS.HEADER_MASK)
  );
}

function field(name: string, value: number, max: number): number {
  if (!Number.isInteger(value) || value < 0 || value > max) {
    throw new InvalidFieldValueError(`${name} value out of range: ${value}`);
  }
  return value;
}

/**
 * Rebuilds the 4 header bytes from the raw fields of a header
 * @throws InvalidFieldValueError if a field does not fit its bit width
 */
export function encodeFrameHeader(header: FrameHeader): Buffer {
  const bytes = Buffer.alloc(COMMON_MP3_CONSTANTS.FRAME_HEADER_SIZE);
  bytes[0] = COMMON_MP3_CONSTANTS.SYNC_BYTE;
  bytes[1] =
    COMMON_MP3_CONSTANTS.SYNC_MASK |
    (field("versionIndex", header.versionIndex, 3) << 3) |
    (field("layerIndex", header.layerIndex, 3) << 1) |
    field("protectionBit", header.protectionBit, 1);
  bytes[2] =
    (field("bitrateIndex", header.bitrateIndex, 15) << 4) |
    (field("sampleRateIndex", header.sampleRateIndex, 3) << 2) |
    (field("padding", header.padding, 1) << 1) |
    field("privateBit", header.privateBit, 1);
  bytes[3] =
    (field("channelMode", header.channelMode, 3) << 6) |
    (field("modeExtension", header.modeExtension, 3) << 4) |
    (field("copyright", header.copyright, 1) << 3) |
    (field("original", header.original, 1) << 2) |
    field("emphasis", header.emphasis, 3);
  return bytes;
}

export function isMono(header: FrameHeader): boolean {
  return header.channelMode === ChannelMode.Mono;
}
