/**
 * Common MPEG audio constants shared across all versions and layers
 */
export const COMMON_MP3_CONSTANTS = {
  SYNC_BYTE: 0xff,
  SYNC_MASK: 0xe0,
  FRAME_HEADER_SIZE: 4,
  CRC_SIZE: 2,
  XING_MAGIC: [0x58, 0x69, 0x6e, 0x67] as const, // "Xing"
  INFO_MAGIC: [0x49, 0x6e, 0x66, 0x6f] as const, // "Info"
  VBRI_MAGIC: [0x56, 0x42, 0x52, 0x49] as const, // "VBRI"
  VBRI_FRAME_OFFSET: 36, // VBRI starts 32 bytes after the 4-byte header, with or without a CRC
  CHANNEL_MODE_MONO: 0x03,
} as const;

/**
 * Raw values of the 2-bit version and layer header fields
 */
export const MPEG_HEADER_VALUES = {
  VERSION_25: 0x00,
  VERSION_RESERVED: 0x01,
  VERSION_2: 0x02,
  VERSION_1: 0x03,
  LAYER_RESERVED: 0x00,
  LAYER3: 0x01,
  LAYER2: 0x02,
  LAYER1: 0x03,
  BITRATE_FREE: 0x00,
  BITRATE_BAD: 0x0f,
  SAMPLE_RATE_RESERVED: 0x03,
  EMPHASIS_RESERVED: 0x02,
} as const;

/**
 * Frame length multipliers: Layer I counts 4-byte slots, the others bytes
 */
export const FRAME_LENGTH_CONSTANTS = {
  LAYER1_MULTIPLIER: 12,
  LAYER1_SLOT_SIZE: 4,
  DEFAULT_MULTIPLIER: 144, // (144 * bitrate) / sampleRate
  LSF_LAYER3_MULTIPLIER: 72, // MPEG-2 and 2.5 Layer III carry one granule
} as const;

/**
 * Free-format streams: frames are sized by finding the next matching header
 */
export const FREE_FORMAT_CONSTANTS = {
  HEADER_MASK: 0xfc, // bitrate and sample rate bits of the third header byte
  SEARCH_LIMIT: 8192, // buffered bytes after which a missing next header means garbage
} as const;

/**
 * Bitrates in kbps indexed by the 4-bit bitrate field (0 = free format, 15 = bad)
 */
export const MPEG1_LAYER1_BITRATES = [
  0, 32, 64, 96, 128, 160, 192, 224, 256, 288, 320, 352, 384, 416, 448, 0,
] as const;

export const MPEG1_LAYER2_BITRATES = [
  0, 32, 48, 56, 64, 80, 96, 112, 128, 160, 192, 224, 256, 320, 384, 0,
] as const;

export const MPEG1_LAYER3_BITRATES = [
  0, 32, 40, 48, 56, 64, 80, 96, 112, 128, 160, 192, 224, 256, 320, 0,
] as const;

export const MPEG2_LAYER1_BITRATES = [
  0, 32, 48, 56, 64, 80, 96, 112, 128, 144, 160, 176, 192, 224, 256, 0,
] as const;

export const MPEG2_LAYER2_LAYER3_BITRATES = [
  0, 8, 16, 24, 32, 40, 48, 56, 64, 80, 96, 112, 128, 144, 160, 0,
] as const;

export const MPEG1_SAMPLE_RATES = [44100, 48000, 32000, 0] as const;
export const MPEG2_SAMPLE_RATES = [22050, 24000, 16000, 0] as const;
export const MPEG25_SAMPLE_RATES = [11025, 12000, 8000, 0] as const;

/**
 * Layer III side info layout, in bits
 */
export const SIDE_INFO_CONSTANTS = {
  MPEG1_MONO_SIZE: 17,
  MPEG1_STEREO_SIZE: 32,
  LSF_MONO_SIZE: 9,
  LSF_STEREO_SIZE: 17,
  MPEG1_MONO_FIRST_GRANULE: 18, // main_data_begin(9) + private(5) + scfsi(4)
  MPEG1_STEREO_FIRST_GRANULE: 20, // main_data_begin(9) + private(3) + scfsi(2x4)
  LSF_MONO_FIRST_GRANULE: 9, // main_data_begin(8) + private(1)
  LSF_STEREO_FIRST_GRANULE: 10, // main_data_begin(8) + private(2)
  MPEG1_GRANULE_BITS: 59,
  LSF_GRANULE_BITS: 63,
  MPEG1_GRANULES: 2,
  LSF_GRANULES: 1,
  MPEG1_MAIN_DATA_BEGIN_BITS: 9,
  LSF_MAIN_DATA_BEGIN_BITS: 8,
  PART2_3_LENGTH_BITS: 12, // first field of each granule block
  GLOBAL_GAIN_OFFSET: 21, // part2_3_length(12) + big_values(9)
  GLOBAL_GAIN_BITS: 8,
} as const;

/**
 * Tag magic numbers and fixed sizes
 */
export const TAG_CONSTANTS = {
  ID3V2_MAGIC: [0x49, 0x44, 0x33] as const, // "ID3"
  ID3V2_HEADER_SIZE: 10,
  ID3V2_FOOTER_FLAG: 0x10,
  ID3V1_MAGIC: [0x54, 0x41, 0x47] as const, // "TAG"
  ID3V1_SIZE: 128,
  APEV2_MAGIC: [0x41, 0x50, 0x45, 0x54, 0x41, 0x47, 0x45, 0x58] as const, // "APETAGEX"
  APEV2_HEADER_SIZE: 32,
  LYRICS_BEGIN: "LYRICSBEGIN",
  LYRICS_END: "LYRICSEND",
  LYRICS_200: "LYRICS200",
  LYRICS3V1_MAX_SIZE: 5120,
  LYRICS3V2_MAX_SIZE: 0x80000,
} as const;

/**
 * Defaults for the stream item iterator
 */
export const ITERATOR_DEFAULTS = {
  MAX_SYNC_BUFFER_SIZE: 16 * 1024 * 1024,
} as const;
