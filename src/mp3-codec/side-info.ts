import { readBits, writeBits } from "./bitfield";
import { MPEG_HEADER_VALUES, SIDE_INFO_CONSTANTS } from "./consts";
import { isMono, sideInfoSize } from "./frame-header";
import { InvalidFieldValueError } from "./mp3-codec.errors";
import { FrameHeader } from "./types";

interface SideInfoLayout {
  size: number;
  channelCount: number;
  granuleCount: number;
  firstGranuleBit: number;
  granuleBits: number;
  mainDataBeginBits: number;
}

function layoutFor(header: FrameHeader): SideInfoLayout {
  const mpeg1 = header.versionIndex === MPEG_HEADER_VALUES.VERSION_1;
  const mono = isMono(header);
  let firstGranuleBit: number;
  if (mpeg1) {
    firstGranuleBit = mono
      ? SIDE_INFO_CONSTANTS.MPEG1_MONO_FIRST_GRANULE
      : SIDE_INFO_CONSTANTS.MPEG1_STEREO_FIRST_GRANULE;
  } else {
    firstGranuleBit = mono
      ? SIDE_INFO_CONSTANTS.LSF_MONO_FIRST_GRANULE
      : SIDE_INFO_CONSTANTS.LSF_STEREO_FIRST_GRANULE;
  }
  return {
    size: sideInfoSize(header.versionIndex, header.channelMode),
    channelCount: mono ? 1 : 2,
    granuleCount: mpeg1 ? SIDE_INFO_CONSTANTS.MPEG1_GRANULES : SIDE_INFO_CONSTANTS.LSF_GRANULES,
    firstGranuleBit,
    granuleBits: mpeg1 ? SIDE_INFO_CONSTANTS.MPEG1_GRANULE_BITS : SIDE_INFO_CONSTANTS.LSF_GRANULE_BITS,
    mainDataBeginBits: mpeg1
      ? SIDE_INFO_CONSTANTS.MPEG1_MAIN_DATA_BEGIN_BITS
      : SIDE_INFO_CONSTANTS.LSF_MAIN_DATA_BEGIN_BITS,
  };
}

/**
 * One granule of one channel. Exposes the main data length and the global gain.
 */
export class Granule {
  constructor(
    private readonly owner: SideInfo,
    /** Bit offset of the granule block within the side info */
    readonly bitOffset: number,
  ) {}

  /**
   * Bits of main data (scale factors and Huffman code) in this granule
   */
  get part23Length(): number {
    return this.owner.readBits(this.bitOffset, SIDE_INFO_CONSTANTS.PART2_3_LENGTH_BITS);
  }

  get globalGain(): number {
    return this.owner.readBits(
      this.bitOffset + SIDE_INFO_CONSTANTS.GLOBAL_GAIN_OFFSET,
      SIDE_INFO_CONSTANTS.GLOBAL_GAIN_BITS,
    );
  }

  /**
   * @throws InvalidFieldValueError unless the value is an integer in [0, 255]
   */
  set globalGain(value: number) {
    if (!Number.isInteger(value) || value < 0 || value > 255) {
      throw new InvalidFieldValueError(`Global gain must be an integer in [0, 255], got ${value}`);
    }
    if (value === this.globalGain) {
      return;
    }
    this.owner.writeBits(
      this.bitOffset + SIDE_INFO_CONSTANTS.GLOBAL_GAIN_OFFSET,
      SIDE_INFO_CONSTANTS.GLOBAL_GAIN_BITS,
      value,
    );
  }
}

export interface SideInfoChannel {
  granules: readonly Granule[];
}

/**
 * Layer III side info over a private copy of its bytes.
 * Blocks are stored granule-major: gr0/ch0, gr0/ch1, gr1/ch0, gr1/ch1.
 */
export class SideInfo {
  readonly channels: readonly SideInfoChannel[];
  private readonly bytes: Buffer;
  private readonly mainDataBeginBits: number;
  private dirty = false;

  private constructor(bytes: Buffer, layout: SideInfoLayout) {
    this.bytes = Buffer.from(bytes);
    this.mainDataBeginBits = layout.mainDataBeginBits;

    const channels: SideInfoChannel[] = [];
    for (let ch = 0; ch < layout.channelCount; ch++) {
      const granules: Granule[] = [];
      for (let gr = 0; gr < layout.granuleCount; gr++) {
        const block = gr * layout.channelCount + ch;
        granules.push(new Granule(this, layout.firstGranuleBit + block * layout.granuleBits));
      }
      channels.push({ granules });
    }
    this.channels = channels;
  }

  /**
   * Parses the side info that follows the header (and CRC) of a Layer III frame
   * @param bytes - Side info bytes; must be exactly the size the header implies
   */
  static fromHeader(header: FrameHeader, bytes: Buffer): SideInfo {
    const layout = layoutFor(header);
    if (bytes.length !== layout.size) {
      throw new RangeError(`Side info must be ${layout.size} bytes, got ${bytes.length}`);
    }
    return new SideInfo(bytes, layout);
  }

  get size(): number {
    return this.bytes.length;
  }

  /**
   * True once any field has been changed to a different value
   */
  get modified(): boolean {
    return this.dirty;
  }

  /**
   * Copy of the current side info bytes
   */
  get raw(): Buffer {
    return Buffer.from(this.bytes);
  }

  /**
   * Back-pointer, in bytes, to where this frame's main data begins in the
   * bit reservoir of earlier frames
   */
  get mainDataBegin(): number {
    return this.readBits(0, this.mainDataBeginBits);
  }

  /**
   * Bytes this frame's main data extends past the end of its side info
   * Negative when the main data lies entirely within earlier frames.
   */
  get mainDataEnd(): number {
    const bits = this.granulesInStreamOrder().reduce((sum, granule) => sum + granule.part23Length, 0);
    return Math.ceil(bits / 8) - this.mainDataBegin;
  }

  /**
   * Every granule in stream order (granule-major)
   */
  granulesInStreamOrder(): Granule[] {
    return this.channels
      .flatMap((channel) => channel.granules)
      .sort((a, b) => a.bitOffset - b.bitOffset);
  }

  readBits(bitOffset: number, bitCount: number): number {
    return readBits(this.bytes, bitOffset, bitCount);
  }

  writeBits(bitOffset: number, bitCount: number, value: number): void {
    if (readBits(this.bytes, bitOffset, bitCount) === value) {
      return;
    }
    writeBits(this.bytes, bitOffset, bitCount, value);
    this.dirty = true;
  }
}
