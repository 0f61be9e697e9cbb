import { Readable, Writable } from "stream";
import { writeBits } from "../../src/mp3-codec/bitfield";
import { MpegAudioCodecService } from "../../src/mp3-codec/mpeg-audio-codec.service";
import { GarbageItem, Mp3Frame, StreamItemKind, isFrame } from "../../src/mp3-codec/types";

/** MPEG-1 Layer III, 128 kbps, 44.1 kHz, stereo, no CRC: 417 bytes */
export const MPEG1_STEREO_HEADER = [0xff, 0xfb, 0x90, 0x00];
/** Same, mono */
export const MPEG1_MONO_HEADER = [0xff, 0xfb, 0x90, 0xc0];
/** Same as MPEG1_STEREO_HEADER with a CRC */
export const MPEG1_PROTECTED_HEADER = [0xff, 0xfa, 0x90, 0x00];
/** Same as MPEG1_MONO_HEADER with a CRC */
export const MPEG1_PROTECTED_MONO_HEADER = [0xff, 0xfa, 0x90, 0xc0];
/** MPEG-2 Layer III, 80 kbps, 22.05 kHz, stereo: 261 bytes */
export const MPEG2_STEREO_HEADER = [0xff, 0xf3, 0x90, 0x00];
/** MPEG-1 Layer II, 160 kbps, 44.1 kHz, stereo: 522 bytes */
export const LAYER2_HEADER = [0xff, 0xfd, 0x90, 0x00];
/** MPEG-1 Layer III, free format, 44.1 kHz, stereo: built 300 bytes long */
export const FREE_FORMAT_HEADER = [0xff, 0xfb, 0x00, 0x00];
/** Same with the padding bit: 301 bytes */
export const FREE_FORMAT_PADDED_HEADER = [0xff, 0xfb, 0x02, 0x00];

interface Layout {
  length: number;
  sideInfoSize: number;
  /** Bit offsets of the global gain fields within the side info, in stream order */
  gainBits: number[];
}

const LAYOUTS: Record<string, Layout> = {
  "ff-fb-90-00": { length: 417, sideInfoSize: 32, gainBits: [41, 100, 159, 218] },
  "ff-fb-90-c0": { length: 417, sideInfoSize: 17, gainBits: [39, 98] },
  "ff-fa-90-00": { length: 417, sideInfoSize: 32, gainBits: [41, 100, 159, 218] },
  "ff-fa-90-c0": { length: 417, sideInfoSize: 17, gainBits: [39, 98] },
  "ff-f3-90-00": { length: 261, sideInfoSize: 17, gainBits: [31, 94] },
  "ff-fd-90-00": { length: 522, sideInfoSize: 0, gainBits: [] },
  "ff-fb-00-00": { length: 300, sideInfoSize: 32, gainBits: [41, 100, 159, 218] },
  "ff-fb-02-00": { length: 301, sideInfoSize: 32, gainBits: [41, 100, 159, 218] },
};

export interface FrameOptions {
  header?: number[];
  /** Global gain of each granule, in stream order */
  gains?: number[];
  /** Byte used for the frame body */
  fill?: number;
  /** Stored CRC for protected frames */
  crc?: number;
  /** Writes a VBR tag and leaves the side info zero */
  vbrTag?: "Xing" | "Info" | "VBRI";
}

function layoutOf(header: number[]): Layout {
  const key = header.map((byte) => byte.toString(16).padStart(2, "0")).join("-");
  const layout = LAYOUTS[key];
  if (!layout) {
    throw new Error(`No fixture layout for header ${key}`);
  }
  return layout;
}

export function frameLength(header: number[] = MPEG1_STEREO_HEADER): number {
  return layoutOf(header).length;
}

/**
 * Builds a synthetic frame. The side info is zero apart from the gains.
 */
export function buildFrame(options: FrameOptions = {}): Buffer {
  const header = options.header ?? MPEG1_STEREO_HEADER;
  const layout = layoutOf(header);
  const frame = Buffer.alloc(layout.length, options.fill ?? 0x55);
  Buffer.from(header).copy(frame, 0);

  const isProtected = (header[1] & 0x01) === 0;
  const sideInfoStart = isProtected ? 6 : 4;
  if (isProtected) {
    frame.writeUInt16BE(options.crc ?? 0xbeef, 4);
  }

  frame.fill(0, sideInfoStart, sideInfoStart + layout.sideInfoSize);
  const sideInfo = frame.subarray(sideInfoStart, sideInfoStart + layout.sideInfoSize);

  if (options.vbrTag) {
    const bodyStart = sideInfoStart + layout.sideInfoSize;
    // VBRI sits 32 bytes after the header
    const tagStart = options.vbrTag === "VBRI" ? 4 + 32 : bodyStart;
    frame.write(options.vbrTag, tagStart, "latin1");
    return frame;
  }

  const gains = options.gains ?? layout.gainBits.map(() => 150);
  gains.forEach((gain, i) => writeBits(sideInfo, layout.gainBits[i], 8, gain));
  return frame;
}

/**
 * Reads the global gains of a frame directly from its bytes
 */
export function gainsOf(frame: Buffer): number[] {
  const header = Array.from(frame.subarray(0, 4));
  const layout = layoutOf(header);
  const sideInfoStart = (header[1] & 0x01) === 0 ? 6 : 4;
  const sideInfo = frame.subarray(sideInfoStart, sideInfoStart + layout.sideInfoSize);
  return layout.gainBits.map((bit) => {
    let value = 0;
    for (let i = 0; i < 8; i++) {
      const b = bit + i;
      value = (value << 1) | ((sideInfo[b >> 3] >> (7 - (b & 7))) & 1);
    }
    return value;
  });
}

/**
 * Parses a single frame buffer into a frame item
 */
export function frameItem(
  codec: MpegAudioCodecService,
  bytes: Buffer,
  frameIndex: number,
  position: number = 0,
): Mp3Frame {
  const item = codec.readItem(bytes, true, { position, frameIndex });
  if (!item || !isFrame(item)) {
    throw new Error("Fixture bytes are not a frame");
  }
  return item;
}

export function garbageItem(bytes: Buffer, position: number = 0): GarbageItem {
  return { kind: StreamItemKind.Garbage, position, raw: bytes };
}

/**
 * ID3v2 tag with a zero-filled body
 */
export function buildId3v2(bodySize: number): Buffer {
  const tag = Buffer.alloc(10 + bodySize);
  tag.write("ID3", 0, "latin1");
  tag[3] = 0x03;
  tag[6] = (bodySize >> 21) & 0x7f;
  tag[7] = (bodySize >> 14) & 0x7f;
  tag[8] = (bodySize >> 7) & 0x7f;
  tag[9] = bodySize & 0x7f;
  return tag;
}

export function buildId3v1(title: string = "test title"): Buffer {
  const tag = Buffer.alloc(128);
  tag.write("TAG", 0, "latin1");
  tag.write(title, 3, "latin1");
  return tag;
}

/**
 * Readable that emits `data` in chunks of `chunkSize` bytes
 */
export function chunkedStream(data: Buffer, chunkSize: number = data.length || 1): Readable {
  const chunks: Buffer[] = [];
  for (let i = 0; i < data.length; i += chunkSize) {
    chunks.push(data.subarray(i, i + chunkSize));
  }

  return new Readable({
    read() {
      const chunk = chunks.shift();
      if (chunk) {
        this.push(chunk);
      } else {
        this.push(null);
      }
    },
  });
}

export interface BufferSink {
  sink: Writable;
  data(): Buffer;
}

export function createBufferSink(): BufferSink {
  const chunks: Buffer[] = [];
  const sink = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      chunks.push(chunk);
      callback();
    },
  });
  return { sink, data: () => Buffer.concat(chunks) };
}
