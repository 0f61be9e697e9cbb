import type { SideInfo } from "./side-info";

/**
 * MPEG version enum
 */
export enum Mp3Version {
  MPEG1 = "MPEG-1",
  MPEG2 = "MPEG-2",
  MPEG25 = "MPEG-2.5",
  Unknown = "Unknown",
}

/**
 * MPEG layer enum
 */
export enum Mp3Layer {
  Layer1 = "Layer 1",
  Layer2 = "Layer 2",
  Layer3 = "Layer 3",
  Unknown = "Unknown",
}

export enum ChannelMode {
  Stereo = 0,
  JointStereo = 1,
  DualChannel = 2,
  Mono = 3,
}

/**
 * MP3 format description of a frame
 */
export interface Mp3TypeInfo {
  version: Mp3Version;
  layer: Mp3Layer;
  description: string;
}

/**
 * Decoded 4-byte MPEG audio frame header.
 * The *Index fields hold the raw bit values; the rest are derived from them.
 */
export interface FrameHeader {
  versionIndex: number;
  layerIndex: number;
  protectionBit: number;
  bitrateIndex: number;
  sampleRateIndex: number;
  padding: number;
  privateBit: number;
  channelMode: ChannelMode;
  modeExtension: number;
  copyright: number;
  original: number;
  emphasis: number;

  version: Mp3Version;
  layer: Mp3Layer;
  /** Bitrate in bits per second */
  bitrate: number;
  /** Sample rate in Hz */
  sampleRate: number;
  /**
   * True for the free-format bitrate index. The bitrate is then 0, and the
   * frame length is 0 until the codec sizes the frame from the next header.
   */
  freeFormat: boolean;
  /** Total frame length in bytes, header included */
  frameLength: number;
}

export enum StreamItemKind {
  Frame = "frame",
  Tag = "tag",
  Garbage = "garbage",
}

export enum TagType {
  ID3v2 = "id3v2",
  ID3v1 = "id3v1",
  APEv2 = "apev2",
  Lyrics3v1 = "lyrics3v1",
  Lyrics3v2 = "lyrics3v2",
}

interface StreamItemBase {
  /**
   * Byte offset of the item in the input stream
   */
  position: number;

  /**
   * Bytes to write for this item. Concatenating the raw bytes of every item
   * read from a stream reproduces the stream.
   */
  raw: Buffer;
}

/**
 * A physical MPEG audio frame
 */
export interface Mp3Frame extends StreamItemBase {
  kind: StreamItemKind.Frame;

  /**
   * 0-based sequence number among the frames of the stream
   */
  index: number;

  header: FrameHeader;

  /**
   * CRC-16 stored after the header, or null for unprotected frames
   */
  crc: number | null;

  /**
   * Layer III side info; null for Layer I and II frames
   */
  sideInfo: SideInfo | null;

  /**
   * Frame bytes following the header, CRC and side info
   */
  body: Buffer;

  /**
   * True for Xing/Info/VBRI header frames (bookkeeping, no audio)
   */
  isVbrHeader: boolean;
}

export interface TagItem extends StreamItemBase {
  kind: StreamItemKind.Tag;
  tagType: TagType;
}

/**
 * Bytes that are neither a frame nor a recognised tag
 */
export interface GarbageItem extends StreamItemBase {
  kind: StreamItemKind.Garbage;
}

export type OtherItem = TagItem | GarbageItem;

export type StreamItem = Mp3Frame | OtherItem;

/**
 * Where the next item starts, supplied by the iterator to the codec
 */
export interface ItemLocation {
  position: number;
  frameIndex: number;
  /**
   * Unpadded length of the free-format frames read so far; unset until the
   * first one has been sized
   */
  freeFormatSize?: number;
}

/**
 * Interface for iterating through the items of an MP3 stream
 */
export interface IItemIterator {
  /**
   * Gets the next item from the iterator
   * @returns Promise that resolves to the next item, or null at end of stream
   */
  next(): Promise<StreamItem | null>;
}

/**
 * Splits raw bytes into stream items and serializes frames back to bytes
 */
export interface IFrameCodec {
  /**
   * Reads the item at the start of `data`.
   * @param data - Buffered, not yet consumed bytes
   * @param eof - True when no more bytes will follow `data`
   * @param location - Stream position and frame number of `data[0]`
   * @returns The item (whose raw length is the number of bytes to consume),
   * or null when more data is needed (or `data` is empty)
   */
  readItem(data: Buffer, eof: boolean, location: ItemLocation): StreamItem | null;

  /**
   * Serializes a frame, including any change made to its side info
   */
  encodeFrame(frame: Mp3Frame): Buffer;

  /**
   * Whether the fade pipeline can adjust this frame
   */
  isSupportedFrame(frame: Mp3Frame): boolean;

  /**
   * Human-readable description of a frame's format
   */
  describeFrame(frame: Mp3Frame): Mp3TypeInfo;
}

export function isFrame(item: StreamItem): item is Mp3Frame {
  return item.kind === StreamItemKind.Frame;
}
