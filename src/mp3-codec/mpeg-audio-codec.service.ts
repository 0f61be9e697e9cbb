import { Injectable } from "@nestjs/common";
import { COMMON_MP3_CONSTANTS, FREE_FORMAT_CONSTANTS, TAG_CONSTANTS } from "./consts";
import { crc16 } from "./crc16";
import {
  continuesFreeFormat,
  decodeFrameHeader,
  encodeFrameHeader,
  isFrameSync,
  paddingSize,
  sideInfoSize,
} from "./frame-header";
import { SideInfo } from "./side-info";
import { id3v1Size, identifyTag } from "./tag-detector";
import {
  FrameHeader,
  GarbageItem,
  IFrameCodec,
  ItemLocation,
  Mp3Frame,
  Mp3Layer,
  Mp3TypeInfo,
  StreamItem,
  StreamItemKind,
  TagItem,
} from "./types";

/**
 * First bytes of every tag type; a garbage run stops where one of these may begin
 */
const TAG_LEAD_BYTES: ReadonlySet<number> = new Set([0x49, 0x54, 0x41, 0x4c]); // I T A L

/**
 * Outcome of sizing a free-format frame: its length, or why there is none yet
 */
type FreeFormatLength = number | "need-more" | "not-a-frame";

function matchesAt(data: Buffer, offset: number, magic: readonly number[]): boolean {
  if (offset < 0 || offset + magic.length > data.length) {
    return false;
  }
  return magic.every((byte, i) => data[offset + i] === byte);
}

/**
 * CRC-16 of a protected Layer III frame: header bytes 2-3, then the side info
 */
export function computeFrameCrc(headerBytes: Buffer, sideInfo: Buffer): number {
  return crc16(sideInfo, crc16(headerBytes.subarray(2, COMMON_MP3_CONSTANTS.FRAME_HEADER_SIZE)));
}

/**
 * Frame codec for MPEG-1, MPEG-2 and MPEG-2.5 audio streams
 * Splits a byte stream into frames, tags and unidentified bytes without
 * losing or reordering a byte, and re-serializes Layer III frames after
 * their side info has been changed.
 */
@Injectable()
export class MpegAudioCodecService implements IFrameCodec {
  /**
   * Reads the next item at the start of `data`
   * Tries, in order: a valid frame header, a tag, and otherwise unidentified
   * bytes up to the next position where a frame or tag may start
   */
  readItem(data: Buffer, eof: boolean, location: ItemLocation): StreamItem | null {
    if (data.length === 0) {
      return null;
    }
    if (data.length < COMMON_MP3_CONSTANTS.FRAME_HEADER_SIZE) {
      return eof ? this.garbage(data, data.length, location) : null;
    }

    const decoded = this.decodeValidHeader(data, 0);
    if (decoded) {
      let header = decoded;
      if (header.freeFormat) {
        const length = this.freeFormatLength(data, header, eof, location.freeFormatSize);
        if (length === "need-more") {
          return eof ? this.garbage(data, data.length, location) : null;
        }
        if (length === "not-a-frame") {
          return this.garbage(data, 1, location);
        }
        header = { ...header, frameLength: length };
      }
      if (data.length < header.frameLength) {
        return eof ? this.garbage(data, data.length, location) : null;
      }
      return this.parseFrame(data.subarray(0, header.frameLength), header, location);
    }

    const tag = identifyTag(data, eof);
    if (tag.kind === "need-more") {
      return null;
    }
    if (tag.kind === "tag") {
      if (data.length < tag.size) {
        return eof ? this.garbage(data, data.length, location) : null;
      }
      const item: TagItem = {
        kind: StreamItemKind.Tag,
        tagType: tag.tagType,
        position: location.position,
        raw: data.subarray(0, tag.size),
      };
      return item;
    }

    const next = this.findNextItemStart(data, eof);
    if (next > 0) {
      return this.garbage(data, next, location);
    }
    if (eof) {
      return this.garbage(data, data.length, location);
    }
    // The last 3 bytes may still be the start of a frame header
    const safeLength = data.length - (COMMON_MP3_CONSTANTS.FRAME_HEADER_SIZE - 1);
    return safeLength > 0 ? this.garbage(data, safeLength, location) : null;
  }

  /**
   * Serializes a frame. Layer III frames are rebuilt from their header and
   * side info; the CRC of a protected frame is recomputed only when the
   * side info was changed.
   */
  encodeFrame(frame: Mp3Frame): Buffer {
    if (!frame.sideInfo) {
      return frame.raw;
    }

    const header = encodeFrameHeader(frame.header);
    const sideInfo = frame.sideInfo.raw;
    const parts: Buffer[] = [header];

    if (frame.crc !== null) {
      const crc = frame.sideInfo.modified ? computeFrameCrc(header, sideInfo) : frame.crc;
      const crcBytes = Buffer.alloc(COMMON_MP3_CONSTANTS.CRC_SIZE);
      crcBytes.writeUInt16BE(crc, 0);
      parts.push(crcBytes);
    }

    parts.push(sideInfo, frame.body);
    return Buffer.concat(parts);
  }

  isSupportedFrame(frame: Mp3Frame): boolean {
    return frame.header.layer === Mp3Layer.Layer3;
  }

  describeFrame(frame: Mp3Frame): Mp3TypeInfo {
    const { version, layer } = frame.header;
    return { version, layer, description: `${version} ${layer}` };
  }

  /**
   * Checks if a frame is a Xing/Info/VBRI header frame (metadata, not audio)
   * The side info must be zero except for its last 2 bytes, where some
   * encoders start the tag when a CRC is present.
   */
  isVbrHeaderFrame(frame: Mp3Frame): boolean {
    if (!frame.sideInfo) {
      return false;
    }

    const sideInfo = frame.sideInfo.raw;
    for (let i = 0; i < sideInfo.length - 2; i++) {
      if (sideInfo[i] !== 0) {
        return false;
      }
    }

    const hasCrc = frame.crc !== null;
    const bodyPosition =
      COMMON_MP3_CONSTANTS.FRAME_HEADER_SIZE +
      (hasCrc ? COMMON_MP3_CONSTANTS.CRC_SIZE : 0) +
      sideInfo.length;
    // VBRI sits 36 bytes into the frame, wherever the side info ends
    const vbriOffset = COMMON_MP3_CONSTANTS.VBRI_FRAME_OFFSET - bodyPosition;
    const body = frame.body;

    if (
      matchesAt(body, 0, COMMON_MP3_CONSTANTS.XING_MAGIC) ||
      matchesAt(body, 0, COMMON_MP3_CONSTANTS.INFO_MAGIC)
    ) {
      return true;
    }
    if (vbriOffset >= 0 && matchesAt(body, vbriOffset, COMMON_MP3_CONSTANTS.VBRI_MAGIC)) {
      return true;
    }

    if (hasCrc) {
      const straddling = Buffer.concat([sideInfo.subarray(sideInfo.length - 2), body.subarray(0, 2)]);
      if (
        matchesAt(straddling, 0, COMMON_MP3_CONSTANTS.XING_MAGIC) ||
        matchesAt(straddling, 0, COMMON_MP3_CONSTANTS.INFO_MAGIC)
      ) {
        return true;
      }
      if (vbriOffset === -2 && matchesAt(straddling, 0, COMMON_MP3_CONSTANTS.VBRI_MAGIC)) {
        return true;
      }
    }

    return false;
  }

  /**
   * Decodes the header at `position` and checks that the frame is long
   * enough for its header, CRC and side info
   */
  private decodeValidHeader(data: Buffer, position: number): FrameHeader | null {
    const header = decodeFrameHeader(data, position);
    if (!header) {
      return null;
    }
    if (!header.freeFormat && header.frameLength < this.prefixLength(header)) {
      return null;
    }
    return header;
  }

  /**
   * Sizes a free-format frame. Once a stream's first free-format frame is
   * known, later ones share its unpadded size; the first is sized by the
   * next header of the same stream, searched for past the end of its main
   * data. At end of stream the frame runs to the end, less a trailing ID3v1.
   */
  private freeFormatLength(
    data: Buffer,
    header: FrameHeader,
    eof: boolean,
    knownSize: number | undefined,
  ): FreeFormatLength {
    const prefix = this.prefixLength(header);
    if (knownSize !== undefined) {
      const length = knownSize + header.padding * paddingSize(header.layerIndex);
      return length < prefix ? "not-a-frame" : length;
    }
    if (data.length < prefix) {
      return "need-more";
    }

    let searchFrom = prefix;
    if (header.layer === Mp3Layer.Layer3) {
      const size = sideInfoSize(header.versionIndex, header.channelMode);
      const sideInfo = SideInfo.fromHeader(header, data.subarray(prefix - size, prefix));
      searchFrom += Math.max(0, sideInfo.mainDataEnd);
    }

    for (let position = searchFrom; position < data.length; position++) {
      if (continuesFreeFormat(data, position, data)) {
        return position;
      }
    }

    if (data.length >= FREE_FORMAT_CONSTANTS.SEARCH_LIMIT) {
      return "not-a-frame";
    }
    if (!eof) {
      return "need-more";
    }
    const tagStart = data.length - TAG_CONSTANTS.ID3V1_SIZE;
    const length =
      tagStart >= prefix && id3v1Size(data, true, tagStart) > 0 ? tagStart : data.length;
    return length < prefix ? "not-a-frame" : length;
  }

  private prefixLength(header: FrameHeader): number {
    let length = COMMON_MP3_CONSTANTS.FRAME_HEADER_SIZE;
    if (header.protectionBit === 0) {
      length += COMMON_MP3_CONSTANTS.CRC_SIZE;
    }
    if (header.layer === Mp3Layer.Layer3) {
      length += sideInfoSize(header.versionIndex, header.channelMode);
    }
    return length;
  }

  /**
   * Position of the next valid frame header or possible tag after byte 0
   * @returns The position, or 0 if there is none in `data`
   */
  private findNextItemStart(data: Buffer, eof: boolean): number {
    for (let position = 1; position < data.length; position++) {
      const byte = data[position];
      if (byte === COMMON_MP3_CONSTANTS.SYNC_BYTE) {
        if (isFrameSync(data, position) && this.decodeValidHeader(data, position)) {
          return position;
        }
      } else if (TAG_LEAD_BYTES.has(byte)) {
        if (identifyTag(data.subarray(position), eof).kind !== "none") {
          return position;
        }
      }
    }
    return 0;
  }

  private parseFrame(raw: Buffer, header: FrameHeader, location: ItemLocation): Mp3Frame {
    let offset = COMMON_MP3_CONSTANTS.FRAME_HEADER_SIZE;

    let crc: number | null = null;
    if (header.protectionBit === 0) {
      crc = raw.readUInt16BE(offset);
      offset += COMMON_MP3_CONSTANTS.CRC_SIZE;
    }

    let sideInfo: SideInfo | null = null;
    if (header.layer === Mp3Layer.Layer3) {
      const size = sideInfoSize(header.versionIndex, header.channelMode);
      sideInfo = SideInfo.fromHeader(header, raw.subarray(offset, offset + size));
      offset += size;
    }

    const frame: Mp3Frame = {
      kind: StreamItemKind.Frame,
      position: location.position,
      raw,
      index: location.frameIndex,
      header,
      crc,
      sideInfo,
      body: raw.subarray(offset),
      isVbrHeader: false,
    };
    frame.isVbrHeader = this.isVbrHeaderFrame(frame);
    return frame;
  }

  private garbage(data: Buffer, length: number, location: ItemLocation): GarbageItem {
    return {
      kind: StreamItemKind.Garbage,
      position: location.position,
      raw: data.subarray(0, length),
    };
  }
}
