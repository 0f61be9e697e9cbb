import { Test, TestingModule } from "@nestjs/testing";
import { writeBits } from "../src/mp3-codec/bitfield";
import { crc16 } from "../src/mp3-codec/crc16";
import { Mp3CodecModule } from "../src/mp3-codec/mp3-codec.module";
import { MpegAudioCodecService, computeFrameCrc } from "../src/mp3-codec/mpeg-audio-codec.service";
import { Mp3Layer, Mp3Version, StreamItem, StreamItemKind, TagType } from "../src/mp3-codec/types";
import {
  FREE_FORMAT_HEADER,
  FREE_FORMAT_PADDED_HEADER,
  LAYER2_HEADER,
  MPEG1_MONO_HEADER,
  MPEG1_PROTECTED_HEADER,
  MPEG1_PROTECTED_MONO_HEADER,
  MPEG2_STEREO_HEADER,
  buildFrame,
  buildId3v1,
  buildId3v2,
  frameItem,
  gainsOf,
} from "./helpers/mp3-fixtures";

const START = { position: 0, frameIndex: 0 };

describe("MpegAudioCodecService", () => {
  let codec: MpegAudioCodecService;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      imports: [Mp3CodecModule],
    }).compile();

    codec = module.get<MpegAudioCodecService>(MpegAudioCodecService);
  });

  function read(data: Buffer, eof: boolean): StreamItem | null {
    return codec.readItem(data, eof, START);
  }

  describe("readItem", () => {
    it("should return null for empty data", () => {
      expect(read(Buffer.alloc(0), true)).toBeNull();
    });

    it("should parse a Layer III frame", () => {
      const bytes = buildFrame({ gains: [10, 20, 30, 40] });

      const item = codec.readItem(Buffer.concat([bytes, buildFrame()]), false, {
        position: 1000,
        frameIndex: 7,
      });

      expect(item).toMatchObject({
        kind: StreamItemKind.Frame,
        position: 1000,
        index: 7,
        crc: null,
        isVbrHeader: false,
      });
      if (item?.kind !== StreamItemKind.Frame) {
        throw new Error("Expected a frame");
      }
      expect(item.raw).toEqual(bytes);
      expect(item.body).toHaveLength(417 - 4 - 32);
      expect(item.sideInfo?.granulesInStreamOrder().map((gr) => gr.globalGain)).toEqual([10, 20, 30, 40]);
    });

    it("should read the CRC of a protected frame", () => {
      const item = frameItem(codec, buildFrame({ header: MPEG1_PROTECTED_HEADER, crc: 0x1234 }), 0);

      expect(item.crc).toBe(0x1234);
      expect(item.sideInfo?.size).toBe(32);
      expect(item.body).toHaveLength(417 - 6 - 32);
    });

    it("should parse an MPEG-2 Layer III frame", () => {
      const item = frameItem(codec, buildFrame({ header: MPEG2_STEREO_HEADER, gains: [1, 2] }), 0);

      expect(item.header.version).toBe(Mp3Version.MPEG2);
      expect(item.raw).toHaveLength(261);
      expect(item.sideInfo?.granulesInStreamOrder().map((gr) => gr.globalGain)).toEqual([1, 2]);
    });

    it("should parse a Layer II frame without side info", () => {
      const item = frameItem(codec, buildFrame({ header: LAYER2_HEADER }), 0);

      expect(item.header.layer).toBe(Mp3Layer.Layer2);
      expect(item.sideInfo).toBeNull();
      expect(item.body).toHaveLength(522 - 4);
    });

    it("should wait for the rest of a frame", () => {
      const partial = buildFrame().subarray(0, 200);

      expect(read(partial, false)).toBeNull();
      expect(read(Buffer.from([0xff, 0xfb]), false)).toBeNull();
    });

    it("should return a truncated frame at end of stream as garbage", () => {
      const partial = buildFrame().subarray(0, 200);

      expect(read(partial, true)).toEqual({ kind: StreamItemKind.Garbage, position: 0, raw: partial });
      expect(read(Buffer.from([0xff, 0xfb]), true)).toEqual({
        kind: StreamItemKind.Garbage,
        position: 0,
        raw: Buffer.from([0xff, 0xfb]),
      });
    });

    it("should return the bytes before the next frame as garbage", () => {
      const data = Buffer.concat([Buffer.from([0x00, 0x01, 0x02]), buildFrame()]);

      expect(read(data, false)).toEqual({
        kind: StreamItemKind.Garbage,
        position: 0,
        raw: Buffer.from([0x00, 0x01, 0x02]),
      });
    });

    it("should stop garbage where a tag may start", () => {
      const data = Buffer.concat([Buffer.from([0x00, 0x00]), buildId3v2(0)]);

      expect(read(data, false)?.raw).toEqual(Buffer.from([0x00, 0x00]));
    });

    it("should keep the last 3 bytes while more data may follow", () => {
      expect(read(Buffer.alloc(10), false)?.raw).toHaveLength(7);
      expect(read(Buffer.alloc(3), false)).toBeNull();
      expect(read(Buffer.alloc(10), true)?.raw).toHaveLength(10);
    });

    it("should read an ID3v2 tag", () => {
      const tag = buildId3v2(20);

      expect(read(Buffer.concat([tag, buildFrame()]), false)).toEqual({
        kind: StreamItemKind.Tag,
        tagType: TagType.ID3v2,
        position: 0,
        raw: tag,
      });
    });

    it("should read an ID3v1 tag only at end of stream", () => {
      const tag = buildId3v1();

      expect(read(tag, false)).toBeNull();
      expect(read(tag, true)).toEqual({
        kind: StreamItemKind.Tag,
        tagType: TagType.ID3v1,
        position: 0,
        raw: tag,
      });
    });

    it("should wait for the rest of a tag", () => {
      const partial = buildId3v2(100).subarray(0, 50);

      expect(read(partial, false)).toBeNull();
      expect(read(partial, true)).toEqual({ kind: StreamItemKind.Garbage, position: 0, raw: partial });
    });
  });

  describe("free-format frames", () => {
    const first = buildFrame({ header: FREE_FORMAT_HEADER, gains: [10, 20, 30, 40] });
    const second = buildFrame({ header: FREE_FORMAT_HEADER });

    function rawLength(item: StreamItem | null): number | null {
      return item ? item.raw.length : null;
    }

    it("should end the first frame at the next header of the stream", () => {
      const item = read(Buffer.concat([first, second]), false);

      expect(item).toMatchObject({ kind: StreamItemKind.Frame, raw: first });
      if (item?.kind !== StreamItemKind.Frame) {
        throw new Error("Expected a frame");
      }
      expect(item.header).toMatchObject({ freeFormat: true, bitrate: 0, frameLength: 300 });
      expect(item.body).toHaveLength(300 - 4 - 32);
      expect(item.sideInfo?.granulesInStreamOrder().map((gr) => gr.globalGain)).toEqual([10, 20, 30, 40]);
    });

    it("should accept a next header that differs only in padding", () => {
      const padded = buildFrame({ header: FREE_FORMAT_PADDED_HEADER });

      expect(rawLength(read(Buffer.concat([first, padded]), false))).toBe(300);
    });

    it("should not end the frame at a header of another stream", () => {
      const data = Buffer.concat([first, buildFrame(), second]);

      expect(rawLength(read(data, false))).toBe(300 + 417);
    });

    it("should wait for the next header, then take the rest of the stream at its end", () => {
      expect(read(first, false)).toBeNull();
      expect(rawLength(read(first, true))).toBe(300);
    });

    it("should leave a trailing ID3v1 tag out of the last frame", () => {
      expect(rawLength(read(Buffer.concat([first, buildId3v1()]), true))).toBe(300);
    });

    it("should search for the next header past the end of the main data", () => {
      const frame = buildFrame({ header: FREE_FORMAT_HEADER });
      Buffer.from(FREE_FORMAT_HEADER).copy(frame, 100);
      // 1600 bits of main data in the first granule end 200 bytes after the side info
      writeBits(frame, 32 + 20, 12, 1600);

      expect(rawLength(read(Buffer.concat([frame, second]), false))).toBe(300);
    });

    it("should size later frames from the known size plus padding", () => {
      const padded = buildFrame({ header: FREE_FORMAT_PADDED_HEADER });

      const item = codec.readItem(Buffer.concat([padded, second]), false, { ...START, freeFormatSize: 300 });

      expect(rawLength(item)).toBe(301);
    });

    it("should give up on the header once the search limit is buffered", () => {
      const data = Buffer.concat([first, Buffer.alloc(8000, 0x55)]);

      expect(read(data, false)).toEqual({ kind: StreamItemKind.Garbage, position: 0, raw: data.subarray(0, 1) });
    });
  });

  describe("VBR header frames", () => {
    it.each(["Xing", "Info", "VBRI"] as const)("should detect a %s frame", (vbrTag) => {
      expect(frameItem(codec, buildFrame({ vbrTag }), 0).isVbrHeader).toBe(true);
    });

    it("should detect VBRI inside the body of a mono frame", () => {
      const item = frameItem(codec, buildFrame({ header: MPEG1_MONO_HEADER, vbrTag: "VBRI" }), 0);

      expect(item.isVbrHeader).toBe(true);
    });

    it("should detect a protected mono Xing frame", () => {
      const item = frameItem(codec, buildFrame({ header: MPEG1_PROTECTED_MONO_HEADER, vbrTag: "Xing" }), 0);

      expect(item.isVbrHeader).toBe(true);
    });

    it("should detect VBRI that starts in the side info of a protected frame", () => {
      const item = frameItem(codec, buildFrame({ header: MPEG1_PROTECTED_HEADER, vbrTag: "VBRI" }), 0);

      expect(item.isVbrHeader).toBe(true);
    });

    it("should detect Xing that starts in the side info of a protected frame", () => {
      const bytes = buildFrame({ header: MPEG1_PROTECTED_HEADER, gains: [0, 0, 0, 0] });
      bytes.write("Xing", 36, "latin1");

      expect(frameItem(codec, bytes, 0).isVbrHeader).toBe(true);
    });

    it("should not treat a frame with side info data as a VBR header", () => {
      const bytes = buildFrame({ vbrTag: "Xing" });
      bytes[10] = 0x01;

      expect(frameItem(codec, bytes, 0).isVbrHeader).toBe(false);
    });

    it("should not look for a magic string in audio frames", () => {
      expect(frameItem(codec, buildFrame(), 0).isVbrHeader).toBe(false);
      expect(frameItem(codec, buildFrame({ header: LAYER2_HEADER }), 0).isVbrHeader).toBe(false);
    });
  });

  describe("encodeFrame", () => {
    it("should reproduce an unchanged frame", () => {
      const bytes = buildFrame({ gains: [1, 2, 3, 4] });

      expect(codec.encodeFrame(frameItem(codec, bytes, 0))).toEqual(bytes);
    });

    it("should return the raw bytes of a Layer II frame", () => {
      const bytes = buildFrame({ header: LAYER2_HEADER, fill: 0x12 });

      expect(codec.encodeFrame(frameItem(codec, bytes, 0))).toEqual(bytes);
    });

    it("should write a changed global gain", () => {
      const bytes = buildFrame();
      const frame = frameItem(codec, bytes, 0);

      const [first] = frame.sideInfo?.granulesInStreamOrder() ?? [];
      first.globalGain = 100;
      const encoded = codec.encodeFrame(frame);

      expect(encoded).toHaveLength(417);
      expect(gainsOf(encoded)).toEqual([100, 150, 150, 150]);
      expect(encoded.subarray(36)).toEqual(bytes.subarray(36));
    });

    it("should keep the stored CRC when the side info is unchanged", () => {
      const frame = frameItem(codec, buildFrame({ header: MPEG1_PROTECTED_HEADER, crc: 0xbeef }), 0);

      const [first] = frame.sideInfo?.granulesInStreamOrder() ?? [];
      first.globalGain = 150;

      expect(codec.encodeFrame(frame).readUInt16BE(4)).toBe(0xbeef);
    });

    it("should recompute the CRC when the side info changed", () => {
      const frame = frameItem(codec, buildFrame({ header: MPEG1_PROTECTED_HEADER, crc: 0xbeef }), 0);

      const [first] = frame.sideInfo?.granulesInStreamOrder() ?? [];
      first.globalGain = 90;
      const encoded = codec.encodeFrame(frame);

      const covered = Buffer.concat([encoded.subarray(2, 4), encoded.subarray(6, 38)]);
      expect(encoded.readUInt16BE(4)).toBe(crc16(covered));
      expect(gainsOf(encoded)).toEqual([90, 150, 150, 150]);
    });
  });

  describe("computeFrameCrc", () => {
    it("should cover header bytes 2 and 3 and the side info", () => {
      const header = Buffer.from(MPEG1_PROTECTED_HEADER);
      const sideInfo = Buffer.alloc(32, 0x11);

      expect(computeFrameCrc(header, sideInfo)).toBe(crc16(Buffer.concat([header.subarray(2), sideInfo])));
    });
  });

  describe("describeFrame", () => {
    it("should describe version and layer", () => {
      const frame = frameItem(codec, buildFrame({ header: LAYER2_HEADER }), 0);

      expect(codec.describeFrame(frame)).toEqual({
        version: Mp3Version.MPEG1,
        layer: Mp3Layer.Layer2,
        description: "MPEG-1 Layer 2",
      });
      expect(codec.isSupportedFrame(frame)).toBe(false);
      expect(codec.isSupportedFrame(frameItem(codec, buildFrame(), 0))).toBe(true);
    });
  });
});
