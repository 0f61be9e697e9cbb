import { Writable } from "stream";
import { SinkWriter } from "../src/fade/sink-writer";
import { createBufferSink, garbageItem } from "./helpers/mp3-fixtures";

describe("SinkWriter", () => {
  it("should write items in order and count the bytes", async () => {
    const { sink, data } = createBufferSink();
    const writer = new SinkWriter(sink);

    await writer.write([garbageItem(Buffer.from([1, 2])), garbageItem(Buffer.from([3]))]);
    await writer.write([garbageItem(Buffer.from([4, 5, 6]))]);
    await writer.end();

    expect(data()).toEqual(Buffer.from([1, 2, 3, 4, 5, 6]));
    expect(writer.written).toBe(6);
  });

  it("should wait for the sink to drain", async () => {
    const chunks: Buffer[] = [];
    const sink = new Writable({
      highWaterMark: 1,
      write(chunk: Buffer, _encoding, callback) {
        chunks.push(chunk);
        setImmediate(callback);
      },
    });
    const writer = new SinkWriter(sink);

    await writer.write([garbageItem(Buffer.alloc(10, 1)), garbageItem(Buffer.alloc(10, 2))]);
    await writer.end();

    expect(chunks.map((chunk) => chunk[0])).toEqual([1, 2]);
    expect(writer.written).toBe(20);
  });

  it("should rethrow a sink error on the next write", async () => {
    const { sink } = createBufferSink();
    const writer = new SinkWriter(sink);

    sink.emit("error", new Error("sink broke"));

    await expect(writer.write([garbageItem(Buffer.from([1]))])).rejects.toThrow("sink broke");
    await expect(writer.end()).rejects.toThrow("sink broke");
  });

  it("should stop listening once released", () => {
    const { sink } = createBufferSink();
    const writer = new SinkWriter(sink);

    expect(sink.listenerCount("error")).toBe(1);
    writer.release();
    expect(sink.listenerCount("error")).toBe(0);
  });
});
