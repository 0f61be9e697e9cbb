import { Readable } from "stream";
import { ITERATOR_DEFAULTS } from "./consts";
import { unpaddedFrameLength } from "./frame-header";
import { SyncBufferLimitError } from "./mp3-codec.errors";
import { IFrameCodec, IItemIterator, StreamItem, isFrame } from "./types";

function toBuffer(chunk: unknown): Buffer {
  if (Buffer.isBuffer(chunk)) {
    return chunk;
  }
  if (typeof chunk === "string") {
    return Buffer.from(chunk, "latin1");
  }
  if (chunk instanceof Uint8Array) {
    return Buffer.from(chunk);
  }
  throw new TypeError(`Unsupported stream chunk type: ${typeof chunk}`);
}

/**
 * Iterator for reading the items (frames, tags, unidentified bytes) of an MP3 stream
 * Handles stream traversal: event handling, chunk buffering and flow control.
 * The stream is paused while an item is ready and resumed only when the
 * codec needs more bytes. While an item is incomplete, the iterator waits
 * for the buffered bytes to double before asking the codec again, so a
 * large item is merged from its chunks a logarithmic number of times.
 */
export class Mp3ItemIterator implements IItemIterator {
  private buffer: Buffer = Buffer.alloc(0);
  private chunks: Buffer[] = [];
  private chunkedLength: number = 0;
  private wantedLength: number = 0;
  private position: number = 0;
  private frameIndex: number = 0;
  private freeFormatSize: number | undefined;
  private isEnded: boolean = false;
  private streamError: Error | null = null;
  private pendingResolve: (() => void) | null = null;
  private pendingReject: ((reason: Error) => void) | null = null;

  constructor(
    private readonly stream: Readable,
    private readonly codec: IFrameCodec,
    private readonly maxSyncBufferSize: number = ITERATOR_DEFAULTS.MAX_SYNC_BUFFER_SIZE,
  ) {
    this.setupStreamListeners();
  }

  private setupStreamListeners(): void {
    this.stream.on("data", this.onData.bind(this));
    this.stream.on("end", this.onEnd.bind(this));
    this.stream.on("error", this.onError.bind(this));
    this.stream.on("close", this.onClose.bind(this));

    // Adding a data listener switches to flowing mode; read on demand instead
    this.stream.pause();
  }

  private onData(chunk: unknown): void {
    let bytes: Buffer;
    try {
      bytes = toBuffer(chunk);
    } catch (error) {
      this.stream.pause();
      this.onError(error instanceof Error ? error : new Error(String(error)));
      return;
    }
    this.chunks.push(bytes);
    this.chunkedLength += bytes.length;
    if (this.buffer.length + this.chunkedLength >= this.wantedLength) {
      this.stream.pause();
      this.wake();
    }
  }

  private onEnd(): void {
    this.isEnded = true;
    this.wake();
  }

  private onError(error: Error): void {
    this.streamError = error;
    if (this.pendingReject) {
      const reject = this.pendingReject;
      this.pendingResolve = null;
      this.pendingReject = null;
      reject(error);
    }
  }

  private onClose(): void {
    if (!this.isEnded && !this.streamError) {
      this.onError(new Error("Stream closed before it ended"));
    }
  }

  private wake(): void {
    if (this.pendingResolve) {
      const resolve = this.pendingResolve;
      this.pendingResolve = null;
      this.pendingReject = null;
      resolve();
    }
  }

  /**
   * Resumes the stream until at least `length` bytes are buffered or it ends
   */
  private waitForData(length: number): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      // If there's already a pending promise, that's an error
      if (this.pendingResolve) {
        reject(new Error("Multiple concurrent calls to next() are not supported"));
        return;
      }

      this.wantedLength = length;
      this.pendingResolve = resolve;
      this.pendingReject = reject;
      this.stream.resume();
    });
  }

  private mergeChunks(): void {
    if (this.chunks.length === 0) {
      return;
    }
    this.buffer = Buffer.concat([this.buffer, ...this.chunks]);
    this.chunks = [];
    this.chunkedLength = 0;
  }

  /**
   * Gets the next item from the stream
   * @returns Promise that resolves to the next item, or null at end of stream
   * @throws SyncBufferLimitError if an item does not complete within the buffer limit
   */
  async next(): Promise<StreamItem | null> {
    while (true) {
      if (this.streamError) {
        throw this.streamError;
      }

      this.mergeChunks();
      const item = this.codec.readItem(this.buffer, this.isEnded, {
        position: this.position,
        frameIndex: this.frameIndex,
        freeFormatSize: this.freeFormatSize,
      });
      if (item) {
        this.buffer = this.buffer.subarray(item.raw.length);
        this.position += item.raw.length;
        if (isFrame(item)) {
          this.frameIndex++;
          if (item.header.freeFormat && this.freeFormatSize === undefined) {
            this.freeFormatSize = unpaddedFrameLength(item.header);
          }
        }
        return item;
      }

      if (this.isEnded) {
        return null;
      }

      if (this.buffer.length >= this.maxSyncBufferSize) {
        throw new SyncBufferLimitError(
          `Sync buffer reached its maximum size (${this.maxSyncBufferSize} bytes) at position ${this.position}`,
          this.position,
        );
      }

      const doubled = Math.max(this.buffer.length + 1, this.buffer.length * 2);
      await this.waitForData(Math.min(doubled, this.maxSyncBufferSize));
    }
  }
}
