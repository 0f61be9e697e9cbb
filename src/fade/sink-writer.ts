import { once } from "events";
import { Writable } from "stream";
import { StreamItem } from "../mp3-codec/types";

/**
 * Writes stream items to a Writable, honoring backpressure.
 * A sink error is kept and rethrown by the next write or by `end`,
 * so it cannot go unhandled while the reader is busy.
 */
export class SinkWriter {
  private error: Error | null = null;
  private bytesWritten: number = 0;
  private readonly onError = (error: Error): void => {
    this.error = error;
  };

  constructor(private readonly sink: Writable) {
    this.sink.on("error", this.onError);
  }

  get written(): number {
    return this.bytesWritten;
  }

  async write(items: StreamItem[]): Promise<void> {
    for (const item of items) {
      this.throwIfFailed();
      this.bytesWritten += item.raw.length;
      if (!this.sink.write(item.raw)) {
        await once(this.sink, "drain");
      }
    }
  }

  /**
   * Ends the sink and waits until everything is flushed
   */
  async end(): Promise<void> {
    this.throwIfFailed();
    const finished = once(this.sink, "finish");
    this.sink.end();
    await finished;
  }

  /**
   * Stops listening for sink errors
   */
  release(): void {
    this.sink.off("error", this.onError);
  }

  private throwIfFailed(): void {
    if (this.error) {
      throw this.error;
    }
  }
}
