import { IFrameCodec, StreamItem, isFrame } from "../mp3-codec/types";
import { FadeStateError } from "./fade.errors";
import { FadeStrategyBase } from "./fade-strategy.base";
import { GainAdjuster } from "./gain-adjuster";
import { ItemQueue } from "./item-queue";
import { RampPlan } from "./types";

export enum FadeWindowState {
  Buffering = "buffering",
  Draining = "draining",
}

/**
 * Fade-out: the window is the last N frames of the stream.
 * Items are held back until more than N frames are buffered; the oldest
 * then leave unmodified. At end of stream the buffered window is drained
 * through the ramp. Tags and unidentified bytes travel with the frames
 * around them.
 */
export class FadeOutStrategy extends FadeStrategyBase {
  private readonly queue = new ItemQueue<StreamItem>();
  private frameCount = 0;
  private currentState = FadeWindowState.Buffering;

  constructor(plan: RampPlan, adjuster: GainAdjuster, codec: IFrameCodec) {
    super(plan, adjuster, codec);
  }

  get state(): FadeWindowState {
    return this.currentState;
  }

  /**
   * Number of frames currently held in the window
   */
  get bufferedFrameCount(): number {
    return this.frameCount;
  }

  bufferedItems(): StreamItem[] {
    return this.queue.toArray();
  }

  private get windowLength(): number {
    return this.plan.length;
  }

  accept(item: StreamItem): StreamItem[] {
    if (this.currentState !== FadeWindowState.Buffering) {
      throw new FadeStateError("Cannot accept items after the fade window was drained");
    }
    this.assertSupported(item);

    this.queue.push(item);
    if (isFrame(item)) {
      this.frameCount++;
    }

    const evicted: StreamItem[] = [];
    while (this.frameCount > this.windowLength) {
      const head = this.queue.shift();
      if (head === undefined) {
        break;
      }
      if (isFrame(head)) {
        this.frameCount--;
      }
      evicted.push(head);
    }
    return evicted;
  }

  finish(): StreamItem[] {
    if (this.currentState === FadeWindowState.Draining) {
      return [];
    }
    this.currentState = FadeWindowState.Draining;

    const drained: StreamItem[] = [];
    for (let item = this.queue.shift(); item !== undefined; item = this.queue.shift()) {
      if (!isFrame(item)) {
        drained.push(item);
        continue;
      }
      this.frameCount--;

      // VBR header frames occupy a window slot but consume no delta
      if (item.isVbrHeader) {
        drained.push(item);
        continue;
      }

      const delta = this.takeDelta();
      if (delta === null) {
        this.reportExhausted(item);
        drained.push(item);
        continue;
      }
      drained.push(this.adjustFrame(item, delta));
    }

    this.reportUnused();
    return drained;
  }
}
