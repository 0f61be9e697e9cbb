import { IFrameCodec, StreamItem, isFrame } from "../mp3-codec/types";
import { FadeStateError } from "./fade.errors";
import { FadeStrategyBase } from "./fade-strategy.base";
import { GainAdjuster } from "./gain-adjuster";
import { RampPlan } from "./types";

/**
 * Fade-in: the window is the first N audio frames of the stream.
 * Nothing is buffered; each frame is adjusted as it arrives while the
 * plan lasts. VBR header frames neither count nor consume a delta.
 */
export class FadeInStrategy extends FadeStrategyBase {
  private finished = false;

  constructor(plan: RampPlan, adjuster: GainAdjuster, codec: IFrameCodec) {
    super(plan, adjuster, codec);
  }

  accept(item: StreamItem): StreamItem[] {
    if (this.finished) {
      throw new FadeStateError("Cannot accept items after the fade finished");
    }
    this.assertSupported(item);

    if (!isFrame(item) || item.isVbrHeader || this.remainingDeltas === 0) {
      return [item];
    }

    const delta = this.takeDelta();
    return [delta === null ? item : this.adjustFrame(item, delta)];
  }

  finish(): StreamItem[] {
    if (!this.finished) {
      this.finished = true;
      this.reportUnused();
    }
    return [];
  }
}
