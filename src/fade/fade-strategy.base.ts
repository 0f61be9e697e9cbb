import { Logger } from "@nestjs/common";
import { IFrameCodec, Mp3Frame, StreamItem, isFrame } from "../mp3-codec/types";
import { UnsupportedFormatError } from "./fade.errors";
import { GainAdjuster } from "./gain-adjuster";
import { FadeStrategy, FrameGainRecord, RampPlan } from "./types";

/**
 * Abstract class for fade strategies
 * Owns the ramp cursor, the adjustment of a single frame and the
 * per-frame adjustment records shared by fade-in and fade-out.
 */
export abstract class FadeStrategyBase implements FadeStrategy {
  protected readonly logger = new Logger(this.constructor.name);
  private cursor = 0;
  private exhaustionReported = false;
  private readonly adjustments: FrameGainRecord[] = [];

  constructor(
    protected readonly plan: RampPlan,
    protected readonly adjuster: GainAdjuster,
    protected readonly codec: IFrameCodec,
  ) {}

  abstract accept(item: StreamItem): StreamItem[];

  abstract finish(): StreamItem[];

  get records(): readonly FrameGainRecord[] {
    return this.adjustments;
  }

  /**
   * Number of plan entries not yet consumed
   */
  get remainingDeltas(): number {
    return this.plan.length - this.cursor;
  }

  /**
   * @throws UnsupportedFormatError if the item is a frame the codec cannot adjust
   */
  protected assertSupported(item: StreamItem): void {
    if (isFrame(item) && !this.codec.isSupportedFrame(item)) {
      throw new UnsupportedFormatError(this.codec.describeFrame(item), item.index);
    }
  }

  /**
   * Takes the next plan entry, or null once the plan is exhausted
   */
  protected takeDelta(): number | null {
    if (this.cursor >= this.plan.length) {
      return null;
    }
    return this.plan[this.cursor++];
  }

  /**
   * Applies the gain adjuster to every granule of every channel and
   * re-serializes the frame
   */
  protected adjustFrame(frame: Mp3Frame, argument: number): Mp3Frame {
    if (!frame.sideInfo) {
      return frame;
    }

    const granules = frame.sideInfo.granulesInStreamOrder();
    const before = granules.map((granule) => granule.globalGain);
    for (const granule of granules) {
      granule.globalGain = this.adjuster.adjust(granule.globalGain, argument);
    }
    const after = granules.map((granule) => granule.globalGain);

    this.adjustments.push({ frameIndex: frame.index, before, after });
    this.logger.verbose(
      `Frame ${frame.index}: argument ${argument}, gains [${before.join(", ")}] -> [${after.join(", ")}]`,
    );

    return { ...frame, raw: this.codec.encodeFrame(frame) };
  }

  /**
   * Logs, once per run, that a window frame was passed through because
   * the plan ran out
   */
  protected reportExhausted(frame: Mp3Frame): void {
    if (this.exhaustionReported) {
      return;
    }
    this.exhaustionReported = true;
    this.logger.warn(
      `Ramp plan exhausted at frame ${frame.index}; remaining window frames are passed through unchanged`,
    );
  }

  /**
   * Logs plan entries that no frame consumed
   */
  protected reportUnused(): void {
    if (this.remainingDeltas > 0) {
      this.logger.debug(
        `${this.remainingDeltas} of ${this.plan.length} ramp entries were not used`,
      );
    }
  }
}
