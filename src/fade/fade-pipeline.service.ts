import { Inject, Injectable, Logger } from "@nestjs/common";
import { Readable, Writable } from "stream";
import { fadeConfig, FadeConfig } from "../config/fade.config";
import { Mp3ItemIterator } from "../mp3-codec/mp3-item-iterator";
import { MpegAudioCodecService } from "../mp3-codec/mpeg-audio-codec.service";
import { isFrame } from "../mp3-codec/types";
import { FadeInStrategy } from "./fade-in.strategy";
import { FadeOutStrategy } from "./fade-out.strategy";
import { FadeStrategyBase } from "./fade-strategy.base";
import { GainAdjuster, createGainAdjuster } from "./gain-adjuster";
import { collectPlan, explicitPlan, planRamp } from "./ramp-planner";
import { SinkWriter } from "./sink-writer";
import { FadeDirection, FadeOptions, FadeResult, GainMode, GainStrategyKind, RampPlan } from "./types";

/**
 * Drives a fade: reads items from the source, passes them through the
 * fade strategy and writes what it emits to the sink.
 */
@Injectable()
export class FadePipelineService {
  private readonly logger = new Logger(FadePipelineService.name);

  constructor(
    private readonly codec: MpegAudioCodecService,
    @Inject(fadeConfig.KEY)
    private readonly config: FadeConfig,
  ) {}

  /**
   * Builds the ramp plan for a gain mode
   */
  planFor(mode: GainMode): RampPlan {
    switch (mode.kind) {
      case GainStrategyKind.AddDelta:
        return planRamp(mode.frames, mode.rate);
      case GainStrategyKind.SetExplicit:
        return explicitPlan(mode.values);
      case GainStrategyKind.Collect:
        return collectPlan(mode.frames);
    }
  }

  createStrategy(direction: FadeDirection, plan: RampPlan, adjuster: GainAdjuster): FadeStrategyBase {
    return direction === FadeDirection.Out
      ? new FadeOutStrategy(plan, adjuster, this.codec)
      : new FadeInStrategy(plan, adjuster, this.codec);
  }

  /**
   * Fades `source` into `sink`
   * The sink is ended once every item is written. Any error aborts the run
   * before the failing item is written; the sink is left open for the
   * caller to dispose of.
   */
  async run(source: Readable, sink: Writable, options: FadeOptions): Promise<FadeResult> {
    const plan = this.planFor(options.mode);
    const adjuster = createGainAdjuster(options.mode.kind);
    const strategy = this.createStrategy(options.direction, plan, adjuster);
    const iterator = new Mp3ItemIterator(source, this.codec, this.config.maxSyncBufferSize);

    this.logger.log(
      `Fade ${options.direction} (${options.mode.kind}) over ${plan.length} frames`,
    );

    let itemsRead = 0;
    let framesRead = 0;
    const writer = new SinkWriter(sink);

    try {
      for (let item = await iterator.next(); item !== null; item = await iterator.next()) {
        itemsRead++;
        if (isFrame(item)) {
          framesRead++;
        }
        await writer.write(strategy.accept(item));
      }
      await writer.write(strategy.finish());
      await writer.end();
    } finally {
      writer.release();
    }

    const result: FadeResult = {
      itemsRead,
      framesRead,
      framesAdjusted: strategy.records.length,
      bytesWritten: writer.written,
      records: [...strategy.records],
    };

    this.logger.log(
      `Read ${result.itemsRead} items (${result.framesRead} frames), adjusted ${result.framesAdjusted} frames`,
    );
    return result;
  }
}
