import { GAIN_CONSTANTS } from "./consts";
import { InvalidGainValueError } from "./fade.errors";
import { GainStrategyKind } from "./types";

/**
 * Computes a granule's new global gain from its current value and the
 * window argument for its frame
 */
export interface GainAdjuster {
  readonly kind: GainStrategyKind;
  adjust(currentGain: number, argument: number): number;
}

function isGain(value: number): boolean {
  return (
    Number.isInteger(value) && value >= GAIN_CONSTANTS.MIN_GAIN && value <= GAIN_CONSTANTS.MAX_GAIN
  );
}

/**
 * Saturating volume change
 */
export class AddDeltaAdjuster implements GainAdjuster {
  readonly kind = GainStrategyKind.AddDelta;

  adjust(currentGain: number, argument: number): number {
    return Math.min(
      GAIN_CONSTANTS.MAX_GAIN,
      Math.max(GAIN_CONSTANTS.MIN_GAIN, currentGain + argument),
    );
  }
}

/**
 * Replaces the gain with the argument, which must already be a valid gain
 */
export class SetExplicitAdjuster implements GainAdjuster {
  readonly kind = GainStrategyKind.SetExplicit;

  adjust(_currentGain: number, argument: number): number {
    if (!isGain(argument)) {
      throw new InvalidGainValueError(argument);
    }
    return argument;
  }
}

/**
 * Leaves the gain unchanged; the strategy's frame records keep what was seen
 */
export class CollectAdjuster implements GainAdjuster {
  readonly kind = GainStrategyKind.Collect;

  adjust(currentGain: number, _argument: number): number {
    return currentGain;
  }
}

export function createGainAdjuster(kind: GainStrategyKind): GainAdjuster {
  switch (kind) {
    case GainStrategyKind.AddDelta:
      return new AddDeltaAdjuster();
    case GainStrategyKind.SetExplicit:
      return new SetExplicitAdjuster();
    case GainStrategyKind.Collect:
      return new CollectAdjuster();
  }
}
