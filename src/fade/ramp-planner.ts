import { GAIN_CONSTANTS } from "./consts";
import { InvalidRampError } from "./fade.errors";
import { RampPlan } from "./types";

/**
 * Rounds to the nearest integer, ties to the even neighbour
 */
export function roundHalfEven(value: number): number {
  const floor = Math.floor(value);
  const fraction = value - floor;
  if (fraction > 0.5) {
    return floor + 1;
  }
  if (fraction < 0.5) {
    return floor;
  }
  return floor % 2 === 0 ? floor : floor + 1;
}

function checkFrameCount(frameCount: number): void {
  if (!Number.isSafeInteger(frameCount) || frameCount < 0) {
    throw new InvalidRampError(`Frame count must be a non-negative integer, got ${frameCount}`);
  }
}

/**
 * Plans a linear fade: delta[i] = -round(i * ratePerFrame / 2.5)
 * @param frameCount - Length of the fade window in frames
 * @param ratePerFrame - Attenuation in dB added at each frame step
 */
export function planRamp(frameCount: number, ratePerFrame: number): RampPlan {
  checkFrameCount(frameCount);
  if (!Number.isFinite(ratePerFrame)) {
    throw new InvalidRampError(`Rate must be a finite number, got ${ratePerFrame}`);
  }

  const plan: number[] = [];
  for (let i = 0; i < frameCount; i++) {
    const delta = -roundHalfEven((i * ratePerFrame) / GAIN_CONSTANTS.DB_PER_GAIN_STEP);
    plan.push(delta === 0 ? 0 : delta); // no -0
  }
  return Object.freeze(plan);
}

/**
 * Plan for the set-explicit strategy: the requested gains themselves
 */
export function explicitPlan(values: readonly number[]): RampPlan {
  return Object.freeze([...values]);
}

/**
 * Plan for the collect strategy: one unused argument per window frame
 */
export function collectPlan(frameCount: number): RampPlan {
  checkFrameCount(frameCount);
  return Object.freeze(new Array<number>(frameCount).fill(0));
}
