import { StreamItem } from "../mp3-codec/types";

/**
 * Immutable sequence of integer gain deltas, one per frame of the fade window.
 * Index 0 is the least attenuated end of the window.
 */
export type RampPlan = readonly number[];

export enum FadeDirection {
  In = "in",
  Out = "out",
}

export enum GainStrategyKind {
  AddDelta = "add-delta",
  SetExplicit = "set-explicit",
  Collect = "collect",
}

/**
 * How window frames are changed, and the arguments that size the window
 */
export type GainMode =
  | { kind: GainStrategyKind.AddDelta; frames: number; rate: number }
  | { kind: GainStrategyKind.SetExplicit; values: readonly number[] }
  | { kind: GainStrategyKind.Collect; frames: number };

export interface FadeOptions {
  direction: FadeDirection;
  mode: GainMode;
}

/**
 * Gains of one window frame before and after adjustment, in stream order
 */
export interface FrameGainRecord {
  frameIndex: number;
  before: number[];
  after: number[];
}

/**
 * Decides which items are faded. `accept` and `finish` return the items
 * that are ready to be written, in stream order.
 */
export interface FadeStrategy {
  accept(item: StreamItem): StreamItem[];
  finish(): StreamItem[];
  readonly records: readonly FrameGainRecord[];
}

export interface FadeResult {
  itemsRead: number;
  framesRead: number;
  framesAdjusted: number;
  bytesWritten: number;
  records: FrameGainRecord[];
}
