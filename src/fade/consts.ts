/**
 * Layer III global gain domain
 */
export const GAIN_CONSTANTS = {
  MIN_GAIN: 0,
  MAX_GAIN: 255,
  DB_PER_GAIN_STEP: 2.5, // one global_gain unit is about 2.5 dB
} as const;
