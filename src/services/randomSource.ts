/**
 * randomSource.ts - Injectable randomness for the matcher and the freshness simulator.
 */

export interface RandomSource {
  /** Real number in [min, max]. */
  uniform(min: number, max: number): number;
  /** Integer in [min, max], both ends included. */
  integer(min: number, max: number): number;
}

export const mathRandomSource: RandomSource = {
  uniform: (min, max) => min + Math.random() * (max - min),
  integer: (min, max) => min + Math.floor(Math.random() * (max - min + 1)),
};

/**
 * Always picks the same relative position inside the requested range.
 * `fraction` 0 yields the minimum, 1 the maximum.
 */
export function fixedRandomSource(fraction: number): RandomSource {
  return {
    uniform: (min, max) => min + fraction * (max - min),
    integer: (min, max) => Math.round(min + fraction * (max - min)),
  };
}
