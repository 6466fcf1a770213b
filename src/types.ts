// Physical units (all SI)
// Length: meters
// Velocity: m/s

export interface Point {
  x: number;
  y: number;
}

/** One row of the solver's result file. */
export interface SamplePoint {
  readonly x: number;
  readonly y: number;
  readonly velocityX: number;   // m/s
  readonly velocityY: number;   // m/s
}

export interface TransectSpec {
  readonly xTarget: number;
  readonly yMin: number;
  readonly yMax: number;
  readonly resolution: number;
}

export type QueryPoint = Readonly<Point>;

/**
 * A reconstructed value along the transect. `value` is undefined where the
 * query lies outside the sampled region, which is distinct from zero velocity.
 */
export interface ProfileEntry {
  readonly y: number;
  readonly value: number | undefined;
}

export type Profile = readonly ProfileEntry[];
