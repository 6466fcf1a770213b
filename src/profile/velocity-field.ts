import { SamplePoint } from '../types';

/** Euclidean norm of a 2D velocity vector (m/s). */
export function magnitude(vx: number, vy: number): number {
  return Math.sqrt(vx * vx + vy * vy);
}

/** Velocity magnitude per sample, parallel to `samples`. */
export function velocityMagnitudes(samples: readonly SamplePoint[]): number[] {
  return samples.map(s => magnitude(s.velocityX, s.velocityY));
}
