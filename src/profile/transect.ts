/**
 * Transect sampling
 *
 * A transect is the vertical line x = xTarget, sampled at `resolution`
 * evenly spaced heights between the lowest and highest sample in the domain.
 */

import { QueryPoint, SamplePoint, TransectSpec } from '../types';
import { DegenerateTransectError, InvalidResolutionError } from '../errors';

function checkResolution(resolution: number): void {
  if (!Number.isInteger(resolution) || resolution < 2) {
    throw new InvalidResolutionError(resolution);
  }
}

/**
 * Derive the transect from the vertical extent of the samples.
 */
export function transectFromSamples(
  samples: readonly SamplePoint[],
  xTarget: number,
  resolution: number,
): TransectSpec {
  checkResolution(resolution);

  if (samples.length === 0) {
    throw new DegenerateTransectError('no samples to derive the transect extent from');
  }

  let yMin = Infinity;
  let yMax = -Infinity;
  for (const s of samples) {
    yMin = Math.min(yMin, s.y);
    yMax = Math.max(yMax, s.y);
  }

  if (yMin === yMax) {
    throw new DegenerateTransectError(`all samples lie at y = ${yMin}; the transect has zero length`);
  }

  return { xTarget, yMin, yMax, resolution };
}

/**
 * Evenly spaced query points from yMin to yMax inclusive, all at x = xTarget.
 */
export function sampleTransect(yMin: number, yMax: number, resolution: number, xTarget: number): QueryPoint[] {
  checkResolution(resolution);

  if (!Number.isFinite(yMin) || !Number.isFinite(yMax) || !Number.isFinite(xTarget)) {
    throw new DegenerateTransectError(`transect bounds must be finite (x = ${xTarget}, y = ${yMin}..${yMax})`);
  }
  if (yMin >= yMax) {
    throw new DegenerateTransectError(`transect needs yMin < yMax, got ${yMin}..${yMax}`);
  }

  const step = (yMax - yMin) / (resolution - 1);
  const queries: QueryPoint[] = [];
  for (let i = 0; i < resolution; i++) {
    // Pin the last point to yMax so the endpoint is not lost to rounding
    const y = i === resolution - 1 ? yMax : yMin + i * step;
    queries.push({ x: xTarget, y });
  }
  return queries;
}

export function queryPointsFor(transect: TransectSpec): QueryPoint[] {
  return sampleTransect(transect.yMin, transect.yMax, transect.resolution, transect.xTarget);
}
