/**
 * Velocity profile extraction along a transect
 *
 * samples -> velocity magnitudes -> triangulation -> values at query points.
 * Every step returns a new sequence; nothing is mutated in place.
 */

import { Profile, ProfileEntry, QueryPoint, SamplePoint, TransectSpec } from '../types';
import { LinearTriangulationInterpolator } from '../interpolation';
import { DegenerateInterpolationError } from '../errors';
import { debugLog } from '../debug';
import { velocityMagnitudes } from './velocity-field';
import { queryPointsFor, transectFromSamples } from './transect';

export interface ProfileExtraction {
  transect: TransectSpec;
  profile: Profile;
  /** Soft failure: the samples could not be triangulated, so every value is undefined. */
  degeneracy: DegenerateInterpolationError | null;
}

export function buildProfile(queries: readonly QueryPoint[], values: readonly (number | undefined)[]): Profile {
  if (queries.length !== values.length) {
    throw new Error(`Expected ${queries.length} profile values, got ${values.length}`);
  }
  return queries.map((q, i): ProfileEntry => ({ y: q.y, value: values[i] }));
}

export function extractProfile(
  samples: readonly SamplePoint[],
  xTarget: number,
  resolution: number,
): ProfileExtraction {
  const transect = transectFromSamples(samples, xTarget, resolution);
  const queries = queryPointsFor(transect);

  const interpolator = new LinearTriangulationInterpolator(samples, velocityMagnitudes(samples));
  const profile = buildProfile(queries, interpolator.interpolate(queries));

  const defined = profile.filter(e => e.value !== undefined).length;
  debugLog('Profile', `x = ${xTarget}: ${defined}/${profile.length} query points inside the sampled region`);

  return { transect, profile, degeneracy: interpolator.degeneracy };
}

export interface ProfileSummary {
  definedCount: number;
  undefinedCount: number;
  min: number | undefined;
  max: number | undefined;
  /** Height of the maximum value, e.g. the channel centreline for laminar flow. */
  yAtMax: number | undefined;
}

export function summarizeProfile(profile: Profile): ProfileSummary {
  let definedCount = 0;
  let min: number | undefined;
  let max: number | undefined;
  let yAtMax: number | undefined;

  for (const entry of profile) {
    if (entry.value === undefined) continue;
    definedCount++;
    if (min === undefined || entry.value < min) min = entry.value;
    if (max === undefined || entry.value > max) {
      max = entry.value;
      yAtMax = entry.y;
    }
  }

  return { definedCount, undefinedCount: profile.length - definedCount, min, max, yAtMax };
}
