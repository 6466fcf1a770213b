/**
 * Piecewise-linear interpolation of scattered 2D samples.
 *
 * The samples are triangulated once; each query takes the barycentric
 * average of the three vertex values of the triangle containing it.
 * Queries outside the convex hull have no value (undefined), and so does
 * every query when the samples cannot be triangulated.
 */

import { Point } from '../types';
import { DegenerateInterpolationError } from '../errors';
import { debugLog, debugWarn, elapsedMs } from '../debug';
import { Triangle, Triangulation } from './triangulation';

export interface QueryDiagnostics {
  query: Point;
  foundTriangle: number | null;
  triangleVertices: { index: number; x: number; y: number; value: number }[] | null;
  weights: [number, number, number] | null;
  value: number | undefined;
}

export class LinearTriangulationInterpolator {
  readonly triangulation: Triangulation;
  /** Set when the samples admit no triangle; every query then returns undefined. */
  readonly degeneracy: DegenerateInterpolationError | null;

  private readonly values: readonly number[];

  constructor(points: readonly Point[], values: readonly number[]) {
    if (values.length !== points.length) {
      throw new Error(`Expected ${points.length} values, got ${values.length}`);
    }

    const start = performance.now();
    this.triangulation = Triangulation.build(points);
    this.values = values;

    if (this.triangulation.isDegenerate) {
      const unique = points.length - this.triangulation.duplicates.length;
      this.degeneracy = new DegenerateInterpolationError(
        points.length,
        unique < 3 ? `only ${unique} distinct point(s)` : 'all points are collinear',
      );
      debugWarn('Interpolator', `${this.degeneracy.message}; every query resolves to undefined`);
    } else {
      this.degeneracy = null;
      debugLog('Interpolator', `Built ${this.triangulation.triangles.length} triangles from ${points.length} points in ${elapsedMs(start)}`);
    }

    if (this.triangulation.duplicates.length > 0) {
      debugWarn('Interpolator', `Ignored ${this.triangulation.duplicates.length} duplicate point(s); first occurrence kept`);
    }
  }

  valueAt(x: number, y: number): number | undefined {
    const hit = this.triangulation.locate(x, y);
    if (!hit) return undefined;
    return this.weighted(hit.triangle, hit.weights);
  }

  interpolate(queries: readonly Point[]): (number | undefined)[] {
    return queries.map(q => this.valueAt(q.x, q.y));
  }

  diagnose(query: Point): QueryDiagnostics {
    const hit = this.triangulation.locate(query.x, query.y);
    if (!hit) {
      return { query, foundTriangle: null, triangleVertices: null, weights: null, value: undefined };
    }

    const { i, j, k } = hit.triangle;
    const points = this.triangulation.points;
    return {
      query,
      foundTriangle: hit.index,
      triangleVertices: [i, j, k].map(index => ({
        index,
        x: points[index].x,
        y: points[index].y,
        value: this.values[index],
      })),
      weights: hit.weights,
      value: this.weighted(hit.triangle, hit.weights),
    };
  }

  private weighted(t: Triangle, w: [number, number, number]): number {
    return w[0] * this.values[t.i] + w[1] * this.values[t.j] + w[2] * this.values[t.k];
  }
}

export function interpolate(
  points: readonly Point[],
  values: readonly number[],
  queries: readonly Point[],
): (number | undefined)[] {
  return new LinearTriangulationInterpolator(points, values).interpolate(queries);
}
