/**
 * Delaunay Triangulation (Bowyer-Watson algorithm)
 *
 * Starts from a seed triangle spanning the point set and inserts the
 * remaining points one at a time. Each insertion removes the cavity of
 * triangles whose circumcircle contains the new point and re-fans the cavity
 * boundary to it. Points outside the current hull extend it through ghost
 * triangles on the hull edges, so the result covers the whole convex hull.
 *
 * Coordinates are normalised to the unit box before any geometric test so
 * that the tolerances below do not depend on the physical scale of the mesh.
 */

import { Point } from '../types';

// ============================================================================
// Constants
// ============================================================================

// Distance from a line (normalised units) below which a point counts as on it
const COLLINEAR_EPS = 1e-12;

// Insertion order: first round size, Hilbert curve resolution per axis
const FIRST_ROUND_SIZE = 64;
const HILBERT_SIDE = 65536;

// Barycentric tolerance for point-in-triangle tests on triangle edges
export const BARYCENTRIC_EPS = 1e-10;

// Grid size for the spatial index; aim for a handful of triangles per cell
const TRIANGLES_PER_CELL = 4;
const MAX_GRID_CELLS = 256;

// ============================================================================
// Data Types
// ============================================================================

export interface Triangle {
  i: number;
  j: number;
  k: number;
}

export interface TriangleHit {
  index: number;
  triangle: Triangle;
  weights: [number, number, number];
}

interface WorkingTriangle extends Triangle {
  alive: boolean;
}

interface GridCell {
  triangleIndices: number[];
}

interface SpatialIndex {
  cells: GridCell[][];
  cellsX: number;
  cellsY: number;
  cellWidth: number;
  cellHeight: number;
}

interface Bounds {
  minX: number;
  minY: number;
  scale: number;
}

// ============================================================================
// Geometric predicates (normalised coordinates)
// ============================================================================

function orient(ax: number, ay: number, bx: number, by: number, cx: number, cy: number): number {
  return (bx - ax) * (cy - ay) - (by - ay) * (cx - ax);
}

/**
 * Positive when (px, py) lies strictly inside the circumcircle of the
 * counter-clockwise triangle a, b, c.
 */
function inCircle(
  ax: number, ay: number,
  bx: number, by: number,
  cx: number, cy: number,
  px: number, py: number,
): number {
  const adx = ax - px;
  const ady = ay - py;
  const bdx = bx - px;
  const bdy = by - py;
  const cdx = cx - px;
  const cdy = cy - py;

  const ad = adx * adx + ady * ady;
  const bd = bdx * bdx + bdy * bdy;
  const cd = cdx * cdx + cdy * cdy;

  return ad * (bdx * cdy - cdx * bdy)
    - bd * (adx * cdy - cdx * ady)
    + cd * (adx * bdy - bdx * ady);
}

// ============================================================================
// Triangulation
// ============================================================================

export class Triangulation {
  /** Input points, in input order (duplicates included). */
  readonly points: readonly Point[];
  /** Counter-clockwise triangles over indices into `points`. */
  readonly triangles: readonly Triangle[];
  /** Indices of points skipped because an earlier point had the same coordinates. */
  readonly duplicates: readonly number[];

  private readonly nx: Float64Array;
  private readonly ny: Float64Array;
  private readonly bounds: Bounds | null;
  private readonly index: SpatialIndex | null;

  private constructor(
    points: readonly Point[],
    triangles: Triangle[],
    duplicates: number[],
    nx: Float64Array,
    ny: Float64Array,
    bounds: Bounds | null,
  ) {
    this.points = points;
    this.triangles = triangles;
    this.duplicates = duplicates;
    this.nx = nx;
    this.ny = ny;
    this.bounds = bounds;
    this.index = triangles.length > 0 ? this.buildSpatialIndex() : null;
  }

  static build(points: readonly Point[]): Triangulation {
    const n = points.length;
    const nx = new Float64Array(n);
    const ny = new Float64Array(n);

    const bounds = computeBounds(points);
    if (!bounds) {
      return new Triangulation(points, [], [], nx, ny, null);
    }

    for (let p = 0; p < n; p++) {
      nx[p] = (points[p].x - bounds.minX) / bounds.scale;
      ny[p] = (points[p].y - bounds.minY) / bounds.scale;
    }

    // First occurrence of each coordinate pair wins
    const seen = new Set<string>();
    const unique: number[] = [];
    const duplicates: number[] = [];
    for (let p = 0; p < n; p++) {
      const key = points[p].x + ':' + points[p].y;
      if (seen.has(key)) {
        duplicates.push(p);
      } else {
        seen.add(key);
        unique.push(p);
      }
    }

    const seed = unique.length >= 3 ? findSeedTriangle(unique, nx, ny) : null;
    if (!seed) {
      return new Triangulation(points, [], duplicates, nx, ny, bounds);
    }

    const rest = unique.filter(p => !seed.includes(p));
    const triangles = new BowyerWatson(nx, ny, n).run(seed, insertionOrder(rest, nx, ny));
    return new Triangulation(points, triangles, duplicates, nx, ny, bounds);
  }

  get isDegenerate(): boolean {
    return this.triangles.length === 0;
  }

  /**
   * Find the triangle containing (x, y). Returns null outside the convex hull.
   * When the point sits on a shared edge the lowest-index triangle wins.
   */
  locate(x: number, y: number): TriangleHit | null {
    if (!this.index || !this.bounds) return null;

    const px = (x - this.bounds.minX) / this.bounds.scale;
    const py = (y - this.bounds.minY) / this.bounds.scale;
    if (!Number.isFinite(px) || !Number.isFinite(py)) return null;

    const { cellsX, cellsY, cellWidth, cellHeight, cells } = this.index;
    const cellX = Math.floor(px / cellWidth);
    const cellY = Math.floor(py / cellHeight);

    // Check bounds, allowing points exactly on the far edge of the grid
    const slack = BARYCENTRIC_EPS;
    if (px < -slack || py < -slack || cellX > cellsX || cellY > cellsY) {
      return null;
    }
    const cx = Math.min(Math.max(cellX, 0), cellsX - 1);
    const cy = Math.min(Math.max(cellY, 0), cellsY - 1);

    for (const tIdx of cells[cx][cy].triangleIndices) {
      const weights = this.barycentric(px, py, this.triangles[tIdx]);
      if (weights && weights[0] >= -BARYCENTRIC_EPS && weights[1] >= -BARYCENTRIC_EPS && weights[2] >= -BARYCENTRIC_EPS) {
        return { index: tIdx, triangle: this.triangles[tIdx], weights };
      }
    }

    return null;
  }

  private barycentric(px: number, py: number, t: Triangle): [number, number, number] | null {
    const x1 = this.nx[t.i];
    const y1 = this.ny[t.i];
    const x2 = this.nx[t.j];
    const y2 = this.ny[t.j];
    const x3 = this.nx[t.k];
    const y3 = this.ny[t.k];

    const denom = (y2 - y3) * (x1 - x3) + (x3 - x2) * (y1 - y3);
    if (denom === 0) return null;

    const a = ((y2 - y3) * (px - x3) + (x3 - x2) * (py - y3)) / denom;
    const b = ((y3 - y1) * (px - x3) + (x1 - x3) * (py - y3)) / denom;
    return [a, b, 1 - a - b];
  }

  private buildSpatialIndex(): SpatialIndex {
    // Normalised coordinates span [0, 1] on the long axis
    let maxX = 0;
    let maxY = 0;
    for (let p = 0; p < this.points.length; p++) {
      maxX = Math.max(maxX, this.nx[p]);
      maxY = Math.max(maxY, this.ny[p]);
    }

    const side = Math.min(MAX_GRID_CELLS, Math.max(1, Math.ceil(Math.sqrt(this.triangles.length / TRIANGLES_PER_CELL))));
    const cellsX = maxX > 0 ? side : 1;
    const cellsY = maxY > 0 ? side : 1;
    const cellWidth = maxX > 0 ? maxX / cellsX : 1;
    const cellHeight = maxY > 0 ? maxY / cellsY : 1;

    const cells: GridCell[][] = [];
    for (let i = 0; i < cellsX; i++) {
      cells[i] = [];
      for (let j = 0; j < cellsY; j++) {
        cells[i][j] = { triangleIndices: [] };
      }
    }

    for (let tIdx = 0; tIdx < this.triangles.length; tIdx++) {
      const t = this.triangles[tIdx];

      const triMinX = Math.min(this.nx[t.i], this.nx[t.j], this.nx[t.k]) - BARYCENTRIC_EPS;
      const triMaxX = Math.max(this.nx[t.i], this.nx[t.j], this.nx[t.k]) + BARYCENTRIC_EPS;
      const triMinY = Math.min(this.ny[t.i], this.ny[t.j], this.ny[t.k]) - BARYCENTRIC_EPS;
      const triMaxY = Math.max(this.ny[t.i], this.ny[t.j], this.ny[t.k]) + BARYCENTRIC_EPS;

      const minCellX = Math.max(0, Math.floor(triMinX / cellWidth));
      const maxCellX = Math.min(cellsX - 1, Math.floor(triMaxX / cellWidth));
      const minCellY = Math.max(0, Math.floor(triMinY / cellHeight));
      const maxCellY = Math.min(cellsY - 1, Math.floor(triMaxY / cellHeight));

      for (let i = minCellX; i <= maxCellX; i++) {
        for (let j = minCellY; j <= maxCellY; j++) {
          cells[i][j].triangleIndices.push(tIdx);
        }
      }
    }

    return { cells, cellsX, cellsY, cellWidth, cellHeight };
  }
}

function computeBounds(points: readonly Point[]): Bounds | null {
  if (points.length === 0) return null;

  let minX = Infinity, maxX = -Infinity;
  let minY = Infinity, maxY = -Infinity;
  for (const pt of points) {
    minX = Math.min(minX, pt.x);
    maxX = Math.max(maxX, pt.x);
    minY = Math.min(minY, pt.y);
    maxY = Math.max(maxY, pt.y);
  }

  const scale = Math.max(maxX - minX, maxY - minY);
  if (!Number.isFinite(scale)) return null;

  return { minX, minY, scale: scale > 0 ? scale : 1 };
}

/**
 * Pick three points spanning the set: the two extremes along the wider axis
 * and the point farthest from the line through them, in counter-clockwise
 * order. Null when every point lies within COLLINEAR_EPS of that line.
 */
function findSeedTriangle(indices: readonly number[], nx: Float64Array, ny: Float64Array): [number, number, number] | null {
  let minX = indices[0], maxX = indices[0];
  let minY = indices[0], maxY = indices[0];
  for (const p of indices) {
    if (nx[p] < nx[minX]) minX = p;
    if (nx[p] > nx[maxX]) maxX = p;
    if (ny[p] < ny[minY]) minY = p;
    if (ny[p] > ny[maxY]) maxY = p;
  }

  const wide = nx[maxX] - nx[minX] >= ny[maxY] - ny[minY];
  const a = wide ? minX : minY;
  const b = wide ? maxX : maxY;
  const length = Math.hypot(nx[b] - nx[a], ny[b] - ny[a]);

  let c = a;
  let best = 0;
  for (const p of indices) {
    const area = Math.abs(orient(nx[a], ny[a], nx[b], ny[b], nx[p], ny[p]));
    if (area > best) {
      best = area;
      c = p;
    }
  }

  // orient() is twice the triangle area; divided by the base it is the offset from the line
  if (best <= COLLINEAR_EPS * length) return null;
  return orient(nx[a], ny[a], nx[b], ny[b], nx[c], ny[c]) > 0 ? [a, b, c] : [a, c, b];
}

/** Deterministic pseudo-random value in [0, 1) for a given seed. */
function seededRandom(seed: number): number {
  const x = Math.sin(seed * 12.9898) * 43758.5453;
  return x - Math.floor(x);
}

function hilbertIndex(px: number, py: number): number {
  let x = Math.min(HILBERT_SIDE - 1, Math.floor(px * HILBERT_SIDE));
  let y = Math.min(HILBERT_SIDE - 1, Math.floor(py * HILBERT_SIDE));
  let d = 0;
  for (let s = HILBERT_SIDE / 2; s >= 1; s /= 2) {
    const rx = (x & s) > 0 ? 1 : 0;
    const ry = (y & s) > 0 ? 1 : 0;
    d += s * s * ((3 * rx) ^ ry);
    if (ry === 0) {
      if (rx === 1) {
        x = HILBERT_SIDE - 1 - x;
        y = HILBERT_SIDE - 1 - y;
      }
      const swap = x;
      x = y;
      y = swap;
    }
  }
  return d;
}

/**
 * Insertion order: a seeded shuffle split into rounds of doubling size, each
 * round sorted along a Hilbert curve. Result files list grid nodes row by
 * row; inserting them in that order rebuilds a whole row of triangles per
 * point.
 */
function insertionOrder(indices: readonly number[], nx: Float64Array, ny: Float64Array): number[] {
  const shuffled = indices.slice();
  for (let m = shuffled.length - 1; m > 0; m--) {
    const r = Math.min(m, Math.floor(seededRandom(m + 1) * (m + 1)));
    const swap = shuffled[m];
    shuffled[m] = shuffled[r];
    shuffled[r] = swap;
  }

  const key = new Map<number, number>();
  for (const p of shuffled) {
    key.set(p, hilbertIndex(nx[p], ny[p]));
  }
  const keyOf = (p: number): number => key.get(p) ?? 0;

  const order: number[] = [];
  let begin = 0;
  let end = Math.min(shuffled.length, FIRST_ROUND_SIZE);
  while (begin < shuffled.length) {
    const round = shuffled.slice(begin, end).sort((p, q) => keyOf(p) - keyOf(q) || p - q);
    for (const p of round) order.push(p);
    begin = end;
    end = Math.min(shuffled.length, end * 2);
  }
  return order;
}

// ============================================================================
// Incremental insertion
// ============================================================================

/**
 * Bowyer-Watson over a triangulation closed by a vertex at infinity. Each
 * hull edge u -> v (exterior on the left) carries a ghost triangle
 * (u, v, INF); a point conflicts with a ghost when it lies beyond that edge
 * or on the open edge itself. The real triangles always tile the convex hull
 * of the points inserted so far.
 */
class BowyerWatson {
  private readonly tris: WorkingTriangle[] = [];
  private readonly free: number[] = [];
  // Directed edge a -> b -> triangle holding that edge in counter-clockwise order
  private readonly edgeOwner = new Map<number, number>();
  private lastTriangle = 0;
  private readonly inf: number;
  private readonly stride: number;

  constructor(
    private readonly nx: Float64Array,
    private readonly ny: Float64Array,
    n: number,
  ) {
    this.inf = n;
    this.stride = n + 1;
  }

  run(seed: [number, number, number], order: readonly number[]): Triangle[] {
    const [a, b, c] = seed;
    this.addTriangle(a, b, c);
    this.addTriangle(b, a, this.inf);
    this.addTriangle(c, b, this.inf);
    this.addTriangle(a, c, this.inf);

    for (const p of order) {
      this.insertPoint(p);
    }

    const result: Triangle[] = [];
    for (const t of this.tris) {
      if (t.alive && t.k !== this.inf) {
        result.push({ i: t.i, j: t.j, k: t.k });
      }
    }
    return result;
  }

  private edgeKey(a: number, b: number): number {
    return a * this.stride + b;
  }

  private addTriangle(a: number, b: number, c: number): number {
    const recycled = this.free.pop();
    const id = recycled ?? this.tris.length;
    if (recycled === undefined) {
      this.tris.push({ i: a, j: b, k: c, alive: true });
    } else {
      this.tris[id] = { i: a, j: b, k: c, alive: true };
    }
    this.edgeOwner.set(this.edgeKey(a, b), id);
    this.edgeOwner.set(this.edgeKey(b, c), id);
    this.edgeOwner.set(this.edgeKey(c, a), id);
    return id;
  }

  private removeTriangle(id: number): void {
    const t = this.tris[id];
    t.alive = false;
    for (const [a, b] of [[t.i, t.j], [t.j, t.k], [t.k, t.i]]) {
      const key = this.edgeKey(a, b);
      if (this.edgeOwner.get(key) === id) {
        this.edgeOwner.delete(key);
      }
    }
    this.free.push(id);
  }

  private neighbour(a: number, b: number): number | undefined {
    return this.edgeOwner.get(this.edgeKey(b, a));
  }

  private isGhost(id: number): boolean {
    return this.tris[id].k === this.inf;
  }

  /** p lies beyond hull edge u -> v (exterior on the left), or on the open edge. */
  private beyondHullEdge(u: number, v: number, px: number, py: number): boolean {
    const { nx, ny } = this;
    const ex = nx[v] - nx[u];
    const ey = ny[v] - ny[u];
    const length = Math.hypot(ex, ey);
    const side = orient(nx[u], ny[u], nx[v], ny[v], px, py);
    if (Math.abs(side) > COLLINEAR_EPS * length) return side > 0;

    const along = (px - nx[u]) * ex + (py - ny[u]) * ey;
    return along > 0 && along < length * length;
  }

  /** p lies strictly left of a -> b, farther than COLLINEAR_EPS from the line. */
  private sees(a: number, b: number, px: number, py: number): boolean {
    const { nx, ny } = this;
    const length = Math.hypot(nx[b] - nx[a], ny[b] - ny[a]);
    return orient(nx[a], ny[a], nx[b], ny[b], px, py) > COLLINEAR_EPS * length;
  }

  private conflicts(id: number, px: number, py: number): boolean {
    const t = this.tris[id];
    if (t.k === this.inf) return this.beyondHullEdge(t.i, t.j, px, py);
    const { nx, ny } = this;
    return inCircle(nx[t.i], ny[t.i], nx[t.j], ny[t.j], nx[t.k], ny[t.k], px, py) > 0;
  }

  /**
   * Visibility walk from the last created triangle towards (px, py). Ends on
   * the real triangle containing p, or on a ghost whose hull edge p lies
   * beyond. Falls back to a linear scan if the walk does not settle.
   */
  private locate(px: number, py: number): number {
    const { nx, ny } = this;
    let current = this.tris[this.lastTriangle].alive ? this.lastTriangle : this.firstAlive();
    const maxSteps = this.tris.length + 3;

    for (let step = 0; step < maxSteps; step++) {
      const t = this.tris[current];

      if (t.k === this.inf) {
        if (this.beyondHullEdge(t.i, t.j, px, py)) return current;
        const inner = this.neighbour(t.i, t.j);
        if (inner === undefined) break;
        current = inner;
        continue;
      }

      let next: number | undefined;
      for (const [a, b] of [[t.i, t.j], [t.j, t.k], [t.k, t.i]]) {
        if (orient(nx[a], ny[a], nx[b], ny[b], px, py) >= 0) continue;
        const other = this.neighbour(a, b);
        if (other === undefined) continue;
        if (this.isGhost(other) && !this.conflicts(other, px, py)) continue;
        next = other;
        break;
      }

      if (next === undefined) return current;
      current = next;
    }

    return this.scan(px, py);
  }

  private scan(px: number, py: number): number {
    const { nx, ny } = this;
    let ghost: number | undefined;
    for (let id = 0; id < this.tris.length; id++) {
      const t = this.tris[id];
      if (!t.alive) continue;
      if (t.k === this.inf) {
        if (ghost === undefined && this.beyondHullEdge(t.i, t.j, px, py)) ghost = id;
        continue;
      }
      if (orient(nx[t.i], ny[t.i], nx[t.j], ny[t.j], px, py) >= 0 &&
          orient(nx[t.j], ny[t.j], nx[t.k], ny[t.k], px, py) >= 0 &&
          orient(nx[t.k], ny[t.k], nx[t.i], ny[t.i], px, py) >= 0) {
        return id;
      }
    }
    return ghost ?? this.firstAlive();
  }

  private firstAlive(): number {
    for (let id = this.tris.length - 1; id >= 0; id--) {
      if (this.tris[id].alive) return id;
    }
    return 0;
  }

  private insertPoint(p: number): void {
    const px = this.nx[p];
    const py = this.ny[p];

    // Grow the cavity across edges, starting from the triangle that contains p.
    // An edge p cannot see must not end up on the cavity boundary, so the
    // triangle behind it joins the cavity even when its in-circle test rounds
    // to zero (cocircular grid points).
    const start = this.locate(px, py);
    const cavity: number[] = [start];
    const inCavity = new Set<number>(cavity);

    for (let m = 0; m < cavity.length; m++) {
      const t = this.tris[cavity[m]];
      for (const [a, b] of [[t.i, t.j], [t.j, t.k], [t.k, t.i]]) {
        const other = this.neighbour(a, b);
        if (other === undefined || inCavity.has(other)) continue;
        const joins = this.isGhost(other)
          ? this.conflicts(other, px, py)
          : this.conflicts(other, px, py) || !this.sees(a, b, px, py);
        if (joins) {
          inCavity.add(other);
          cavity.push(other);
        }
      }
    }

    // Boundary edges are those whose neighbour is outside the cavity
    const polygon: [number, number][] = [];
    for (const id of cavity) {
      const t = this.tris[id];
      for (const [a, b] of [[t.i, t.j], [t.j, t.k], [t.k, t.i]]) {
        const other = this.neighbour(a, b);
        if (other === undefined || !inCavity.has(other)) {
          polygon.push([a, b]);
        }
      }
    }

    for (const id of cavity) {
      this.removeTriangle(id);
    }

    // Ghosts keep the vertex at infinity last
    for (const [a, b] of polygon) {
      if (b === this.inf) {
        this.addTriangle(p, a, this.inf);
      } else if (a === this.inf) {
        this.addTriangle(b, p, this.inf);
      } else {
        this.lastTriangle = this.addTriangle(a, b, p);
      }
    }
  }
}
