export { Triangulation, BARYCENTRIC_EPS } from './triangulation';
export type { Triangle, TriangleHit } from './triangulation';
export { LinearTriangulationInterpolator, interpolate } from './interpolator';
export type { QueryDiagnostics } from './interpolator';
