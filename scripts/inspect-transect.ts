/**
 * Inspect the triangles behind the transect profile
 *
 * Reads the configured result file (no solver run) and prints, for a spread
 * of query points along the transect, the containing triangle, its vertices
 * and barycentric weights. Queries that miss the hull list their nearest
 * samples instead.
 *
 * Run with: npm run inspect
 */

import { DEFAULT_VALIDATION_CONFIG, resultPath } from '../src/config';
import { loadResults } from '../src/results/result-loader';
import { transectFromSamples, queryPointsFor } from '../src/profile/transect';
import { velocityMagnitudes } from '../src/profile/velocity-field';
import { LinearTriangulationInterpolator } from '../src/interpolation';

const QUERIES_TO_SHOW = 11;

const config = DEFAULT_VALIDATION_CONFIG;
const samples = loadResults(resultPath(config), { delimiter: config.delimiter });
const magnitudes = velocityMagnitudes(samples);
const interpolator = new LinearTriangulationInterpolator(samples, magnitudes);

console.log('=== Triangulation ===\n');
console.log(`Samples: ${samples.length}`);
console.log(`Duplicates skipped: ${interpolator.triangulation.duplicates.length}`);
console.log(`Triangles: ${interpolator.triangulation.triangles.length}`);
if (interpolator.degeneracy) {
  console.log(`WARNING: ${interpolator.degeneracy.message}`);
}

const transect = transectFromSamples(samples, config.xTarget, config.resolution);
const queries = queryPointsFor(transect);
const stride = Math.max(1, Math.floor((queries.length - 1) / (QUERIES_TO_SHOW - 1)));

console.log(`\n=== Queries at x = ${transect.xTarget}, y = ${transect.yMin}..${transect.yMax} ===`);

for (let q = 0; q < queries.length; q += stride) {
  const diag = interpolator.diagnose(queries[q]);
  console.log(`\n--- Query ${q}: y=${diag.query.y.toFixed(6)} ---`);

  if (diag.triangleVertices && diag.weights) {
    console.log(`Found triangle: ${diag.foundTriangle}`);
    diag.triangleVertices.forEach((vert, n) => {
      console.log(`  idx=${vert.index}: x=${vert.x.toFixed(4)}, y=${vert.y.toFixed(6)}, |u|=${vert.value.toFixed(6)} m/s, w=${diag.weights?.[n].toFixed(4)}`);
    });
    console.log(`Interpolated |u|: ${diag.value?.toFixed(6)} m/s`);
    continue;
  }

  console.log('Outside the convex hull (no value)');
  console.log('3 nearest samples:');
  const nearest = samples
    .map((s, idx) => ({ idx, s, d: Math.hypot(s.x - diag.query.x, s.y - diag.query.y) }))
    .sort((a, b) => a.d - b.d || a.idx - b.idx)
    .slice(0, 3);
  for (const { idx, s, d } of nearest) {
    console.log(`  idx=${idx}: x=${s.x.toFixed(4)}, y=${s.y.toFixed(6)}, distance=${d.toExponential(3)}`);
  }
}
