/**
 * Channel Profile Validation
 *
 * Library entry point. The command-line run lives in main.ts.
 */

export * from './types';
export * from './errors';

export { magnitude, velocityMagnitudes } from './profile/velocity-field';
export { sampleTransect, transectFromSamples, queryPointsFor } from './profile/transect';
export { buildProfile, extractProfile, summarizeProfile } from './profile/profile';
export type { ProfileExtraction, ProfileSummary } from './profile/profile';

export { Triangulation, LinearTriangulationInterpolator, interpolate } from './interpolation';
export type { Triangle, TriangleHit, QueryDiagnostics } from './interpolation';

export { loadResults, parseResults, REQUIRED_COLUMNS } from './results/result-loader';
export type { ResultLoaderOptions } from './results/result-loader';

export { runSolver, spawnLauncher } from './solver/run-solver';
export type { ProcessLauncher, ProcessOutcome, SolverOptions, SolverRun } from './solver/run-solver';

export {
  renderProfileChart,
  encodeProfileChart,
  chartMetadata,
  computeScales,
  profileSegments,
  DEFAULT_CHART_STYLE,
} from './render/profile-chart';
export type { ChartMetadata, ChartStyle, ChartScales } from './render/profile-chart';

export { DEFAULT_VALIDATION_CONFIG, resolveConfig, imagePath, resultPath, scenarioPath } from './config';
export type { ValidationConfig, ValidationOverrides, SolverConfig } from './config';
export { runValidation } from './pipeline';
export type { ValidationReport, PipelineDependencies } from './pipeline';

export { setDebugOutput } from './debug';
