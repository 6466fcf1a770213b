/**
 * Channel flow validation pipeline
 *
 * solver run -> result file -> velocity profile at x = xTarget -> PNG chart.
 * Strictly sequential; the first error aborts the run.
 */

import { Profile, TransectSpec } from './types';
import { DegenerateInterpolationError } from './errors';
import { debugLog, elapsedMs, formatValue } from './debug';
import {
  ValidationConfig,
  ValidationOverrides,
  imagePath,
  resolveConfig,
  resultPath,
  scenarioPath,
} from './config';
import { ProcessLauncher, SolverRun, runSolver } from './solver/run-solver';
import { loadResults } from './results/result-loader';
import { extractProfile, summarizeProfile } from './profile/profile';
import { chartMetadata, renderProfileChart } from './render/profile-chart';

export interface ValidationReport {
  /** Null when the solver step is disabled and an existing result file is used. */
  solverRun: SolverRun | null;
  sampleCount: number;
  transect: TransectSpec;
  profile: Profile;
  degeneracy: DegenerateInterpolationError | null;
  imagePath: string;
}

export interface PipelineDependencies {
  launcher?: ProcessLauncher;
}

/**
 * Run the whole validation. Accepts a full ValidationConfig or partial
 * overrides of DEFAULT_VALIDATION_CONFIG.
 */
export function runValidation(overrides: ValidationOverrides = {}, deps: PipelineDependencies = {}): ValidationReport {
  const config: ValidationConfig = resolveConfig(overrides);
  const start = performance.now();

  const solverRun = config.solver.enabled
    ? runSolver(scenarioPath(config), {
        executable: config.solver.executable,
        resultPath: resultPath(config),
        allowStaleResult: config.solver.allowStaleResult,
        launcher: deps.launcher,
      })
    : null;

  if (!solverRun) {
    debugLog('Validation', `Solver step disabled; reading existing ${resultPath(config)}`);
  }

  const samples = loadResults(solverRun ? solverRun.resultPath : resultPath(config), { delimiter: config.delimiter });
  const { transect, profile, degeneracy } = extractProfile(samples, config.xTarget, config.resolution);

  const summary = summarizeProfile(profile);
  if (summary.max !== undefined && summary.yAtMax !== undefined) {
    debugLog('Validation', `Peak ${formatValue(summary.max, 'm/s')} at y = ${formatValue(summary.yAtMax, 'm')}`);
  }

  const output = renderProfileChart(profile, chartMetadata(config.xTarget, config.chart), imagePath(config));
  debugLog('Validation', `Done in ${elapsedMs(start)}`);

  return {
    solverRun,
    sampleCount: samples.length,
    transect,
    profile,
    degeneracy,
    imagePath: output,
  };
}
