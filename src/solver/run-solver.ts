/**
 * External CFD solver invocation
 *
 * The solver is a black box: it takes the path of a scenario file, runs to
 * completion and leaves its result file on disk. The call blocks until the
 * process exits (no timeout). Output is not captured; the solver writes
 * straight to this process's terminal.
 *
 * Each way the run can fail to leave fresh results raises a
 * ProcessInvocationError.
 */

import { spawnSync } from 'child_process';
import * as fs from 'fs';
import { ProcessInvocationError } from '../errors';
import { debugLog, elapsedMs } from '../debug';

export interface ProcessOutcome {
  status: number | null;
  signal: NodeJS.Signals | null;
  error?: Error;
}

export type ProcessLauncher = (command: string, args: readonly string[]) => ProcessOutcome;

export const spawnLauncher: ProcessLauncher = (command, args) =>
  spawnSync(command, args, { stdio: 'inherit' });

export interface SolverOptions {
  executable: string;
  /** File the solver is expected to write. */
  resultPath: string;
  launcher?: ProcessLauncher;
  /** Accept a result file that predates the launch (e.g. a solver that skips unchanged scenarios). */
  allowStaleResult?: boolean;
}

export interface SolverRun {
  resultPath: string;
  exitCode: number;
  durationMs: number;
}

// File system timestamps can lag the wall clock slightly
const MTIME_SLACK_MS = 1000;

export function runSolver(scenarioPath: string, options: SolverOptions): SolverRun {
  const launcher = options.launcher ?? spawnLauncher;
  const command = `${options.executable} ${scenarioPath}`;

  debugLog('Solver', `Running ${command}`);
  const startedAt = Date.now();
  const start = performance.now();

  const outcome = launcher(options.executable, [scenarioPath]);

  if (outcome.error) {
    throw new ProcessInvocationError('launch-failed', command, `failed to launch: ${outcome.error.message}`);
  }
  if (outcome.signal) {
    throw new ProcessInvocationError('signal', command, `terminated by ${outcome.signal}`);
  }
  if (outcome.status !== 0) {
    throw new ProcessInvocationError('exit-status', command, `exited with status ${outcome.status}`);
  }
  const exitCode: number = outcome.status;

  let stat: fs.Stats;
  try {
    stat = fs.statSync(options.resultPath);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ProcessInvocationError('missing-result', command, `no result file at ${options.resultPath} (${reason})`);
  }

  if (!options.allowStaleResult && stat.mtimeMs < startedAt - MTIME_SLACK_MS) {
    throw new ProcessInvocationError(
      'stale-result',
      command,
      `result file ${options.resultPath} was last written ${new Date(stat.mtimeMs).toISOString()}, before this run started`,
    );
  }

  debugLog('Solver', `Finished in ${elapsedMs(start)}`);
  return { resultPath: options.resultPath, exitCode, durationMs: performance.now() - start };
}
