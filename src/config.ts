/**
 * Validation run configuration
 *
 * Script-time constants for the laminar channel case. There are no CLI flags
 * or environment variables; edit DEFAULT_VALIDATION_CONFIG or pass overrides
 * to runValidation().
 */

import * as path from 'path';
import { ChartStyle, DEFAULT_CHART_STYLE } from './render/profile-chart';

export interface SolverConfig {
  enabled: boolean;
  /** Path to the solver binary, relative to the working directory. */
  executable: string;
  /** Scenario file name inside `directory`. */
  scenario: string;
  allowStaleResult: boolean;
}

export interface ValidationConfig {
  /** Case directory holding the scenario, the result file and the chart. */
  directory: string;
  solver: SolverConfig;
  /** Result file name inside `directory`. */
  resultFile: string;
  delimiter: string;
  /** Horizontal position of the vertical transect (m). */
  xTarget: number;
  /** Number of query points along the transect. */
  resolution: number;
  imagePrefix: string;
  chart: ChartStyle;
}

export const DEFAULT_VALIDATION_CONFIG: ValidationConfig = {
  directory: './validation/channel',
  solver: {
    enabled: true,
    executable: './.build/cfdeez.exe',
    scenario: 'laminar_flow.fml',
    allowStaleResult: false,
  },
  resultFile: 'laminar_channel_flow_1.csv',
  delimiter: ',',
  xTarget: 4.5,
  resolution: 200,
  imagePrefix: 'laminar_channel_velocity_profile',
  chart: DEFAULT_CHART_STYLE,
};

export type ValidationOverrides = Partial<Omit<ValidationConfig, 'solver' | 'chart'>> & {
  solver?: Partial<SolverConfig>;
  chart?: Partial<ChartStyle>;
};

export function resolveConfig(overrides: ValidationOverrides = {}): ValidationConfig {
  return {
    ...DEFAULT_VALIDATION_CONFIG,
    ...overrides,
    solver: { ...DEFAULT_VALIDATION_CONFIG.solver, ...overrides.solver },
    chart: { ...DEFAULT_VALIDATION_CONFIG.chart, ...overrides.chart },
  };
}

export function scenarioPath(config: ValidationConfig): string {
  return path.join(config.directory, config.solver.scenario);
}

export function resultPath(config: ValidationConfig): string {
  return path.join(config.directory, config.resultFile);
}

/** Chart path, with the transect location embedded in the file name. */
export function imagePath(config: ValidationConfig): string {
  return path.join(config.directory, `${config.imagePrefix}${config.xTarget}.png`);
}
