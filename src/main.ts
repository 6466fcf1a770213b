/**
 * Laminar channel flow validation
 *
 * Runs the solver on the channel scenario and charts the velocity profile
 * at the configured transect. Run from the repository root.
 */

import { DEFAULT_VALIDATION_CONFIG } from './config';
import { ValidationError } from './errors';
import { runValidation } from './pipeline';

function main(): void {
  try {
    const report = runValidation(DEFAULT_VALIDATION_CONFIG);
    console.log(`[Validation] Velocity profile at x = ${report.transect.xTarget} written to ${report.imagePath}`);
  } catch (err) {
    if (err instanceof ValidationError) {
      console.error(`[Validation] ${err.name}: ${err.message}`);
    } else {
      console.error('[Validation] Unexpected failure:', err);
    }
    process.exitCode = 1;
  }
}

main();
