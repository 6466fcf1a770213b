/**
 * Console output for the validation pipeline
 */

let debugEnabled = true;

export function setDebugOutput(enabled: boolean): void {
  debugEnabled = enabled;
}

export function isDebugOutputEnabled(): boolean {
  return debugEnabled;
}

export function debugLog(tag: string, message: string): void {
  if (!debugEnabled) return;
  console.log(`[${tag}] ${message}`);
}

export function debugWarn(tag: string, message: string): void {
  if (!debugEnabled) return;
  console.warn(`[${tag}] ${message}`);
}

/**
 * Format a number with a magnitude-appropriate precision
 */
export function formatValue(value: number, unit: string = ''): string {
  let formatted: string;

  if (!Number.isFinite(value)) {
    formatted = String(value);
  } else if (Math.abs(value) >= 1e6) {
    formatted = (value / 1e6).toFixed(2) + 'M';
  } else if (Math.abs(value) >= 1e3) {
    formatted = (value / 1e3).toFixed(2) + 'k';
  } else if (Math.abs(value) < 0.01 && value !== 0) {
    formatted = value.toExponential(2);
  } else {
    formatted = value.toFixed(2);
  }

  return unit ? `${formatted} ${unit}` : formatted;
}

export function elapsedMs(start: number): string {
  return `${(performance.now() - start).toFixed(1)}ms`;
}
