/**
 * Axis ranges and tick placement for the profile chart
 */

export interface AxisRange {
  min: number;
  max: number;
}

export interface AxisTicks {
  step: number;
  values: number[];
}

// Fraction of the data range added on each side of an axis
export const AXIS_MARGIN = 0.05;

// More ticks than this at a fixed interval and the axis switches to nice ticks
export const MAX_FIXED_TICKS = 40;

const NICE_MULTIPLIERS = [1, 2, 2.5, 5, 10];

/**
 * Data range widened by AXIS_MARGIN on both ends. A flat range is widened by
 * `fallbackHalfWidth` instead so the axis never collapses to a point.
 */
export function paddedRange(values: readonly number[], fallbackHalfWidth: number): AxisRange | null {
  if (values.length === 0) return null;

  let min = Infinity;
  let max = -Infinity;
  for (const v of values) {
    min = Math.min(min, v);
    max = Math.max(max, v);
  }

  const span = max - min;
  if (span === 0) {
    return { min: min - fallbackHalfWidth, max: max + fallbackHalfWidth };
  }
  return { min: min - span * AXIS_MARGIN, max: max + span * AXIS_MARGIN };
}

/** Step from the 1 / 2 / 2.5 / 5 x 10^k series giving about `target` intervals. */
export function niceStep(span: number, target: number = 6): number {
  if (!(span > 0)) return 1;
  const raw = span / target;
  const magnitude = Math.pow(10, Math.floor(Math.log10(raw)));
  const normalized = raw / magnitude;
  const multiplier = NICE_MULTIPLIERS.find(m => m >= normalized - 1e-9) ?? 10;
  return multiplier * magnitude;
}

/** Number of decimals needed to print multiples of `step` exactly. */
export function decimalsFor(step: number): number {
  const text = Number(step.toPrecision(12)).toString();
  const exp = text.match(/e-(\d+)$/);
  if (exp) {
    const mantissa = text.slice(0, text.indexOf('e'));
    const dot = mantissa.indexOf('.');
    return Number(exp[1]) + (dot >= 0 ? mantissa.length - dot - 1 : 0);
  }
  const dot = text.indexOf('.');
  return dot >= 0 ? text.length - dot - 1 : 0;
}

/** Multiples of `step` inside [min, max], rounded to the step's precision. */
export function ticksAtInterval(range: AxisRange, step: number): AxisTicks {
  const decimals = decimalsFor(step);
  const first = Math.ceil(range.min / step - 1e-9);
  const last = Math.floor(range.max / step + 1e-9);

  const values: number[] = [];
  for (let k = first; k <= last; k++) {
    const v = Number((k * step).toFixed(decimals));
    // Avoid printing "-0"
    values.push(v === 0 ? 0 : v);
  }
  return { step, values };
}

/**
 * Ticks every `interval` when that gives a readable axis, nice ticks otherwise.
 */
export function fixedOrNiceTicks(range: AxisRange, interval: number): AxisTicks {
  const count = (range.max - range.min) / interval;
  if (interval > 0 && count <= MAX_FIXED_TICKS) {
    const ticks = ticksAtInterval(range, interval);
    if (ticks.values.length >= 2) return ticks;
  }
  return ticksAtInterval(range, niceStep(range.max - range.min));
}

export function formatTick(value: number, step: number): string {
  return value.toFixed(decimalsFor(step));
}
