import {
  decimalsFor,
  fixedOrNiceTicks,
  formatTick,
  niceStep,
  paddedRange,
  ticksAtInterval,
} from "./axis";

describe("paddedRange", () => {
  it("adds five percent of the span on each side", () => {
    const range = paddedRange([0, 0.5, 1], 0.05);
    expect(range?.min).toBeCloseTo(-0.05, 15);
    expect(range?.max).toBeCloseTo(1.05, 15);
  });

  it("widens a flat range by the fallback half-width", () => {
    const range = paddedRange([0.3, 0.3], 0.05);
    expect(range?.min).toBeCloseTo(0.25, 15);
    expect(range?.max).toBeCloseTo(0.35, 15);
  });

  it("has no range without values", () => {
    expect(paddedRange([], 1)).toBeNull();
  });
});

describe("niceStep", () => {
  it.each([
    [1, 0.2],
    [0.11, 0.02],
    [9, 2],
    [14, 2.5],
    [30, 5],
    [55, 10],
  ])("picks a 1/2/2.5/5 step for span %p", (span, step) => {
    expect(niceStep(span)).toBeCloseTo(step, 12);
  });

  it("falls back to 1 for an empty span", () => {
    expect(niceStep(0)).toBe(1);
  });
});

describe("decimalsFor", () => {
  it.each([
    [0.05, 2],
    [2.5, 1],
    [10, 0],
    [0.025, 3],
    [2.5e-7, 8],
  ])("needs %p -> %p decimals", (step, decimals) => {
    expect(decimalsFor(step)).toBe(decimals);
  });
});

describe("ticksAtInterval", () => {
  it("places ticks on multiples of the interval without rounding noise", () => {
    const ticks = ticksAtInterval({ min: -0.0275, max: 0.5775 }, 0.05);
    expect(ticks.values).toEqual([0, 0.05, 0.1, 0.15, 0.2, 0.25, 0.3, 0.35, 0.4, 0.45, 0.5, 0.55]);
  });

  it("includes ticks that fall exactly on the range ends", () => {
    expect(ticksAtInterval({ min: 0, max: 1 }, 0.25).values).toEqual([0, 0.25, 0.5, 0.75, 1]);
  });
});

describe("fixedOrNiceTicks", () => {
  it("keeps the fixed interval for typical channel velocities", () => {
    const ticks = fixedOrNiceTicks({ min: 0, max: 0.2 }, 0.05);
    expect(ticks.step).toBe(0.05);
    expect(ticks.values).toEqual([0, 0.05, 0.1, 0.15, 0.2]);
  });

  it("falls back to nice ticks when the interval would crowd the axis", () => {
    const ticks = fixedOrNiceTicks({ min: 0, max: 30 }, 0.05);
    expect(ticks.step).toBe(5);
    expect(ticks.values).toEqual([0, 5, 10, 15, 20, 25, 30]);
  });

  it("falls back to nice ticks when the interval leaves fewer than two ticks", () => {
    const ticks = fixedOrNiceTicks({ min: 0.101, max: 0.109 }, 0.05);
    expect(ticks.step).toBeCloseTo(0.002, 15);
    expect(ticks.values).toEqual([0.102, 0.104, 0.106, 0.108]);
  });
});

describe("formatTick", () => {
  it("prints the step's precision", () => {
    expect(formatTick(0.1, 0.05)).toBe("0.10");
    expect(formatTick(5, 2.5)).toBe("5.0");
    expect(formatTick(20, 5)).toBe("20");
  });
});
