/**
 * Velocity profile chart
 *
 * Draws position along the transect (horizontal) against velocity magnitude
 * (vertical) on a 2D canvas and encodes it as PNG. Undefined profile values
 * split the line into separate segments; nothing is drawn for them.
 */

import * as fs from 'fs';
import * as path from 'path';
import { createCanvas, SKRSContext2D } from '@napi-rs/canvas';
import { Point, Profile } from '../types';
import { debugLog } from '../debug';
import { CHART_COLORS } from './colors';
import {
  AxisRange,
  AxisTicks,
  fixedOrNiceTicks,
  formatTick,
  niceStep,
  paddedRange,
  ticksAtInterval,
} from './axis';

export interface ChartMetadata {
  xTarget: number;
  title: string;
  positionLabel: string;
  velocityLabel: string;
  seriesLabel: string;
  /** Spacing of velocity ticks, m/s. */
  velocityTickInterval: number;
  width: number;
  height: number;
}

export type ChartStyle = Omit<ChartMetadata, 'xTarget' | 'title'>;

export const DEFAULT_CHART_STYLE: ChartStyle = {
  positionLabel: 'position y (m)',
  velocityLabel: 'velocity (m / s)',
  seriesLabel: 'Velocity Magnitude',
  velocityTickInterval: 0.05,
  width: 640,
  height: 480,
};

export function chartMetadata(xTarget: number, style: Partial<ChartStyle> = {}): ChartMetadata {
  return {
    ...DEFAULT_CHART_STYLE,
    ...style,
    xTarget,
    title: `velocity profile at x = ${xTarget}`,
  };
}

// ============================================================================
// Layout
// ============================================================================

interface PlotArea {
  left: number;
  top: number;
  width: number;
  height: number;
}

const MARGIN = { left: 80, right: 24, top: 48, bottom: 64 };
const FONT = '12px sans-serif';
const TITLE_FONT = '14px sans-serif';

export interface ChartScales {
  position: AxisRange;
  velocity: AxisRange;
  positionTicks: AxisTicks;
  velocityTicks: AxisTicks;
  hasData: boolean;
}

/** Runs of consecutive defined values, as (position, velocity) pairs. */
export function profileSegments(profile: Profile): Point[][] {
  const segments: Point[][] = [];
  let current: Point[] = [];

  for (const entry of profile) {
    if (entry.value === undefined) {
      if (current.length > 0) segments.push(current);
      current = [];
    } else {
      current.push({ x: entry.y, y: entry.value });
    }
  }
  if (current.length > 0) segments.push(current);

  return segments;
}

export function computeScales(profile: Profile, metadata: ChartMetadata): ChartScales {
  const positions = profile.map(e => e.y);
  const velocities: number[] = [];
  for (const e of profile) {
    if (e.value !== undefined) velocities.push(e.value);
  }

  const position = paddedRange(positions, 0.5) ?? { min: 0, max: 1 };
  const velocity = paddedRange(velocities, metadata.velocityTickInterval) ?? { min: 0, max: 1 };

  return {
    position,
    velocity,
    positionTicks: ticksAtInterval(position, niceStep(position.max - position.min)),
    velocityTicks: fixedOrNiceTicks(velocity, metadata.velocityTickInterval),
    hasData: velocities.length > 0,
  };
}

// ============================================================================
// Drawing
// ============================================================================

class ProfileChart {
  private ctx: SKRSContext2D;
  private plot: PlotArea;
  private scales: ChartScales;

  constructor(ctx: SKRSContext2D, private metadata: ChartMetadata, private profile: Profile) {
    this.ctx = ctx;
    this.scales = computeScales(profile, metadata);
    this.plot = {
      left: MARGIN.left,
      top: MARGIN.top,
      width: metadata.width - MARGIN.left - MARGIN.right,
      height: metadata.height - MARGIN.top - MARGIN.bottom,
    };
  }

  render(): void {
    const ctx = this.ctx;
    ctx.fillStyle = CHART_COLORS.background;
    ctx.fillRect(0, 0, this.metadata.width, this.metadata.height);

    this.renderGrid();
    this.renderSeries();
    this.renderFrame();
    this.renderLabels();
    if (this.scales.hasData) {
      this.renderLegend();
    } else {
      this.renderNoData();
    }
  }

  private toScreen(p: Point): Point {
    const { position, velocity } = this.scales;
    return {
      x: this.plot.left + ((p.x - position.min) / (position.max - position.min)) * this.plot.width,
      y: this.plot.top + this.plot.height - ((p.y - velocity.min) / (velocity.max - velocity.min)) * this.plot.height,
    };
  }

  private renderGrid(): void {
    const ctx = this.ctx;
    const { positionTicks, velocityTicks } = this.scales;
    const bottom = this.plot.top + this.plot.height;
    const right = this.plot.left + this.plot.width;

    ctx.strokeStyle = CHART_COLORS.grid;
    ctx.lineWidth = 0.8;

    for (const value of positionTicks.values) {
      const x = this.toScreen({ x: value, y: 0 }).x;
      ctx.beginPath();
      ctx.moveTo(x, this.plot.top);
      ctx.lineTo(x, bottom);
      ctx.stroke();
    }

    for (const value of velocityTicks.values) {
      const y = this.toScreen({ x: 0, y: value }).y;
      ctx.beginPath();
      ctx.moveTo(this.plot.left, y);
      ctx.lineTo(right, y);
      ctx.stroke();
    }
  }

  private renderSeries(): void {
    const ctx = this.ctx;
    ctx.save();
    ctx.beginPath();
    ctx.rect(this.plot.left, this.plot.top, this.plot.width, this.plot.height);
    ctx.clip();

    ctx.strokeStyle = CHART_COLORS.series;
    ctx.fillStyle = CHART_COLORS.series;
    ctx.lineWidth = 1.5;
    ctx.lineJoin = 'round';

    for (const segment of profileSegments(this.profile)) {
      const points = segment.map(p => this.toScreen(p));

      // A lone value between gaps has no line to sit on
      if (points.length === 1) {
        ctx.beginPath();
        ctx.arc(points[0].x, points[0].y, 2, 0, Math.PI * 2);
        ctx.fill();
        continue;
      }

      ctx.beginPath();
      ctx.moveTo(points[0].x, points[0].y);
      for (let i = 1; i < points.length; i++) {
        ctx.lineTo(points[i].x, points[i].y);
      }
      ctx.stroke();
    }

    ctx.restore();
  }

  private renderFrame(): void {
    const ctx = this.ctx;
    const { positionTicks, velocityTicks } = this.scales;
    const bottom = this.plot.top + this.plot.height;

    ctx.strokeStyle = CHART_COLORS.frame;
    ctx.lineWidth = 1;
    ctx.strokeRect(this.plot.left, this.plot.top, this.plot.width, this.plot.height);

    ctx.fillStyle = CHART_COLORS.text;
    ctx.font = FONT;

    ctx.textAlign = 'center';
    ctx.textBaseline = 'top';
    for (const value of positionTicks.values) {
      const x = this.toScreen({ x: value, y: 0 }).x;
      ctx.beginPath();
      ctx.moveTo(x, bottom);
      ctx.lineTo(x, bottom + 4);
      ctx.stroke();
      ctx.fillText(formatTick(value, positionTicks.step), x, bottom + 7);
    }

    ctx.textAlign = 'right';
    ctx.textBaseline = 'middle';
    for (const value of velocityTicks.values) {
      const y = this.toScreen({ x: 0, y: value }).y;
      ctx.beginPath();
      ctx.moveTo(this.plot.left - 4, y);
      ctx.lineTo(this.plot.left, y);
      ctx.stroke();
      ctx.fillText(formatTick(value, velocityTicks.step), this.plot.left - 7, y);
    }
  }

  private renderLabels(): void {
    const ctx = this.ctx;
    const centerX = this.plot.left + this.plot.width / 2;

    ctx.fillStyle = CHART_COLORS.text;
    ctx.font = TITLE_FONT;
    ctx.textAlign = 'center';
    ctx.textBaseline = 'middle';
    ctx.fillText(this.metadata.title, centerX, MARGIN.top / 2);

    ctx.font = FONT;
    ctx.fillText(this.metadata.positionLabel, centerX, this.metadata.height - MARGIN.bottom / 3);

    ctx.save();
    ctx.translate(18, this.plot.top + this.plot.height / 2);
    ctx.rotate(-Math.PI / 2);
    ctx.fillText(this.metadata.velocityLabel, 0, 0);
    ctx.restore();
  }

  private renderLegend(): void {
    const ctx = this.ctx;
    ctx.font = FONT;
    const labelWidth = ctx.measureText(this.metadata.seriesLabel).width;
    const boxWidth = labelWidth + 44;
    const boxHeight = 22;
    const x = this.plot.left + this.plot.width - boxWidth - 8;
    const y = this.plot.top + 8;

    ctx.fillStyle = CHART_COLORS.background;
    ctx.fillRect(x, y, boxWidth, boxHeight);
    ctx.strokeStyle = CHART_COLORS.legendBorder;
    ctx.lineWidth = 1;
    ctx.strokeRect(x, y, boxWidth, boxHeight);

    ctx.strokeStyle = CHART_COLORS.series;
    ctx.lineWidth = 1.5;
    ctx.beginPath();
    ctx.moveTo(x + 8, y + boxHeight / 2);
    ctx.lineTo(x + 30, y + boxHeight / 2);
    ctx.stroke();

    ctx.fillStyle = CHART_COLORS.text;
    ctx.textAlign = 'left';
    ctx.textBaseline = 'middle';
    ctx.fillText(this.metadata.seriesLabel, x + 36, y + boxHeight / 2);
  }

  private renderNoData(): void {
    const ctx = this.ctx;
    ctx.fillStyle = CHART_COLORS.mutedText;
    ctx.font = FONT;
    ctx.textAlign = 'center';
    ctx.textBaseline = 'middle';
    ctx.fillText(
      `no data at x = ${this.metadata.xTarget}`,
      this.plot.left + this.plot.width / 2,
      this.plot.top + this.plot.height / 2,
    );
  }
}

export function encodeProfileChart(profile: Profile, metadata: ChartMetadata): Buffer {
  const canvas = createCanvas(metadata.width, metadata.height);
  new ProfileChart(canvas.getContext('2d'), metadata, profile).render();
  return canvas.toBuffer('image/png');
}

/**
 * Render the chart and write it to `outputPath`, replacing any existing file.
 */
export function renderProfileChart(profile: Profile, metadata: ChartMetadata, outputPath: string): string {
  const png = encodeProfileChart(profile, metadata);
  fs.mkdirSync(path.dirname(outputPath), { recursive: true });
  fs.writeFileSync(outputPath, png);
  debugLog('Renderer', `Wrote ${outputPath} (${png.length} bytes)`);
  return outputPath;
}
