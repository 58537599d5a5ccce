/**
 * Layout Engine
 *
 * Pure geometry: how many cells each bar gets. No styling happens here.
 */

import type { RenderOptions } from '../render/segment.js';
import { cellLength } from '../render/segment.js';
import {
  DEFAULT_CHART_HEIGHT,
  END_BLOCK_ELEMENTS,
  FULL_BLOCK,
  LABEL_PADDING,
  VALUE_COLUMN_WIDTH,
} from './blocks.js';
import { scaleValue } from './scale.js';
import type { Entry } from './types.js';

// =============================================================================
// HORIZONTAL
// =============================================================================

export interface HorizontalBar {
  /** Cells before scaling into blocks */
  extent: number;
  fullBlocks: number;
  /** Partial glyph for the remainder, empty when none applies */
  partial: string;
}

export interface HorizontalLayout {
  /** Total width used for the layout */
  width: number;
  /** Label column, including the padding */
  labelWidth: number;
  barAreaWidth: number;
  bars: HorizontalBar[];
}

export interface HorizontalLayoutParams {
  width?: number;
  maximum: number;
  showValues: boolean;
  barWidth: number;
}

/**
 * Split an extent into whole blocks plus an eighth-block glyph for the
 * remainder. Remainders outside the glyph table draw nothing.
 */
export function splitExtent(extent: number, barWidth: number): Omit<HorizontalBar, 'extent'> {
  const fullBlocks = Math.floor(extent / barWidth);
  const remainder = extent % barWidth;
  const partial = remainder > 0 && remainder < END_BLOCK_ELEMENTS.length ? END_BLOCK_ELEMENTS[remainder] : '';
  return { fullBlocks, partial };
}

export function layoutHorizontal(
  entries: readonly Entry[],
  params: HorizontalLayoutParams,
  options: RenderOptions
): HorizontalLayout {
  const width = Math.min(params.width ?? options.maxWidth, options.maxWidth);

  const labelWidth = entries.reduce((m, e) => Math.max(m, cellLength(e.label)), 0) + LABEL_PADDING;

  let barAreaWidth = width - labelWidth;
  if (params.showValues) {
    barAreaWidth -= VALUE_COLUMN_WIDTH;
  }
  barAreaWidth = Math.max(1, barAreaWidth);

  const bars = entries.map(entry => {
    const extent = scaleValue(entry.value, params.maximum, barAreaWidth);
    return { extent, ...splitExtent(extent, params.barWidth) };
  });

  return { width, labelWidth, barAreaWidth, bars };
}

/** Glyph string for a horizontal bar. */
export function barGlyphs(bar: HorizontalBar): string {
  return FULL_BLOCK.repeat(bar.fullBlocks) + bar.partial;
}

// =============================================================================
// VERTICAL
// =============================================================================

export interface VerticalLayout {
  chartHeight: number;
  /** Bar height in rows, per entry */
  heights: number[];
}

export interface VerticalLayoutParams {
  chartHeight?: number;
  maximum: number;
}

/**
 * Rows available for bars: the explicit height, else the smaller of the
 * default and the container's height. Never less than 1.
 */
export function resolveChartHeight(chartHeight: number | undefined, options: RenderOptions): number {
  const height = chartHeight ?? Math.min(DEFAULT_CHART_HEIGHT, options.height ?? DEFAULT_CHART_HEIGHT);
  return Math.max(1, height);
}

export function layoutVertical(
  entries: readonly Entry[],
  params: VerticalLayoutParams,
  options: RenderOptions
): VerticalLayout {
  const chartHeight = resolveChartHeight(params.chartHeight, options);
  // Heights are needed before the first (top) row is drawn.
  const heights = entries.map(entry => scaleValue(entry.value, params.maximum, chartHeight));
  return { chartHeight, heights };
}

/**
 * Fit a label into a column: truncated or right-padded to `barWidth` cells.
 */
export function fitLabel(label: string, barWidth: number): string {
  const chars = Array.from(label);
  if (chars.length >= barWidth) {
    return chars.slice(0, barWidth).join('');
  }
  return label + ' '.repeat(barWidth - chars.length);
}
