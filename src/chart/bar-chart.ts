/**
 * Bar Chart Renderable
 *
 * Built once from data and options; `render` is a pure projection of that
 * state onto the container's width and height and can be called any number
 * of times.
 *
 * @example
 * ```typescript
 * const chart = BarChart.fromRecord({ a: 1, bb: 2, ccc: 4 }, { width: 30 });
 * process.stdout.write(renderToAnsi(chart, { maxWidth: 80 }));
 * ```
 */

import { ValidationError } from '../errors/index.js';
import type { Measurement, Renderable, RenderOptions, Segment } from '../render/segment.js';
import { parseStyle } from '../render/style.js';
import { createComponentLogger } from '../utilities/logger.js';
import { MIN_RENDER_WIDTH } from './blocks.js';
import { composeHorizontal, composeVertical, isStyleGiven, resolveBarStyles } from './compose.js';
import { layoutHorizontal, layoutVertical } from './layout.js';
import { normalizeData } from './normalize.js';
import { effectiveMaximum } from './scale.js';
import {
  BarChartOptionsSchema,
  type BarChartOptions,
  type ChartData,
  type Entry,
  type ResolvedChartConfig,
} from './types.js';

export class BarChart implements Renderable {
  readonly entries: readonly Entry[];
  readonly config: ResolvedChartConfig;

  constructor(data: ChartData, options: BarChartOptions = {}) {
    const parsed = BarChartOptionsSchema.safeParse(options);
    if (!parsed.success) {
      throw ValidationError.fromZodError(parsed.error, 'Invalid chart options');
    }
    const opts = parsed.data;

    this.entries = Object.freeze(normalizeData(data).map(e => Object.freeze({ ...e })));

    this.config = Object.freeze({
      width: opts.width,
      maxValue: effectiveMaximum(this.entries, opts.maxValue),
      showValues: opts.showValues ?? true,
      barWidth: opts.barWidth ?? 1,
      orientation: opts.orientation ?? 'horizontal',
      chartHeight: opts.chartHeight,
      barStyles: Object.freeze(
        resolveBarStyles(this.entries.length, { barStyles: opts.barStyles, style: opts.style })
      ),
      labelStyle: isStyleGiven(opts.labelStyle) ? parseStyle(opts.labelStyle) : undefined,
      valueStyle: isStyleGiven(opts.valueStyle) ? parseStyle(opts.valueStyle) : undefined,
    });

    createComponentLogger('BarChart').debug('Chart built', {
      entries: this.entries.length,
      maxValue: this.config.maxValue,
      orientation: this.config.orientation,
    });
  }

  static fromRecord(
    values: Readonly<Record<string, number>> | ReadonlyMap<string, number>,
    options?: BarChartOptions
  ): BarChart {
    return new BarChart({ kind: 'record', values }, options);
  }

  static fromPairs(pairs: ReadonlyArray<readonly [string, number]>, options?: BarChartOptions): BarChart {
    return new BarChart({ kind: 'pairs', pairs }, options);
  }

  static fromValues(values: readonly number[], options?: BarChartOptions): BarChart {
    return new BarChart({ kind: 'values', values }, options);
  }

  /**
   * Yield the chart as segments. Each call returns a fresh generator.
   */
  render(options: RenderOptions): Generator<Segment> {
    const { config, entries } = this;
    const styles = {
      barStyles: config.barStyles,
      labelStyle: config.labelStyle,
      valueStyle: config.valueStyle,
    };

    if (config.orientation === 'vertical') {
      const layout = layoutVertical(
        entries,
        { chartHeight: config.chartHeight, maximum: config.maxValue },
        options
      );
      return composeVertical(entries, layout, styles, config.barWidth);
    }

    const layout = layoutHorizontal(
      entries,
      {
        width: config.width,
        maximum: config.maxValue,
        showValues: config.showValues,
        barWidth: config.barWidth,
      },
      options
    );
    return composeHorizontal(entries, layout, styles, config.showValues);
  }

  measure(options: RenderOptions): Measurement {
    if (this.config.width !== undefined) {
      return { minimum: this.config.width, maximum: this.config.width };
    }
    return { minimum: MIN_RENDER_WIDTH, maximum: options.maxWidth };
  }
}
