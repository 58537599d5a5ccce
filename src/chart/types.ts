/**
 * Chart data and option types.
 */

import { z } from 'zod';
import { StyleTokenSchema, type Style } from '../render/style.js';

// =============================================================================
// DATA
// =============================================================================

export interface Entry {
  readonly label: string;
  readonly value: number;
  /** Always print the value with two decimals */
  readonly decimals?: boolean;
}

/**
 * Input accepted by the chart, tagged by shape.
 */
export type ChartData =
  | { kind: 'record'; values: Readonly<Record<string, number>> | ReadonlyMap<string, number> }
  | { kind: 'pairs'; pairs: ReadonlyArray<readonly [string, number]> }
  | { kind: 'values'; values: readonly number[] };

// =============================================================================
// OPTIONS
// =============================================================================

export type Orientation = 'horizontal' | 'vertical';

export const BarChartOptionsSchema = z
  .object({
    /** Width of the chart in cells; omitted means the container's width */
    width: z.number().int().optional(),
    /** Value treated as 100%; omitted means the largest value */
    maxValue: z.number().optional(),
    showValues: z.boolean().optional(),
    /** Cells per bar: vertical column width, horizontal block divisor */
    barWidth: z.number().int().positive().optional(),
    orientation: z.enum(['horizontal', 'vertical']).optional(),
    /** Rows of bars in vertical mode; floored at 1 */
    chartHeight: z.number().int().optional(),
    style: StyleTokenSchema.optional(),
    barStyles: z.array(StyleTokenSchema).optional(),
    labelStyle: StyleTokenSchema.optional(),
    valueStyle: StyleTokenSchema.optional(),
  })
  .strict();

export type BarChartOptions = z.infer<typeof BarChartOptionsSchema>;

/**
 * Options after defaults are applied and styles resolved. Built once per
 * chart and never mutated.
 */
export interface ResolvedChartConfig {
  readonly width?: number;
  readonly maxValue: number;
  readonly showValues: boolean;
  readonly barWidth: number;
  readonly orientation: Orientation;
  readonly chartHeight?: number;
  /** One resolved style per entry, palette or cycling already applied */
  readonly barStyles: readonly Style[];
  readonly labelStyle?: Style;
  readonly valueStyle?: Style;
}
