/**
 * Zod schemas for user-facing configuration (config.json).
 *
 * Validates `~/.config/termbars/config.json` and `.termbars/config.json`.
 */

import { z } from 'zod';
import { BarChartOptionsSchema } from '../chart/types.js';
import { LOG_LEVELS } from '../utilities/logger.js';

// =============================================================================
// SECTIONS
// =============================================================================

/**
 * Chart defaults. Same keys as the chart options, all optional; `width`
 * and `maxValue` are per-invocation and left to the command line.
 */
const ChartDefaultsSchema = BarChartOptionsSchema.omit({ width: true, maxValue: true });

const LoggingSchema = z
  .object({
    level: z.enum(LOG_LEVELS).optional(),
    /** Append JSON log lines to this file; `true` uses the default state path */
    file: z.union([z.string(), z.boolean()]).optional(),
  })
  .strict();

// =============================================================================
// TOP-LEVEL USER CONFIG SCHEMA
// =============================================================================

/**
 * Uses `.passthrough()` at the top level so unknown keys survive;
 * sections use `.strict()` to catch typos.
 */
export const UserConfigSchema = z
  .object({
    chart: ChartDefaultsSchema.optional(),
    color: z.boolean().optional(),
    logging: LoggingSchema.optional(),
  })
  .passthrough();

export type ValidatedUserConfig = z.infer<typeof UserConfigSchema>;

export type ChartDefaults = z.infer<typeof ChartDefaultsSchema>;
