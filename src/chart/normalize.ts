/**
 * Data Normalizer
 *
 * Turns any accepted input shape into an ordered list of entries.
 * Order is the caller's; nothing is sorted or deduplicated.
 */

import { z } from 'zod';
import { ValidationError } from '../errors/index.js';
import type { ChartData, Entry } from './types.js';

function isMap(
  values: Readonly<Record<string, number>> | ReadonlyMap<string, number>
): values is ReadonlyMap<string, number> {
  return values instanceof Map;
}

export function normalizeData(data: ChartData): Entry[] {
  let entries: Entry[];

  switch (data.kind) {
    case 'record':
      entries = isMap(data.values)
        ? Array.from(data.values, ([label, value]) => ({ label, value }))
        : Object.entries(data.values).map(([label, value]) => ({ label, value }));
      break;
    case 'pairs':
      entries = data.pairs.map(([label, value]) => ({ label, value }));
      break;
    case 'values':
      entries = data.values.map((value, index) => ({ label: String(index), value, decimals: true }));
      break;
  }

  if (entries.length === 0) {
    throw new ValidationError('Data cannot be empty', ['data']);
  }

  return entries;
}

// =============================================================================
// UNTYPED INPUT
// =============================================================================

const ValuesSchema = z.array(z.number());
const PairsSchema = z.array(z.tuple([z.coerce.string(), z.number()]));
const PointsSchema = z.array(z.object({ label: z.coerce.string(), value: z.number() }));
const RecordSchema = z.record(z.string(), z.number());

/**
 * Map untyped input (parsed JSON) onto `ChartData`.
 *
 * Accepts `[1, 2]`, `[["a", 1]]`, `[{ "label": "a", "value": 1 }]` and
 * `{ "a": 1 }`. An empty array is accepted here and rejected as empty data
 * when the chart is built.
 *
 * @throws ValidationError when the input matches none of these shapes
 */
export function parseChartData(input: unknown): ChartData {
  const values = ValuesSchema.safeParse(input);
  if (values.success) {
    return { kind: 'values', values: values.data };
  }

  const pairs = PairsSchema.safeParse(input);
  if (pairs.success) {
    return { kind: 'pairs', pairs: pairs.data };
  }

  const points = PointsSchema.safeParse(input);
  if (points.success) {
    return { kind: 'pairs', pairs: points.data.map(p => [p.label, p.value] as const) };
  }

  const record = RecordSchema.safeParse(input);
  if (record.success) {
    return { kind: 'record', values: record.data };
  }

  throw new ValidationError(
    'Unsupported data shape: expected an array of numbers, an array of [label, value] pairs, ' +
      'an array of { label, value } objects, or an object of numbers',
    ['data']
  );
}
