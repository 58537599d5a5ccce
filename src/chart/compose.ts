/**
 * Line Composer
 *
 * Assembles segments from a layout and the chart's resolved styles.
 */

import { lineBreak, segment, cellLength, type Segment } from '../render/segment.js';
import { parseStyle, type Style, type StyleToken } from '../render/style.js';
import { COLUMN_GAP, DEFAULT_PALETTE, FULL_BLOCK } from './blocks.js';
import { barGlyphs, fitLabel, type HorizontalLayout, type VerticalLayout } from './layout.js';
import type { Entry } from './types.js';

export interface ComposeStyles {
  /** One style per entry */
  barStyles: readonly Style[];
  labelStyle?: Style;
  valueStyle?: Style;
}

// =============================================================================
// STYLE RESOLUTION
// =============================================================================

export interface BarStyleSources {
  barStyles?: readonly StyleToken[];
  style?: StyleToken;
  palette?: readonly StyleToken[];
}

/**
 * An empty style string counts as no style at all.
 */
export function isStyleGiven(token: StyleToken | undefined): token is StyleToken {
  return token !== undefined && token !== '';
}

/**
 * Resolve one style per bar.
 *
 * Precedence: `barStyles` cycled by index, then the single `style`, then the
 * palette cycled by index. Each distinct token is parsed once.
 */
export function resolveBarStyles(count: number, sources: BarStyleSources): Style[] {
  const { barStyles, style, palette = DEFAULT_PALETTE } = sources;

  let tokens: readonly StyleToken[];
  if (barStyles && barStyles.length > 0) {
    tokens = barStyles;
  } else if (isStyleGiven(style)) {
    tokens = [style];
  } else {
    tokens = palette;
  }

  const parsed = tokens.map(parseStyle);
  return Array.from({ length: count }, (_, idx) => parsed[idx % parsed.length]);
}

// =============================================================================
// VALUES
// =============================================================================

/**
 * Value text: integers as-is, everything else with two decimals. Always
 * prefixed by a space. Bare-value input always takes two decimals.
 */
export function formatValue(value: number, decimals = false): string {
  return Number.isInteger(value) && !decimals ? ` ${value}` : ` ${value.toFixed(2)}`;
}

// =============================================================================
// HORIZONTAL
// =============================================================================

/**
 * One line per entry: right-aligned label, a space, the bar, then the value.
 */
export function* composeHorizontal(
  entries: readonly Entry[],
  layout: HorizontalLayout,
  styles: ComposeStyles,
  showValues: boolean
): Generator<Segment> {
  for (let idx = 0; idx < entries.length; idx++) {
    const { label, value, decimals } = entries[idx];
    const bar = layout.bars[idx];

    yield segment(' '.repeat(Math.max(0, layout.labelWidth - cellLength(label) - 1)));
    yield segment(label, styles.labelStyle);
    yield segment(' ');
    yield segment(barGlyphs(bar), styles.barStyles[idx]);
    if (showValues) {
      yield segment(formatValue(value, decimals), styles.valueStyle);
    }
    yield lineBreak();
  }
}

// =============================================================================
// VERTICAL
// =============================================================================

/**
 * Bar rows from the top row down, then one label row.
 */
export function* composeVertical(
  entries: readonly Entry[],
  layout: VerticalLayout,
  styles: ComposeStyles,
  barWidth: number
): Generator<Segment> {
  const filled = FULL_BLOCK.repeat(barWidth);
  const blank = ' '.repeat(barWidth);

  for (let row = layout.chartHeight; row >= 1; row--) {
    for (let idx = 0; idx < entries.length; idx++) {
      if (idx > 0) {
        yield segment(COLUMN_GAP);
      }
      yield layout.heights[idx] >= row
        ? segment(filled, styles.barStyles[idx])
        : segment(blank);
    }
    yield lineBreak();
  }

  for (let idx = 0; idx < entries.length; idx++) {
    if (idx > 0) {
      yield segment(COLUMN_GAP);
    }
    yield segment(fitLabel(entries[idx].label, barWidth), styles.labelStyle);
  }
  yield lineBreak();
}
