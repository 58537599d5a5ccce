/**
 * Glyphs and built-in constants shared by the layout engine and the composer.
 */

export const FULL_BLOCK = '█';

/**
 * Partial blocks by eighths, indexed by remainder. Index 0 is a blank cell
 * and never drawn.
 */
export const END_BLOCK_ELEMENTS = [' ', '▏', '▎', '▍', '▌', '▋', '▊', '▉'] as const;

/** Styles cycled through when neither `barStyles` nor `style` is given. */
export const DEFAULT_PALETTE = [
  'blue',
  'green',
  'yellow',
  'magenta',
  'cyan',
  'red',
  'bright_blue',
  'bright_green',
] as const;

/** Cells reserved for the value column in horizontal mode. */
export const VALUE_COLUMN_WIDTH = 12;

/** Padding added to the longest label. */
export const LABEL_PADDING = 2;

export const DEFAULT_CHART_HEIGHT = 10;

export const MIN_RENDER_WIDTH = 20;

/** Gap between columns in vertical mode. */
export const COLUMN_GAP = ' ';
