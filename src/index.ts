/**
 * termbars: bar charts as styled block characters.
 */

export { BarChart } from './chart/bar-chart.js';
export { normalizeData, parseChartData } from './chart/normalize.js';
export { effectiveMaximum, scaleValue } from './chart/scale.js';
export {
  layoutHorizontal,
  layoutVertical,
  resolveChartHeight,
  splitExtent,
  fitLabel,
  type HorizontalLayout,
  type HorizontalBar,
  type VerticalLayout,
} from './chart/layout.js';
export { composeHorizontal, composeVertical, resolveBarStyles, formatValue } from './chart/compose.js';
export {
  FULL_BLOCK,
  END_BLOCK_ELEMENTS,
  DEFAULT_PALETTE,
  DEFAULT_CHART_HEIGHT,
} from './chart/blocks.js';
export {
  BarChartOptionsSchema,
  type BarChartOptions,
  type ChartData,
  type Entry,
  type Orientation,
  type ResolvedChartConfig,
} from './chart/types.js';

export {
  lineBreak,
  splitLines,
  lineText,
  type Segment,
  type RenderOptions,
  type Measurement,
  type Renderable,
} from './render/segment.js';
export { parseStyle, parseColor, type Style, type StyleToken, type Color } from './render/style.js';
export { renderToAnsi, segmentsToAnsi, type AnsiOptions } from './render/ansi.js';

export { BarChartView, renderWithInk } from './tui/index.js';

export * from './errors/index.js';
export {
  logger,
  configureLogger,
  createComponentLogger,
  StructuredLogger,
  ConsoleSink,
  MemorySink,
  FileSink,
  type LogLevel,
} from './utilities/logger.js';
