/**
 * CLI Argument Parsing and Help
 */

import chalk from 'chalk';
import { ValidationError } from './errors/index.js';
import type { BarChartOptions } from './chart/types.js';

export const VERSION = '0.1.0';

/**
 * CLI arguments structure. `chart` only carries the options given on the
 * command line, so config defaults show through for the rest.
 */
export interface CLIArgs {
  help: boolean;
  version: boolean;
  debug: boolean;
  /** Render through Ink instead of writing ANSI text */
  ink: boolean;
  /** undefined means auto-detect */
  color?: boolean;
  /** Input file; stdin when omitted */
  file?: string;
  /** Config file replacing the user-level one */
  config?: string;
  chart: BarChartOptions;
}

function requireValue(args: readonly string[], i: number, flag: string): string {
  const value = args[i + 1];
  if (value === undefined) {
    throw new ValidationError(`Missing value for ${flag}`, [flag]);
  }
  return value;
}

function parseInteger(value: string, flag: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new ValidationError(`${flag} expects a positive integer, got '${value}'`, [flag]);
  }
  return n;
}

function parseNumber(value: string, flag: string): number {
  const n = Number(value);
  if (value.trim() === '' || Number.isNaN(n)) {
    throw new ValidationError(`${flag} expects a number, got '${value}'`, [flag]);
  }
  return n;
}

/**
 * Parse command-line arguments (without the node and script entries).
 *
 * @throws ValidationError for unknown flags or malformed values
 */
export function parseArgs(args: readonly string[]): CLIArgs {
  const result: CLIArgs = {
    help: false,
    version: false,
    debug: false,
    ink: false,
    chart: {},
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '--help' || arg === '-h') {
      result.help = true;
    } else if (arg === '--version' || arg === '-v') {
      result.version = true;
    } else if (arg === '--debug') {
      result.debug = true;
    } else if (arg === '--ink') {
      result.ink = true;
    } else if (arg === '--config' || arg === '-c') {
      result.config = requireValue(args, i++, arg);
    } else if (arg === '--color') {
      result.color = true;
    } else if (arg === '--no-color') {
      result.color = false;
    } else if (arg === '--width' || arg === '-w') {
      result.chart.width = parseInteger(requireValue(args, i++, arg), arg);
    } else if (arg === '--max') {
      result.chart.maxValue = parseNumber(requireValue(args, i++, arg), arg);
    } else if (arg === '--values') {
      result.chart.showValues = true;
    } else if (arg === '--no-values') {
      result.chart.showValues = false;
    } else if (arg === '--bar-width' || arg === '-b') {
      result.chart.barWidth = parseInteger(requireValue(args, i++, arg), arg);
    } else if (arg === '--vertical') {
      result.chart.orientation = 'vertical';
    } else if (arg === '--horizontal') {
      result.chart.orientation = 'horizontal';
    } else if (arg === '--height') {
      result.chart.chartHeight = parseInteger(requireValue(args, i++, arg), arg);
    } else if (arg === '--style') {
      result.chart.style = requireValue(args, i++, arg);
    } else if (arg === '--bar-styles') {
      result.chart.barStyles = requireValue(args, i++, arg)
        .split(',')
        .map(s => s.trim())
        .filter(Boolean);
    } else if (arg === '--label-style') {
      result.chart.labelStyle = requireValue(args, i++, arg);
    } else if (arg === '--value-style') {
      result.chart.valueStyle = requireValue(args, i++, arg);
    } else if (arg === '-') {
      result.file = undefined;
    } else if (arg.startsWith('-')) {
      throw new ValidationError(`Unknown option: ${arg}`, [arg]);
    } else if (result.file === undefined) {
      result.file = arg;
    } else {
      throw new ValidationError(`Unexpected argument: ${arg}`, [arg]);
    }
  }

  return result;
}

/**
 * Help text.
 */
export function helpText(): string {
  const h = (text: string) => chalk.bold(text);
  const d = (text: string) => chalk.dim(text);

  return `${h('termbars')} ${d(`v${VERSION}`)}  bar charts in the terminal

${h('USAGE:')}
  termbars [FILE] [OPTIONS]

  Reads JSON from FILE, or from stdin when FILE is omitted or '-'.
  Accepted shapes: [1, 2, 3]  [["a", 1], ["b", 2]]
                   [{"label": "a", "value": 1}]  {"a": 1, "b": 2}

${h('OPTIONS:')}
  -h, --help              Show this help
  -v, --version           Show version
  -w, --width N           Chart width in cells (default: terminal width)
  --max N                 Value drawn as a full bar (default: largest value)
  --values, --no-values   Show or hide values (horizontal only)
  -b, --bar-width N       Cells per bar (default: 1)
  --vertical              Draw columns instead of rows
  --horizontal            Draw rows (default)
  --height N              Rows of bars in vertical mode (default: 10)
  --style STYLE           Style for every bar, e.g. "bold magenta"
  --bar-styles A,B,...    Styles cycled across bars
  --label-style STYLE     Style for labels
  --value-style STYLE     Style for values
  --color, --no-color     Force or disable ANSI colors
  -c, --config FILE       Use FILE instead of the user config
  --ink                   Render through Ink
  --debug                 Debug logging on stderr

${h('EXAMPLES:')}
  ${d('# Horizontal chart from a file')}
  termbars sales.json --width 60

  ${d('# Vertical chart from stdin')}
  echo '[3, 1, 4, 1, 5]' | termbars --vertical --height 5

${h('FILES:')}
  ~/.config/termbars/config.json   User defaults
  .termbars/config.json            Project defaults
`;
}
