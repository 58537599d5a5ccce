/**
 * ANSI writer: turns a segment stream into a terminal string with chalk.
 */

import { Chalk, type ChalkInstance, type ColorSupportLevel } from 'chalk';
import type { Color, Style } from './style.js';
import { splitLines, type Renderable, type RenderOptions, type Segment } from './segment.js';

type ForegroundName =
  | 'black' | 'red' | 'green' | 'yellow' | 'blue' | 'magenta' | 'cyan' | 'white'
  | 'blackBright' | 'redBright' | 'greenBright' | 'yellowBright'
  | 'blueBright' | 'magentaBright' | 'cyanBright' | 'whiteBright';

type BackgroundName = `bg${Capitalize<ForegroundName>}`;

const BACKGROUNDS: Record<ForegroundName, BackgroundName> = {
  black: 'bgBlack',
  red: 'bgRed',
  green: 'bgGreen',
  yellow: 'bgYellow',
  blue: 'bgBlue',
  magenta: 'bgMagenta',
  cyan: 'bgCyan',
  white: 'bgWhite',
  blackBright: 'bgBlackBright',
  redBright: 'bgRedBright',
  greenBright: 'bgGreenBright',
  yellowBright: 'bgYellowBright',
  blueBright: 'bgBlueBright',
  magentaBright: 'bgMagentaBright',
  cyanBright: 'bgCyanBright',
  whiteBright: 'bgWhiteBright',
};

export function foregroundName(color: Extract<Color, { type: 'named' }>): ForegroundName {
  return color.bright ? `${color.name}Bright` : color.name;
}

/**
 * Build the chalk chain for a style.
 */
export function styleChain(chalk: ChalkInstance, style: Style): ChalkInstance {
  let chain = chalk;

  if (style.color) {
    chain = style.color.type === 'hex' ? chain.hex(style.color.hex) : chain[foregroundName(style.color)];
  }
  if (style.bgcolor) {
    chain = style.bgcolor.type === 'hex' ? chain.bgHex(style.bgcolor.hex) : chain[BACKGROUNDS[foregroundName(style.bgcolor)]];
  }
  if (style.bold) chain = chain.bold;
  if (style.dim) chain = chain.dim;
  if (style.italic) chain = chain.italic;
  if (style.underline) chain = chain.underline;
  if (style.strike) chain = chain.strikethrough;
  if (style.reverse) chain = chain.inverse;

  return chain;
}

export interface AnsiOptions {
  /** Chalk color level; 0 disables escapes. Defaults to chalk's detection. */
  level?: ColorSupportLevel;
}

/**
 * Render a segment stream to a string, one `\n`-terminated line per row.
 */
export function segmentsToAnsi(segments: Iterable<Segment>, options: AnsiOptions = {}): string {
  const chalk = options.level === undefined ? new Chalk() : new Chalk({ level: options.level });

  return splitLines(segments)
    .map(line =>
      line.map(seg => (seg.style ? styleChain(chalk, seg.style)(seg.text) : seg.text)).join('') + '\n'
    )
    .join('');
}

export function renderToAnsi(
  renderable: Renderable,
  renderOptions: RenderOptions,
  options: AnsiOptions = {}
): string {
  return segmentsToAnsi(renderable.render(renderOptions), options);
}
