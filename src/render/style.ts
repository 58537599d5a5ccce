/**
 * Style tokens and their resolved form.
 *
 * A token is either a string such as `"bold red on blue"`, `"#ff8800"`,
 * `"bright_green"` or `"none"`, or a structured descriptor. `parseStyle`
 * resolves either into a frozen `Style`; nothing downstream re-parses.
 */

import { z } from 'zod';
import { ValidationError } from '../errors/index.js';

// =============================================================================
// TYPES
// =============================================================================

export const STANDARD_COLORS = [
  'black',
  'red',
  'green',
  'yellow',
  'blue',
  'magenta',
  'cyan',
  'white',
] as const;

export type StandardColor = (typeof STANDARD_COLORS)[number];

/**
 * A resolved color. Named colors use the `bright_` prefix for the high
 * intensity variants; `gray` is stored as `bright_black`.
 */
export type Color =
  | { type: 'named'; name: StandardColor; bright: boolean }
  | { type: 'hex'; hex: string };

export interface Style {
  readonly color?: Color;
  readonly bgcolor?: Color;
  readonly bold?: boolean;
  readonly dim?: boolean;
  readonly italic?: boolean;
  readonly underline?: boolean;
  readonly strike?: boolean;
  readonly reverse?: boolean;
}

export const StyleDescriptorSchema = z
  .object({
    color: z.string().optional(),
    bgcolor: z.string().optional(),
    bold: z.boolean().optional(),
    dim: z.boolean().optional(),
    italic: z.boolean().optional(),
    underline: z.boolean().optional(),
    strike: z.boolean().optional(),
    reverse: z.boolean().optional(),
  })
  .strict();

export type StyleDescriptor = z.infer<typeof StyleDescriptorSchema>;

export const StyleTokenSchema = z.union([z.string(), StyleDescriptorSchema]);

export type StyleToken = z.infer<typeof StyleTokenSchema>;

type Attribute = 'bold' | 'dim' | 'italic' | 'underline' | 'strike' | 'reverse';

const ATTRIBUTE_ALIASES: Record<string, Attribute> = {
  bold: 'bold',
  b: 'bold',
  dim: 'dim',
  d: 'dim',
  italic: 'italic',
  i: 'italic',
  underline: 'underline',
  u: 'underline',
  strike: 'strike',
  s: 'strike',
  reverse: 'reverse',
  r: 'reverse',
};

const HEX_PATTERN = /^#([0-9a-f]{6}|[0-9a-f]{3})$/i;

// =============================================================================
// COLORS
// =============================================================================

function isStandardColor(name: string): name is StandardColor {
  return (STANDARD_COLORS as readonly string[]).includes(name);
}

/**
 * Parse a color name. Returns `null` for `default`, `undefined` when the
 * word is not a color at all.
 */
export function parseColor(word: string): Color | null | undefined {
  const name = word.toLowerCase();

  if (name === 'default') {
    return null;
  }

  const hex = HEX_PATTERN.exec(name);
  if (hex) {
    const digits = hex[1].length === 3
      ? hex[1].split('').map(d => d + d).join('')
      : hex[1];
    return { type: 'hex', hex: `#${digits}` };
  }

  if (name === 'grey' || name === 'gray') {
    return { type: 'named', name: 'black', bright: true };
  }

  if (name.startsWith('bright_')) {
    const base = name.slice('bright_'.length);
    return isStandardColor(base) ? { type: 'named', name: base, bright: true } : undefined;
  }

  return isStandardColor(name) ? { type: 'named', name, bright: false } : undefined;
}

function requireColor(word: string, field: string): Color | undefined {
  const color = parseColor(word);
  if (color === undefined) {
    throw new ValidationError(`Unknown color '${word}'`, [field]);
  }
  return color ?? undefined;
}

// =============================================================================
// PARSING
// =============================================================================

/**
 * Parse a style string.
 *
 * Grammar: whitespace separated words; attributes (`bold`, `italic`, ...),
 * at most one foreground color, and `on <color>` for the background.
 * `none` and the empty string yield an empty style.
 */
function parseStyleString(definition: string): Style {
  const words = definition.trim().toLowerCase().split(/\s+/).filter(Boolean);
  if (words.length === 0 || (words.length === 1 && words[0] === 'none')) {
    return Object.freeze({});
  }

  const style: {
    -readonly [K in keyof Style]: Style[K];
  } = {};

  for (let i = 0; i < words.length; i++) {
    const word = words[i];

    if (word === 'on') {
      const next = words[i + 1];
      if (next === undefined) {
        throw new ValidationError(`Expected a color after 'on' in style '${definition}'`, ['bgcolor']);
      }
      style.bgcolor = requireColor(next, 'bgcolor');
      i++;
      continue;
    }

    const attribute = ATTRIBUTE_ALIASES[word];
    if (attribute) {
      style[attribute] = true;
      continue;
    }

    const color = parseColor(word);
    if (color === undefined) {
      throw new ValidationError(`Unknown style word '${word}' in style '${definition}'`, ['style']);
    }
    style.color = color ?? undefined;
  }

  return Object.freeze(style);
}

function fromDescriptor(descriptor: StyleDescriptor): Style {
  const { color, bgcolor, ...attributes } = descriptor;
  return Object.freeze({
    ...attributes,
    ...(color !== undefined && { color: requireColor(color, 'color') }),
    ...(bgcolor !== undefined && { bgcolor: requireColor(bgcolor, 'bgcolor') }),
  });
}

/**
 * Resolve a style token to a `Style`.
 *
 * @throws ValidationError for unknown words, colors or descriptor keys
 */
export function parseStyle(token: StyleToken): Style {
  if (typeof token === 'string') {
    return parseStyleString(token);
  }

  const result = StyleDescriptorSchema.safeParse(token);
  if (!result.success) {
    throw ValidationError.fromZodError(result.error, 'Invalid style descriptor');
  }
  return fromDescriptor(result.data);
}
