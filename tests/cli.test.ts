/**
 * CLI Tests
 *
 * Argument parsing and the full run: config, input, rendering, errors.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdir, mkdtemp, writeFile, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { parseArgs, helpText, VERSION } from '../src/cli.js';
import { run, type CliIO } from '../src/main.js';
import { ValidationError } from '../src/errors/index.js';
import { configureLogger } from '../src/utilities/logger.js';

vi.mock('../src/paths.js', async () => {
  const actual = await vi.importActual<typeof import('../src/paths.js')>('../src/paths.js');
  return {
    ...actual,
    getConfigPath: vi.fn(),
  };
});

import { getConfigPath } from '../src/paths.js';

const FULL = '█';

// =============================================================================
// parseArgs
// =============================================================================

describe('parseArgs', () => {
  it('returns defaults for no arguments', () => {
    expect(parseArgs([])).toEqual({
      help: false,
      version: false,
      debug: false,
      ink: false,
      chart: {},
    });
  });

  it('parses chart options', () => {
    const args = parseArgs([
      'data.json',
      '--width', '40',
      '--max', '2.5',
      '--no-values',
      '-b', '2',
      '--vertical',
      '--height', '6',
      '--style', 'bold red',
      '--label-style', 'dim',
      '--value-style', 'italic',
    ]);

    expect(args.file).toBe('data.json');
    expect(args.chart).toEqual({
      width: 40,
      maxValue: 2.5,
      showValues: false,
      barWidth: 2,
      orientation: 'vertical',
      chartHeight: 6,
      style: 'bold red',
      labelStyle: 'dim',
      valueStyle: 'italic',
    });
  });

  it('splits and trims bar styles', () => {
    expect(parseArgs(['--bar-styles', 'red, green,,blue']).chart.barStyles).toEqual([
      'red',
      'green',
      'blue',
    ]);
  });

  it('parses flags', () => {
    const args = parseArgs(['-h', '-v', '--debug', '--ink', '--no-color', '-c', 'custom.json']);

    expect(args).toMatchObject({
      help: true,
      version: true,
      debug: true,
      ink: true,
      color: false,
      config: 'custom.json',
    });
  });

  it('lets the last of --color and --no-color win', () => {
    expect(parseArgs(['--no-color', '--color']).color).toBe(true);
  });

  it('accepts a negative maximum', () => {
    expect(parseArgs(['--max', '-3']).chart.maxValue).toBe(-3);
  });

  it('treats - as stdin', () => {
    expect(parseArgs(['-']).file).toBeUndefined();
  });

  it.each([
    [['--width', '0'], '--width expects a positive integer, got \'0\''],
    [['--width', '1.5'], '--width expects a positive integer, got \'1.5\''],
    [['--height'], 'Missing value for --height'],
    [['--max', 'lots'], '--max expects a number, got \'lots\''],
    [['--bogus'], 'Unknown option: --bogus'],
    [['a.json', 'b.json'], 'Unexpected argument: b.json'],
  ])('rejects %j', (argv, message) => {
    expect(() => parseArgs(argv)).toThrow(ValidationError);
    expect(() => parseArgs(argv)).toThrow(message);
  });
});

describe('helpText', () => {
  it('lists usage and options', () => {
    const text = helpText();
    expect(text).toContain('USAGE:');
    expect(text).toContain('--bar-styles A,B,...');
  });
});

// =============================================================================
// run
// =============================================================================

interface FakeIO extends CliIO {
  out: string[];
  err: string[];
}

function fakeIO(cwd: string, stdin?: string): FakeIO {
  const out: string[] = [];
  const err: string[] = [];
  return {
    out,
    err,
    write: text => {
      out.push(text);
    },
    writeError: text => {
      err.push(text);
    },
    readStdin: async () => stdin ?? '',
    isStdinTTY: stdin === undefined,
    columns: 80,
    cwd,
  };
}

describe('run', () => {
  let cwd: string;

  beforeEach(async () => {
    cwd = await mkdtemp(join(tmpdir(), 'termbars-cli-'));
    vi.mocked(getConfigPath).mockReturnValue(join(cwd, 'user', 'config.json'));
    await writeFile(join(cwd, 'data.json'), JSON.stringify({ a: 1, bb: 2, ccc: 4 }));
  });

  afterEach(async () => {
    await rm(cwd, { recursive: true, force: true });
    vi.restoreAllMocks();
    configureLogger({});
  });

  it('prints a horizontal chart from a file', async () => {
    const io = fakeIO(cwd);

    const code = await run(['data.json', '--width', '30', '--no-color'], io);

    expect(code).toBe(0);
    expect(io.err).toEqual([]);
    expect(io.out.join('')).toBe(
      `   a ${FULL.repeat(3)} 1\n` +
      `  bb ${FULL.repeat(6)} 2\n` +
      ` ccc ${FULL.repeat(13)} 4\n`
    );
  });

  it('prints a vertical chart from stdin', async () => {
    const io = fakeIO(cwd, '[1, 2, 3]');

    const code = await run(['--vertical', '--height', '3', '--no-color'], io);

    expect(code).toBe(0);
    expect(io.out.join('')).toBe('    █\n  █ █\n█ █ █\n0 1 2\n');
  });

  it('applies project config defaults', async () => {
    await mkdir(join(cwd, '.termbars'));
    await writeFile(
      join(cwd, '.termbars', 'config.json'),
      JSON.stringify({ chart: { showValues: false }, color: false })
    );
    const io = fakeIO(cwd);

    await run(['data.json', '--width', '30'], io);

    expect(io.out.join('')).toBe(
      `   a ${FULL.repeat(6)}\n` +
      `  bb ${FULL.repeat(12)}\n` +
      ` ccc ${FULL.repeat(25)}\n`
    );
  });

  it('lets flags override config defaults', async () => {
    await mkdir(join(cwd, '.termbars'));
    await writeFile(join(cwd, '.termbars', 'config.json'), JSON.stringify({ chart: { showValues: false } }));
    const io = fakeIO(cwd);

    await run(['data.json', '--width', '30', '--values', '--no-color'], io);

    expect(io.out.join('')).toBe(
      `   a ${FULL.repeat(3)} 1\n` +
      `  bb ${FULL.repeat(6)} 2\n` +
      ` ccc ${FULL.repeat(13)} 4\n`
    );
  });

  it('warns about invalid config and renders with defaults', async () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    await mkdir(join(cwd, '.termbars'));
    await writeFile(join(cwd, '.termbars', 'config.json'), JSON.stringify({ chart: { barWidth: 0 } }));
    const io = fakeIO(cwd, '[2]');

    const code = await run(['--width', '20', '--no-values', '--no-color'], io);

    expect(code).toBe(0);
    expect(io.out.join('')).toBe(` 0 ${FULL.repeat(17)}\n`);
    expect(errorSpy).toHaveBeenCalledWith(expect.stringContaining('config validation: chart.barWidth'));
  });

  it('reads an explicit config file', async () => {
    await writeFile(join(cwd, 'custom.json'), JSON.stringify({ chart: { orientation: 'vertical', chartHeight: 2 } }));
    const io = fakeIO(cwd, '[1, 2]');

    await run(['--config', 'custom.json', '--no-color'], io);

    expect(io.out.join('')).toBe('  █\n█ █\n0 1\n');
  });

  it('fails on a missing explicit config file', async () => {
    const io = fakeIO(cwd, '[1]');

    const code = await run(['--config', 'nope.json'], io);

    expect(code).toBe(1);
    expect(io.err).toEqual([`ConfigError: Config file not found: ${join(cwd, 'nope.json')}\n`]);
  });

  it('prints help', async () => {
    const io = fakeIO(cwd);

    expect(await run(['--help'], io)).toBe(0);
    expect(io.out.join('')).toContain('USAGE:');
  });

  it('prints the version', async () => {
    const io = fakeIO(cwd);

    expect(await run(['--version'], io)).toBe(0);
    expect(io.out).toEqual([`${VERSION}\n`]);
  });

  it('reports invalid JSON', async () => {
    const io = fakeIO(cwd, '{');

    expect(await run([], io)).toBe(1);
    expect(io.err).toHaveLength(1);
    expect(io.err[0].startsWith('InputError: Invalid JSON in stdin: ')).toBe(true);
  });

  it('reports empty data', async () => {
    const io = fakeIO(cwd, '[]');

    expect(await run([], io)).toBe(1);
    expect(io.err).toEqual(['ValidationError: Data cannot be empty\n']);
  });

  it('reports unsupported data shapes', async () => {
    const io = fakeIO(cwd, '"hello"');

    expect(await run([], io)).toBe(1);
    expect(io.err[0].startsWith('ValidationError: Unsupported data shape')).toBe(true);
  });

  it('reports a missing file', async () => {
    const io = fakeIO(cwd);

    expect(await run(['missing.json'], io)).toBe(1);
    expect(io.err[0].startsWith('InputError: Cannot read missing.json: ')).toBe(true);
  });

  it('refuses to wait on an interactive stdin', async () => {
    const io = fakeIO(cwd);

    expect(await run([], io)).toBe(1);
    expect(io.err).toEqual(['InputError: No input: pass a file or pipe JSON on stdin\n']);
  });

  it('reports bad arguments', async () => {
    const io = fakeIO(cwd);

    expect(await run(['--bogus'], io)).toBe(1);
    expect(io.err).toEqual(['ValidationError: Unknown option: --bogus\n']);
    expect(io.out).toEqual([]);
  });
});
