/**
 * CLI entry: read data, build the chart, print it.
 */

import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { BarChart } from './chart/bar-chart.js';
import { parseChartData } from './chart/normalize.js';
import type { BarChartOptions } from './chart/types.js';
import { parseArgs, helpText, VERSION, type CLIArgs } from './cli.js';
import { loadConfig, type ValidatedUserConfig } from './config/index.js';
import { formatError, formatErrorForLog, InputError } from './errors/index.js';
import { getDefaultLogPath } from './paths.js';
import { renderToAnsi } from './render/ansi.js';
import { renderWithInk } from './tui/render.js';
import {
  ConsoleSink,
  FileSink,
  configureLogger,
  createComponentLogger,
  type LogSink,
} from './utilities/logger.js';

export interface CliIO {
  write(text: string): void;
  writeError(text: string): void;
  readStdin(): Promise<string>;
  isStdinTTY: boolean;
  /** Terminal size; 80 columns when unknown */
  columns?: number;
  rows?: number;
  cwd: string;
  /** Stream handed to Ink under --ink */
  inkStdout?: NodeJS.WriteStream;
}

const DEFAULT_COLUMNS = 80;

export function processIO(): CliIO {
  return {
    write: text => process.stdout.write(text),
    writeError: text => process.stderr.write(text),
    readStdin: async () => {
      const chunks: Buffer[] = [];
      for await (const chunk of process.stdin) {
        chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
      }
      return Buffer.concat(chunks).toString('utf-8');
    },
    isStdinTTY: Boolean(process.stdin.isTTY),
    columns: process.stdout.columns,
    rows: process.stdout.rows,
    cwd: process.cwd(),
    inkStdout: process.stdout,
  };
}

function setupLogging(args: CLIArgs, config: ValidatedUserConfig): void {
  const sinks: LogSink[] = [new ConsoleSink()];
  const file = config.logging?.file;
  if (file) {
    sinks.push(new FileSink(file === true ? getDefaultLogPath() : file));
  }
  configureLogger({
    level: args.debug ? 'debug' : config.logging?.level ?? 'warn',
    sinks,
  });
}

async function readInput(args: CLIArgs, io: CliIO): Promise<unknown> {
  let source: string;
  let text: string;

  if (args.file !== undefined) {
    source = args.file;
    try {
      text = await readFile(resolve(io.cwd, args.file), 'utf-8');
    } catch (err) {
      throw InputError.unreadable(source, err instanceof Error ? err : new Error(String(err)));
    }
  } else {
    source = 'stdin';
    if (io.isStdinTTY) {
      throw new InputError('No input: pass a file or pipe JSON on stdin', source);
    }
    text = await io.readStdin();
  }

  try {
    return JSON.parse(text);
  } catch (err) {
    throw InputError.invalidJson(source, err instanceof Error ? err : new Error(String(err)));
  }
}

/**
 * Run the CLI and return the exit code.
 */
export async function run(argv: readonly string[], io: CliIO = processIO()): Promise<number> {
  try {
    const args = parseArgs(argv);

    if (args.help) {
      io.write(helpText());
      return 0;
    }
    if (args.version) {
      io.write(`${VERSION}\n`);
      return 0;
    }

    const { config, warnings } = loadConfig({
      cwd: io.cwd,
      configPath: args.config === undefined ? undefined : resolve(io.cwd, args.config),
    });
    setupLogging(args, config);
    const log = createComponentLogger('cli');
    for (const warning of warnings) {
      log.warn(warning);
    }

    const data = parseChartData(await readInput(args, io));
    const options: BarChartOptions = { ...config.chart, ...args.chart };
    const chart = new BarChart(data, options);

    const maxWidth = io.columns ?? DEFAULT_COLUMNS;
    log.debug('Rendering', { maxWidth, rows: io.rows, ink: args.ink });

    if (args.ink && io.inkStdout) {
      await renderWithInk(chart, { stdout: io.inkStdout, width: maxWidth, height: io.rows });
      return 0;
    }

    const color = args.color ?? config.color;
    io.write(
      renderToAnsi(chart, { maxWidth, height: io.rows }, color === false ? { level: 0 } : {})
    );
    return 0;
  } catch (err) {
    io.writeError(`${formatError(err)}\n`);
    createComponentLogger('cli').debug(formatErrorForLog(err));
    return 1;
  }
}
