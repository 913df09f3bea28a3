#!/usr/bin/env node
/**
 * Command line entry point.
 *
 * Usage:
 *   gridwalk [--x N] [--y N] [--iterations N] [--seed N]
 *            [--policy rejection|filtered] [--format text|csv|jsonl]
 *            [--board] [--no-timing]
 *
 * Defaults: start (0, 0), `config.defaultIterations`, text output with timing.
 */
import { config } from './config';
import { renderBoard } from './grid/grid.render';
import { GridwalkError, SimulationConfigError } from './grid/grid.errors';
import { parsePolicyName, type PolicyName } from './methods/policy';
import {
  exportTallyCSV,
  exportTallyJSONL,
  formatPercentages,
} from './simulator/simulator.report';
import { simulate } from './simulate';
import { formatDuration } from './utils/timing';

export type OutputFormat = 'text' | 'csv' | 'jsonl';

export interface CliOptions {
  x: number;
  y: number;
  iterations: number;
  seed?: number;
  policy?: PolicyName;
  format: OutputFormat;
  board: boolean;
  timing: boolean;
}

/** Where the CLI writes; swapped for buffers in tests. */
export interface CliIO {
  out: (text: string) => void;
  err: (text: string) => void;
}

const defaultIO: CliIO = {
  out: (text) => process.stdout.write(text),
  err: (text) => process.stderr.write(text),
};

/** Parse a non-negative integer, allowing `_` digit separators (e.g. 100_000_000). */
function parseCount(flag: string, raw: string | undefined): number {
  if (raw === undefined) {
    throw new SimulationConfigError(`${flag} requires a value`);
  }
  const cleaned = raw.replace(/_/g, '');
  if (!/^\d+$/.test(cleaned)) {
    throw new SimulationConfigError(
      `${flag} expects a non-negative integer, got '${raw}'`
    );
  }
  const value = Number(cleaned);
  if (!Number.isSafeInteger(value)) {
    throw new SimulationConfigError(`${flag} is too large: '${raw}'`);
  }
  return value;
}

/**
 * Turn argv (without the node/script prefix) into validated options.
 * Accepts both `--flag value` and `--flag=value`.
 */
export function parseArgs(argv: readonly string[]): CliOptions {
  const options: CliOptions = {
    x: 0,
    y: 0,
    iterations: config.defaultIterations,
    format: 'text',
    board: false,
    timing: true,
  };
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const eq = arg.indexOf('=');
    const flag = eq >= 0 ? arg.slice(0, eq) : arg;
    const inline = eq >= 0 ? arg.slice(eq + 1) : undefined;
    const value = (): string | undefined => inline ?? argv[++i];
    switch (flag) {
      case '--x':
        options.x = parseCount(flag, value());
        break;
      case '--y':
        options.y = parseCount(flag, value());
        break;
      case '--iterations':
      case '-n':
        options.iterations = parseCount(flag, value());
        break;
      case '--seed':
        options.seed = parseCount(flag, value());
        break;
      case '--policy': {
        const raw = value() ?? '';
        const name = parsePolicyName(raw);
        if (!name) {
          throw new SimulationConfigError(
            `--policy expects rejection or filtered, got '${raw}'`
          );
        }
        options.policy = name;
        break;
      }
      case '--format': {
        const raw = value();
        if (raw !== 'text' && raw !== 'csv' && raw !== 'jsonl') {
          throw new SimulationConfigError(
            `--format expects text, csv or jsonl, got '${raw ?? ''}'`
          );
        }
        options.format = raw;
        break;
      }
      case '--board':
        options.board = true;
        break;
      case '--no-timing':
        options.timing = false;
        break;
      default:
        throw new SimulationConfigError(`unknown argument '${arg}'`);
    }
  }
  return options;
}

/**
 * Run the CLI and return the process exit code. Library errors become a one-line
 * message on `err` and exit code 1; anything else propagates.
 */
export function main(argv: readonly string[], io: CliIO = defaultIO): number {
  try {
    const options = parseArgs(argv);
    const result = simulate(options.x, options.y, options.iterations, {
      seed: options.seed,
      policy: options.policy,
    });
    if (options.format === 'csv') {
      io.out(`${exportTallyCSV(result.tally)}\n`);
      return 0;
    }
    if (options.format === 'jsonl') {
      io.out(`${exportTallyJSONL(result.tally)}\n`);
      return 0;
    }
    if (options.board) io.out(`${renderBoard(result.grid)}\n`);
    io.out(`${formatPercentages(result.percentages)}\n`);
    if (options.timing) {
      io.out(`Executed in ${formatDuration(result.elapsedMs)}\n`);
    }
    return 0;
  } catch (err) {
    if (err instanceof GridwalkError) {
      io.err(`error: ${err.message}\n`);
      return 1;
    }
    throw err;
  }
}

if (require.main === module) {
  process.exitCode = main(process.argv.slice(2));
}
