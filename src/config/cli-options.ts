import { parseArgs } from 'node:util';

import { toErrorMessage } from '../shared/errors';
import { parseStrictIntegerString } from '../shared/runtime-guards';
import { MAZE_TICK_INTERVAL_MS } from './maze-defaults';

export interface CliOptions {
  readonly width?: number;
  readonly height?: number;
  readonly generatorName?: string;
  readonly solverName?: string;
  readonly seed?: number;
  readonly intervalMs: number;
  readonly listAlgorithms: boolean;
}

export class CliOptionsError extends Error {
  readonly code: string;
  readonly context: Readonly<Record<string, unknown>>;

  constructor(code: string, message: string, context: Readonly<Record<string, unknown>> = {}) {
    super(`[cli] ${message}`);
    this.name = 'CliOptionsError';
    this.code = code;
    this.context = context;
  }
}

function parseIntegerOption(name: string, value: string | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }

  const parsed = parseStrictIntegerString(value);
  if (parsed === null) {
    throw new CliOptionsError(
      'cli.invalid-integer',
      `Option --${name} expects a non-negative integer, got "${value}".`,
      { option: name, value },
    );
  }

  return parsed;
}

function readRawOptions(argv: readonly string[]) {
  try {
    return parseArgs({
      args: [...argv],
      options: {
        width: { type: 'string' },
        height: { type: 'string' },
        generator: { type: 'string' },
        solver: { type: 'string' },
        seed: { type: 'string' },
        interval: { type: 'string' },
        list: { type: 'boolean' },
      },
      strict: true,
      allowPositionals: false,
    }).values;
  } catch (error: unknown) {
    throw new CliOptionsError('cli.invalid-arguments', toErrorMessage(error), { argv });
  }
}

/** Reads `--width`, `--height`, `--generator`, `--solver`, `--seed`, `--interval` and `--list`. */
export function parseCliOptions(argv: readonly string[]): CliOptions {
  const values = readRawOptions(argv);

  return {
    width: parseIntegerOption('width', values.width),
    height: parseIntegerOption('height', values.height),
    generatorName: values.generator,
    solverName: values.solver,
    seed: parseIntegerOption('seed', values.seed),
    intervalMs: parseIntegerOption('interval', values.interval) ?? MAZE_TICK_INTERVAL_MS,
    listAlgorithms: values.list === true,
  };
}
