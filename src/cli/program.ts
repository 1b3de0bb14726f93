/**
 * Shared commander setup for the CLIs
 *
 * Each CLI builds its program through {@link createProgram} and parses it
 * with {@link parseProgram}, so `--help`, `--version` and parse errors turn
 * into exit codes instead of calling `process.exit`.
 */

import { Command, CommanderError, type OptionValues } from 'commander';

export const VERSION = '0.1.0';

/**
 * Where a CLI writes. Each call is one line without its newline.
 */
export interface CliIo {
  out: (line: string) => void;
  err: (line: string) => void;
}

export const processIo: CliIo = {
  out: (line) => {
    process.stdout.write(`${line}\n`);
  },
  err: (line) => {
    process.stderr.write(`${line}\n`);
  },
};

export function createProgram(name: string, description: string, io: CliIo): Command {
  return new Command()
    .name(name)
    .description(description)
    .version(VERSION)
    .exitOverride()
    .configureOutput({
      writeOut: (text) => io.out(text.trimEnd()),
      writeErr: (text) => io.err(text.trimEnd()),
    });
}

/**
 * Number option parser. Anything `Number()` cannot read becomes NaN and
 * is rejected by the schema the options go through next.
 */
export function parseNumber(value: string): number {
  return Number(value);
}

export type ParseOutcome<T> = { ok: true; options: T } | { ok: false; exitCode: number };

/**
 * Parse `argv` (user arguments only, no node/script prefix).
 *
 * Help and version output end with their own exit code (0); every other
 * commander error is a usage error (2).
 */
export function parseProgram<T extends OptionValues>(program: Command, argv: readonly string[]): ParseOutcome<T> {
  try {
    program.parse([...argv], { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      return { ok: false, exitCode: error.exitCode === 0 ? 0 : 2 };
    }
    throw error;
  }
  return { ok: true, options: program.opts<T>() };
}
