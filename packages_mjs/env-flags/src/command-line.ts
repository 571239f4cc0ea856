/**
 * Process-wide flag set for programs that only need one.
 *
 * Created once when this module is first imported, with ExitOnError, and
 * never reset. Libraries should build their own FlagSet instead.
 */
import path from 'path';
import type { Flag } from './flag.js';
import { FlagSet } from './flag-set.js';
import type { ParseResult } from './flag-set.js';
import { ErrorHandling } from './types.js';

export const commandLine = new FlagSet(
    path.basename(process.argv[1] ?? 'command-line'),
    { errorHandling: ErrorHandling.ExitOnError }
);

/**
 * Register a flag on the process-wide set. Same overloads as `FlagSet.var`.
 */
export const variable: FlagSet['var'] = commandLine.var.bind(commandLine);

export function setPrefix(prefix: string): void {
    commandLine.setPrefix(prefix);
}

export function parse(argv: string[] = process.argv.slice(2)): ParseResult {
    return commandLine.parse(argv);
}

export function reparse(): void {
    commandLine.reparse();
}

export function lookup(identifier: string): Flag | undefined {
    return commandLine.lookup(identifier);
}
