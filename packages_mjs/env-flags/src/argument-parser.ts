/**
 * Command-line parsing on top of commander.
 */
import { Command, CommanderError, InvalidArgumentError, Option } from 'commander';
import type { OutputConfiguration } from 'commander';
import { ArgumentParseError, CoercionError } from './errors.js';
import type { Flag } from './flag.js';
import { getLogger } from './logger.js';

const logger = getLogger();

const FLAG_TOKEN = /^--?([^=]+)(=[\s\S]*)?$/;
const HELP_DISPLAYED = 'commander.helpDisplayed';
const HELP_NAME = 'help';

export interface ArgumentParseResult {
    /** Identifiers given on the command line */
    supplied: Set<string>;
    /** Positional arguments left after the flags */
    args: string[];
}

export class ArgumentParser {
    private readonly flags = new Map<string, Flag>();

    constructor(
        private readonly name: string,
        private readonly output: OutputConfiguration = {}
    ) { }

    declare(flag: Flag): void {
        this.flags.set(flag.name, flag);
    }

    /**
     * Parse argv, writing every supplied value straight into its flag.
     * @throws ArgumentParseError on malformed input or when help was requested
     */
    parse(argv: string[]): ArgumentParseResult {
        const supplied = new Set<string>();
        const command = this.buildCommand(supplied);

        try {
            command.parse(this.normalize(argv), { from: 'user' });
        } catch (error) {
            if (error instanceof CommanderError) {
                throw new ArgumentParseError(
                    error.message.replace(/^error: /, ''),
                    error.code,
                    error.code === HELP_DISPLAYED
                );
            }
            throw error;
        }

        return { supplied, args: [...command.args] };
    }

    helpInformation(): string {
        return this.buildCommand(new Set()).helpInformation();
    }

    /**
     * Rewrite single-dash long flags (`-port 80`, `-port=80`) to commander's
     * `--port` form and give bare boolean flags an inline `=true` so they never
     * take the next token as their value. `-help` becomes `--help`.
     */
    normalize(argv: string[]): string[] {
        const result: string[] = [];
        let terminated = false;
        let expectValue = false;

        for (const arg of argv) {
            if (terminated || expectValue) {
                expectValue = false;
                result.push(arg);
                continue;
            }
            if (arg === '--') {
                terminated = true;
                result.push(arg);
                continue;
            }

            if (arg === `-${HELP_NAME}`) {
                result.push(`--${HELP_NAME}`);
                continue;
            }

            const match = FLAG_TOKEN.exec(arg);
            const flag = match ? this.flags.get(match[1]) : undefined;
            if (!match || !flag) {
                result.push(arg);
                continue;
            }

            const inline = match[2];
            if (inline !== undefined) {
                result.push(`--${flag.name}${inline}`);
            } else if (flag.kind === 'bool') {
                result.push(`--${flag.name}=true`);
            } else {
                result.push(`--${flag.name}`);
                expectValue = true;
            }
        }

        return result;
    }

    private buildCommand(supplied: Set<string>): Command {
        const command = new Command(this.name)
            .exitOverride()
            .allowExcessArguments(true)
            .configureOutput({
                outputError: (message) => logger.debug(message.trim()),
                ...this.output,
            });

        for (const flag of this.flags.values()) {
            command.addOption(this.buildOption(flag, supplied));
        }

        return command;
    }

    private buildOption(flag: Flag, supplied: Set<string>): Option {
        const placeholder = flag.kind === 'bool' ? '[value]' : '<value>';

        return new Option(`--${flag.name} ${placeholder}`, flag.usage)
            .default(flag.defaultValue, flag.formatDefault())
            .argParser((text: string) => {
                try {
                    flag.set(text);
                } catch (error) {
                    if (error instanceof CoercionError) {
                        throw new InvalidArgumentError(error.reason);
                    }
                    throw error;
                }
                supplied.add(flag.name);
                return text;
            });
    }
}
