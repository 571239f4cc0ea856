/**
 * FlagSet: typed flag registration and command line > environment > default
 * resolution.
 */
import { z } from 'zod';
import { ArgumentParser } from './argument-parser.js';
import { Cell } from './cell.js';
import type { Storage } from './cell.js';
import { isValidDefault } from './coercion.js';
import { EXIT_HELP, EXIT_USAGE, RESERVED_NAMES } from './constants.js';
import {
    ArgumentParseError,
    CoercionError,
    DuplicateFlagError,
    EnvironmentCoercionError,
    FlagSetSealedError,
    FlagSetStateError,
    InvalidFlagNameError,
    UnsupportedTypeError,
} from './errors.js';
import { Flag } from './flag.js';
import { getLogger } from './logger.js';
import { maskValue } from './sensitive.js';
import { StringList } from './string-list.js';
import { normalizePrefix } from './transforms.js';
import { ErrorHandling, FlagKindSchema, parseFlagSetConfig } from './types.js';
import type { EnvLookup, FlagKind, FlagSetOptions, FlagValueMap, ScalarKind, TypedDefault } from './types.js';

const logger = getLogger();

const FlagNameSchema = z.string()
    .min(1, 'name is empty')
    .regex(/^[^-]/, 'name starts with "-"')
    .regex(/^[^\s=,|<>[\]]+$/, 'name contains whitespace or one of = , | < > [ ]')
    .refine(name => !RESERVED_NAMES.includes(name), 'name is reserved for help');

export type ParseResult =
    | { success: true; args: string[] }
    | { success: false; error: ArgumentParseError };

const readProcessEnv: EnvLookup = (name) => process.env[name];

export class FlagSet {
    private readonly registry = new Map<string, Flag>();
    private readonly parser: ArgumentParser;
    private readonly errorHandling: ErrorHandling;
    private readonly lookupEnv: EnvLookup;
    private _prefix: string;
    private _parsed = false;
    private _args: string[] = [];

    constructor(readonly name: string, options: FlagSetOptions = {}) {
        const config = parseFlagSetConfig({
            errorHandling: options.errorHandling,
            prefix: options.prefix,
        });

        this.errorHandling = config.errorHandling;
        this._prefix = normalizePrefix(config.prefix);
        this.lookupEnv = options.env ?? readProcessEnv;
        this.parser = new ArgumentParser(name, options.output);
    }

    /**
     * Register a flag bound to caller-owned storage. The default is written to
     * storage immediately.
     *
     * The env argument picks the variable: `""` derives it from the identifier,
     * `"-"` never reads the environment, any other text names it.
     *
     * Flags must be registered before the first parse. List flags need
     * StringList storage.
     */
    var(
        storage: StringList,
        identifier: string,
        defaultValue: TypedDefault<'stringList'>,
        usage: string,
        env?: string
    ): Flag<'stringList'>;
    var<K extends ScalarKind>(
        storage: Storage<FlagValueMap[K]>,
        identifier: string,
        defaultValue: TypedDefault<K>,
        usage: string,
        env?: string
    ): Flag<K>;
    var<K extends FlagKind>(
        storage: Storage<FlagValueMap[K]>,
        identifier: string,
        defaultValue: TypedDefault<K>,
        usage: string,
        env: string = ''
    ): Flag<K> {
        const kind = FlagKindSchema.safeParse(defaultValue.kind);
        if (!kind.success || !isValidDefault(kind.data, defaultValue.value)) {
            throw new UnsupportedTypeError(identifier, describeDefault(defaultValue));
        }
        if (kind.data === 'stringList' && !(storage instanceof StringList)) {
            throw new UnsupportedTypeError(identifier, 'stringList without StringList storage');
        }

        const name = FlagNameSchema.safeParse(identifier);
        if (!name.success) {
            throw new InvalidFlagNameError(identifier, name.error.issues[0].message);
        }
        if (this._parsed) {
            throw new FlagSetSealedError(this.name, identifier);
        }
        if (this.registry.has(identifier)) {
            throw new DuplicateFlagError(this.name, identifier);
        }

        const flag = new Flag(identifier, storage, defaultValue, usage, env);
        this.registry.set(identifier, flag);
        this.parser.declare(flag);
        logger.trace(`FLAG REGISTERED: ${identifier} (${flag.kind}, env=${flag.env.type})`);
        return flag;
    }

    bool(identifier: string, value: boolean, usage: string, env?: string): Cell<boolean> {
        return this.cell(identifier, { kind: 'bool', value }, usage, env);
    }

    int(identifier: string, value: number, usage: string, env?: string): Cell<number> {
        return this.cell(identifier, { kind: 'int', value }, usage, env);
    }

    uint(identifier: string, value: number, usage: string, env?: string): Cell<number> {
        return this.cell(identifier, { kind: 'uint', value }, usage, env);
    }

    int64(identifier: string, value: bigint, usage: string, env?: string): Cell<bigint> {
        return this.cell(identifier, { kind: 'int64', value }, usage, env);
    }

    uint64(identifier: string, value: bigint, usage: string, env?: string): Cell<bigint> {
        return this.cell(identifier, { kind: 'uint64', value }, usage, env);
    }

    float(identifier: string, value: number, usage: string, env?: string): Cell<number> {
        return this.cell(identifier, { kind: 'float', value }, usage, env);
    }

    /** Milliseconds; text values use the "1h30m" syntax */
    duration(identifier: string, value: number, usage: string, env?: string): Cell<number> {
        return this.cell(identifier, { kind: 'duration', value }, usage, env);
    }

    string(identifier: string, value: string, usage: string, env?: string): Cell<string> {
        return this.cell(identifier, { kind: 'string', value }, usage, env);
    }

    stringList(identifier: string, value: string, usage: string, env?: string): StringList {
        const list = new StringList(value);
        this.var(list, identifier, { kind: 'stringList', value }, usage, env);
        return list;
    }

    /**
     * Set the environment variable prefix for later resolution passes.
     */
    setPrefix(prefix: string): void {
        this._prefix = normalizePrefix(prefix);
    }

    prefix(): string {
        return this._prefix;
    }

    /**
     * Parse arguments, then fill every flag not given on the command line from
     * the environment.
     */
    parse(argv: string[]): ParseResult {
        for (const flag of this.registry.values()) {
            flag.reset();
        }

        let args: string[];
        try {
            const result = this.parser.parse(argv);
            for (const name of result.supplied) {
                this.registry.get(name)?.markCommandLine();
            }
            args = result.args;
        } catch (error) {
            if (error instanceof ArgumentParseError) {
                return this.failParse(error);
            }
            throw error;
        }

        this._args = args;
        this._parsed = true;
        this.resolveEnvironment();
        return { success: true, args };
    }

    /**
     * Run the environment pass again without touching the command line.
     * Flags set on the command line keep their values.
     */
    reparse(): void {
        if (!this._parsed) {
            throw new FlagSetStateError(`Flag set '${this.name}' must be parsed before it can be re-parsed`);
        }
        this.resolveEnvironment();
    }

    parsed(): boolean {
        return this._parsed;
    }

    args(): string[] {
        return [...this._args];
    }

    lookup(identifier: string): Flag | undefined {
        return this.registry.get(identifier);
    }

    /** All flags in registration order */
    flags(): Flag[] {
        return [...this.registry.values()];
    }

    /** Visit flags that were set on the command line or from the environment */
    visit(fn: (flag: Flag) => void): void {
        this.flags().filter(flag => flag.isSet()).forEach(fn);
    }

    visitAll(fn: (flag: Flag) => void): void {
        this.flags().forEach(fn);
    }

    usage(): string {
        return this.parser.helpInformation();
    }

    private cell<K extends ScalarKind>(
        identifier: string,
        defaultValue: TypedDefault<K>,
        usage: string,
        env?: string
    ): Cell<FlagValueMap[K]> {
        const cell = new Cell(defaultValue.value);
        this.var(cell, identifier, defaultValue, usage, env);
        return cell;
    }

    private resolveEnvironment(): void {
        const prefix = this._prefix;

        for (const flag of this.registry.values()) {
            if (flag.changed) {
                // Explicitly set flag has the highest precedence
                logger.debug(`ENV SKIP: ${flag.name} (set on command line)`);
                continue;
            }

            const envName = flag.resolveEnvName(prefix);
            if (envName === undefined) {
                logger.trace(`ENV SKIP: ${flag.name} (env suppressed)`);
                continue;
            }

            const text = this.lookupEnv(envName);
            if (!text) {
                continue;
            }

            try {
                flag.set(text);
            } catch (error) {
                if (error instanceof CoercionError) {
                    this.failEnvironment(new EnvironmentCoercionError(flag.name, envName, text, error));
                }
                throw error;
            }
            flag.markEnvironment();
            logger.debug(`ENV SET: ${flag.name} = ${maskValue(envName, text)} (from ${envName})`);
        }

        for (const flag of this.registry.values()) {
            flag.materialize();
        }
    }

    private failParse(error: ArgumentParseError): ParseResult {
        switch (this.errorHandling) {
            case ErrorHandling.ContinueOnError:
                return { success: false, error };
            case ErrorHandling.PanicOnError:
                throw error;
            case ErrorHandling.ExitOnError:
                if (error.helpRequested) {
                    return process.exit(EXIT_HELP);
                }
                logger.error(error.message);
                return process.exit(EXIT_USAGE);
        }
    }

    private failEnvironment(error: EnvironmentCoercionError): never {
        if (this.errorHandling === ErrorHandling.ExitOnError) {
            logger.error(error.message);
            return process.exit(EXIT_USAGE);
        }
        throw error;
    }
}

function describeDefault(defaultValue: TypedDefault): string {
    const kind: unknown = defaultValue.kind;
    const value: unknown = defaultValue.value;
    return `${String(kind)} (${typeof value})`;
}
