import type { Storage } from './cell.js';
import { coerce, formatValue } from './coercion.js';
import { ENV_SUPPRESS } from './constants.js';
import { StringList } from './string-list.js';
import { applyPrefix, toEnvName } from './transforms.js';
import type { EnvDirective, FlagKind, FlagValueMap, TypedDefault, ValueSource } from './types.js';

/**
 * Read the env argument given at registration.
 * - `""` derives the name from the identifier
 * - `"-"` never reads the environment
 * - anything else is used as the name, upper-cased
 */
export function parseEnvDirective(env: string): EnvDirective {
    if (env === '') {
        return { type: 'auto' };
    }
    if (env === ENV_SUPPRESS) {
        return { type: 'suppressed' };
    }
    return { type: 'explicit', name: env.toUpperCase() };
}

/**
 * The env name before the prefix is applied, undefined when suppressed.
 */
export function baseEnvName(directive: EnvDirective, identifier: string): string | undefined {
    switch (directive.type) {
        case 'auto':
            return toEnvName(identifier);
        case 'explicit':
            return directive.name;
        case 'suppressed':
            return undefined;
    }
}

export class Flag<K extends FlagKind = FlagKind> {
    readonly kind: K;
    readonly defaultValue: FlagValueMap[K];
    readonly env: EnvDirective;

    private _resolvedEnvName: string | undefined;
    private _changed = false;
    private _source: ValueSource = 'default';

    constructor(
        readonly name: string,
        private readonly storage: Storage<FlagValueMap[K]>,
        defaultValue: TypedDefault<K>,
        readonly usage: string,
        env: string = ''
    ) {
        this.kind = defaultValue.kind;
        this.defaultValue = defaultValue.value;
        this.env = parseEnvDirective(env);
        storage.set(defaultValue.value);
    }

    get value(): FlagValueMap[K] {
        return this.storage.get();
    }

    /** Set on the command line during the last parse */
    get changed(): boolean {
        return this._changed;
    }

    get source(): ValueSource {
        return this._source;
    }

    /** The variable consulted by the last resolution pass */
    get resolvedEnvName(): string | undefined {
        return this._resolvedEnvName;
    }

    get suppressed(): boolean {
        return this.env.type === 'suppressed';
    }

    isSet(): boolean {
        return this._source !== 'default';
    }

    /**
     * Coerce text and write it to storage.
     * @throws CoercionError
     */
    set(text: string): FlagValueMap[K] {
        const value = coerce(this.kind, text);
        this.storage.set(value);
        return value;
    }

    /**
     * Compute the env name for a pass under the given prefix.
     */
    resolveEnvName(prefix: string): string | undefined {
        const base = baseEnvName(this.env, this.name);
        this._resolvedEnvName = base === undefined ? undefined : applyPrefix(base, prefix);
        return this._resolvedEnvName;
    }

    markCommandLine(): void {
        this._changed = true;
        this._source = 'cli';
    }

    markEnvironment(): void {
        this._source = 'env';
    }

    /**
     * Put the default back before a fresh parse.
     */
    reset(): void {
        this._changed = false;
        this._source = 'default';
        this.storage.set(this.defaultValue);
        if (this.storage instanceof StringList) {
            this.storage.clear();
        }
    }

    /**
     * Refresh the split view of list storage.
     */
    materialize(): void {
        if (this.storage instanceof StringList) {
            this.storage.setValue();
        }
    }

    formatDefault(): string {
        return formatValue(this.kind, this.defaultValue);
    }

    toString(): string {
        return formatValue(this.kind, this.value);
    }
}
