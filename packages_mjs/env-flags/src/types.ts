/**
 * Data models for flags and flag sets.
 */
import { z } from "zod";
import type { OutputConfiguration } from "commander";

export enum ErrorHandling {
    /** Return the parse error to the caller */
    ContinueOnError = 'continue',
    /** Log the error and terminate the process */
    ExitOnError = 'exit',
    /** Throw the error */
    PanicOnError = 'panic'
}

export const FLAG_KINDS = [
    'bool',
    'int',
    'uint',
    'int64',
    'uint64',
    'float',
    'duration',
    'string',
    'stringList',
] as const;

export const FlagKindSchema = z.enum(FLAG_KINDS);

export type FlagKind = z.infer<typeof FlagKindSchema>;

/**
 * Value type stored for each kind. Durations are milliseconds and string lists
 * keep their raw, unsplit text.
 */
export interface FlagValueMap {
    bool: boolean;
    int: number;
    uint: number;
    int64: bigint;
    uint64: bigint;
    float: number;
    duration: number;
    string: string;
    stringList: string;
}

/** Every kind whose storage is a plain value cell */
export type ScalarKind = Exclude<FlagKind, 'stringList'>;

export type FlagValue<K extends FlagKind = FlagKind> = FlagValueMap[K];

/**
 * A default value tagged with its kind.
 * @example { kind: 'duration', value: 1500 }
 */
export interface TypedDefault<K extends FlagKind = FlagKind> {
    kind: K;
    value: FlagValueMap[K];
}

export type EnvDirective =
    | { type: 'auto' }
    | { type: 'explicit'; name: string }
    | { type: 'suppressed' };

export type ValueSource = 'default' | 'cli' | 'env';

export type EnvLookup = (name: string) => string | undefined;

export const FlagSetConfigSchema = z.object({
    errorHandling: z.nativeEnum(ErrorHandling).default(ErrorHandling.ContinueOnError),
    prefix: z.string().default(''),
});

export type FlagSetConfig = z.infer<typeof FlagSetConfigSchema>;

export type FlagSetOptions = z.input<typeof FlagSetConfigSchema> & {
    /** Environment lookup, reads process.env when omitted */
    env?: EnvLookup;
    /** Where the argument parser writes help and errors */
    output?: OutputConfiguration;
};

export function parseFlagSetConfig(config: unknown): FlagSetConfig {
    return FlagSetConfigSchema.parse(config);
}

export function validateFlagSetConfig(config: unknown): boolean {
    return FlagSetConfigSchema.safeParse(config).success;
}
