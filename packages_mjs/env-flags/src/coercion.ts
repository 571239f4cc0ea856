/**
 * One text parser, default schema and formatter per flag kind.
 */
import { z } from 'zod';
import { CoercionError } from './errors.js';
import { formatDuration, parseDuration } from './duration.js';
import type { FlagKind, FlagValueMap } from './types.js';

type ParserMap = { [K in FlagKind]: (text: string) => FlagValueMap[K] };
type SchemaMap = { [K in FlagKind]: z.ZodType<FlagValueMap[K]> };
type FormatterMap = { [K in FlagKind]: (value: FlagValueMap[K]) => string };

const TRUE_TEXT = ['1', 't', 'T', 'TRUE', 'true', 'True'];
const FALSE_TEXT = ['0', 'f', 'F', 'FALSE', 'false', 'False'];

const SIGNED_DECIMAL = /^[+-]?\d+$/;
const UNSIGNED_DECIMAL = /^\d+$/;
const FLOAT_TEXT = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const INFINITY_TEXT = /^([+-]?)(inf|infinity)$/i;

const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;
const UINT64_MAX = 2n ** 64n - 1n;

function fail(kind: FlagKind, text: string, reason: string): never {
    throw new CoercionError(kind, text, reason);
}

function parseBool(text: string): boolean {
    if (TRUE_TEXT.includes(text)) return true;
    if (FALSE_TEXT.includes(text)) return false;
    return fail('bool', text, 'expected one of 1, t, true, 0, f, false');
}

function parseSafeInteger(kind: 'int' | 'uint', pattern: RegExp, text: string): number {
    if (!pattern.test(text)) {
        return fail(kind, text, 'expected a base-10 integer');
    }
    const value = Number(text);
    if (!Number.isSafeInteger(value)) {
        return fail(kind, text, 'value out of range');
    }
    return value === 0 ? 0 : value;
}

function parseBigInteger(kind: 'int64' | 'uint64', pattern: RegExp, min: bigint, max: bigint, text: string): bigint {
    if (!pattern.test(text)) {
        return fail(kind, text, 'expected a base-10 integer');
    }
    const value = BigInt(text);
    if (value < min || value > max) {
        return fail(kind, text, 'value out of range');
    }
    return value;
}

function parseFloatText(text: string): number {
    const infinity = INFINITY_TEXT.exec(text);
    if (infinity) {
        return infinity[1] === '-' ? -Infinity : Infinity;
    }
    if (text.toLowerCase() === 'nan') {
        return NaN;
    }
    if (!FLOAT_TEXT.test(text)) {
        return fail('float', text, 'expected a decimal or exponential number');
    }
    const value = Number(text);
    if (!Number.isFinite(value)) {
        return fail('float', text, 'value out of range');
    }
    return value;
}

const PARSERS: ParserMap = {
    bool: parseBool,
    int: text => parseSafeInteger('int', SIGNED_DECIMAL, text),
    uint: text => parseSafeInteger('uint', UNSIGNED_DECIMAL, text),
    int64: text => parseBigInteger('int64', SIGNED_DECIMAL, INT64_MIN, INT64_MAX, text),
    uint64: text => parseBigInteger('uint64', UNSIGNED_DECIMAL, 0n, UINT64_MAX, text),
    float: parseFloatText,
    duration: parseDuration,
    string: text => text,
    stringList: text => text,
};

const DEFAULT_SCHEMAS: SchemaMap = {
    bool: z.boolean(),
    int: z.number().int().safe(),
    uint: z.number().int().nonnegative().safe(),
    int64: z.bigint().gte(INT64_MIN).lte(INT64_MAX),
    uint64: z.bigint().gte(0n).lte(UINT64_MAX),
    float: z.number(),
    duration: z.number().finite(),
    string: z.string(),
    stringList: z.string(),
};

const FORMATTERS: FormatterMap = {
    bool: value => String(value),
    int: value => String(value),
    uint: value => String(value),
    int64: value => value.toString(),
    uint64: value => value.toString(),
    float: value => String(value),
    duration: formatDuration,
    string: value => value,
    stringList: value => value,
};

/**
 * Convert text to the value type of `kind`.
 * @throws CoercionError when the text is not valid for the kind
 */
export function coerce<K extends FlagKind>(kind: K, text: string): FlagValueMap[K] {
    const parse: ParserMap[K] = PARSERS[kind];
    return parse(text);
}

/**
 * Check that a default value belongs to `kind`.
 */
export function isValidDefault<K extends FlagKind>(kind: K, value: unknown): value is FlagValueMap[K] {
    const schema: SchemaMap[K] = DEFAULT_SCHEMAS[kind];
    return schema.safeParse(value).success;
}

export function formatValue<K extends FlagKind>(kind: K, value: FlagValueMap[K]): string {
    const format: FormatterMap[K] = FORMATTERS[kind];
    return format(value);
}
