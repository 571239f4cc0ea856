/**
 * Duration text <-> milliseconds.
 *
 * Accepted syntax is a possibly signed sequence of decimal numbers, each with a
 * unit suffix, such as "300ms", "-1.5h" or "2h45m". Valid units are "ns",
 * "us" (or "µs"), "ms", "s", "m" and "h". A bare "0" is also accepted.
 */
import { CoercionError } from './errors.js';

const UNIT_MILLIS: Record<string, number> = {
    ns: 1e-6,
    us: 1e-3,
    'µs': 1e-3, // U+00B5 micro sign
    'μs': 1e-3, // U+03BC greek mu
    ms: 1,
    s: 1000,
    m: 60 * 1000,
    h: 60 * 60 * 1000,
};

const SEGMENT = /^(\d*)(?:\.(\d*))?([^\d.]+)/;

const MILLIS_PER_SECOND = 1000;
const MILLIS_PER_MINUTE = 60 * MILLIS_PER_SECOND;
const MILLIS_PER_HOUR = 60 * MILLIS_PER_MINUTE;

function fail(text: string, reason: string): never {
    throw new CoercionError('duration', text, reason);
}

/**
 * Parse duration text into milliseconds.
 * @throws CoercionError
 */
export function parseDuration(text: string): number {
    let rest = text;
    let negative = false;

    if (rest.startsWith('-') || rest.startsWith('+')) {
        negative = rest[0] === '-';
        rest = rest.slice(1);
    }

    if (rest === '0') {
        return 0;
    }
    if (rest === '') {
        return fail(text, 'empty duration');
    }

    let total = 0;
    while (rest !== '') {
        const match = SEGMENT.exec(rest);
        if (!match) {
            return fail(text, 'expected a number followed by a unit');
        }

        const [segment, whole, fraction, unit] = match;
        if (!whole && !fraction) {
            return fail(text, 'expected a number before the unit');
        }

        const factor = UNIT_MILLIS[unit];
        if (factor === undefined) {
            return fail(text, `unknown unit "${unit}"`);
        }

        total += Number(`${whole || '0'}.${fraction || '0'}`) * factor;
        rest = rest.slice(segment.length);
    }

    if (!Number.isFinite(total)) {
        return fail(text, 'value out of range');
    }

    return negative ? -total : total;
}

function trimNumber(value: number): string {
    return String(Number(value.toFixed(9)));
}

/**
 * Render milliseconds the way parseDuration reads them back.
 * @example formatDuration(5_400_000) => '1h30m0s'
 */
export function formatDuration(millis: number): string {
    if (millis === 0) return '0s';

    const sign = millis < 0 ? '-' : '';
    const abs = Math.abs(millis);

    if (abs < MILLIS_PER_SECOND) {
        if (abs >= 1) return `${sign}${trimNumber(abs)}ms`;
        if (abs >= 1e-3) return `${sign}${trimNumber(abs * 1e3)}µs`;
        return `${sign}${trimNumber(abs * 1e6)}ns`;
    }

    const hours = Math.floor(abs / MILLIS_PER_HOUR);
    const minutes = Math.floor((abs % MILLIS_PER_HOUR) / MILLIS_PER_MINUTE);
    const seconds = trimNumber((abs % MILLIS_PER_MINUTE) / MILLIS_PER_SECOND);

    if (hours > 0) return `${sign}${hours}h${minutes}m${seconds}s`;
    if (minutes > 0) return `${sign}${minutes}m${seconds}s`;
    return `${sign}${seconds}s`;
}
