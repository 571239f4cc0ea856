import { ENV_SEPARATOR } from './constants.js';

function isUpper(char: string): boolean {
    return char !== char.toLowerCase() && char === char.toUpperCase();
}

/**
 * Convert a flag identifier to its environment variable name.
 * An underscore goes before each capital that follows a non-capital, so a run
 * of capitals stays one word.
 *
 * @example toEnvName('mixedCapsString') => 'MIXED_CAPS_STRING'
 * @example toEnvName('HTTPServer') => 'HTTPSERVER'
 * @example toEnvName('ALREADY_SCREAMING') => 'ALREADY_SCREAMING'
 */
export function toEnvName(identifier: string): string {
    let result = '';
    let previous = '';

    for (const char of identifier) {
        if (previous && isUpper(char) && !isUpper(previous) && previous !== ENV_SEPARATOR) {
            result += ENV_SEPARATOR;
        }
        result += char.toUpperCase();
        previous = char;
    }

    return result;
}

/**
 * Upper-case a prefix and make it end with exactly one separator.
 * @example normalizePrefix('app') => 'APP_'
 */
export function normalizePrefix(prefix: string): string {
    if (!prefix) return '';

    const upper = prefix.toUpperCase();
    return upper.endsWith(ENV_SEPARATOR) ? upper : upper + ENV_SEPARATOR;
}

/**
 * Prepend the normalized prefix unless the name already carries it.
 * @example applyPrefix('PORT', 'app') => 'APP_PORT'
 * @example applyPrefix('APP_PORT', 'app') => 'APP_PORT'
 */
export function applyPrefix(name: string, prefix: string): string {
    const normalized = normalizePrefix(prefix);
    if (!normalized || name.startsWith(normalized)) {
        return name;
    }
    return normalized + name;
}

/**
 * Split on a separator and trim every part.
 * @example splitWith(' a | b ', '|') => ['a', 'b']
 */
export function splitWith(text: string, separator: string): string[] {
    return text.split(separator).map(part => part.trim());
}

export function splitWithComma(text: string): string[] {
    return splitWith(text, ',');
}
