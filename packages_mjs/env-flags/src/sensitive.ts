/**
 * Masking of environment values before they reach the log.
 */

const SENSITIVE_NAME_PATTERNS = [
    /KEY/i, /SECRET/i, /PASSWORD/i, /TOKEN/i,
    /CREDENTIAL/i, /AUTH/i, /PRIVATE/i
];

const SENSITIVE_VALUE_PREFIXES = [
    'sk-', 'pk-', 'Bearer ', 'Basic ', 'eyJ'
];

let logMask = true;

if (typeof process !== 'undefined' && process.env.ENV_FLAGS_LOG_MASK) {
    logMask = process.env.ENV_FLAGS_LOG_MASK.toLowerCase() !== 'false';
}

export function setLogMask(enabled: boolean): void {
    logMask = enabled;
}

function isSensitiveName(name: string): boolean {
    return SENSITIVE_NAME_PATTERNS.some(p => p.test(name));
}

function isSensitiveValue(value: string): boolean {
    if (!value) return false;
    return SENSITIVE_VALUE_PREFIXES.some(p => value.startsWith(p));
}

/**
 * Returns `[REDACTED]` for values whose variable name or shape looks like a
 * credential, unless masking was turned off with `ENV_FLAGS_LOG_MASK=false`.
 */
export function maskValue(name: string, value: string | undefined): string {
    if (!logMask) {
        return String(value);
    }

    if (!value) return String(value);

    if (isSensitiveName(name) || isSensitiveValue(value)) {
        return '[REDACTED]';
    }

    return value;
}
