// Constants
export {
    ENV_SUPPRESS,
    ENV_SEPARATOR,
    RESERVED_NAMES,
    EXIT_USAGE,
    EXIT_HELP
} from './constants.js';

// Name transformations
export {
    toEnvName,
    normalizePrefix,
    applyPrefix,
    splitWith,
    splitWithComma
} from './transforms.js';

export * from './types.js';
export * from './errors.js';
export { Cell, type Storage } from './cell.js';
export { StringList } from './string-list.js';
export { parseDuration, formatDuration } from './duration.js';
export { coerce, formatValue, isValidDefault } from './coercion.js';
export { Flag, parseEnvDirective, baseEnvName } from './flag.js';
export { ArgumentParser, type ArgumentParseResult } from './argument-parser.js';
export { FlagSet, type ParseResult } from './flag-set.js';
export { getLogger, getLogLevel, setLogLevel, type LogLevel, type EnvFlagsLogger } from './logger.js';
export { maskValue, setLogMask } from './sensitive.js';

// Default instance
export {
    commandLine,
    variable,
    setPrefix,
    parse,
    reparse,
    lookup
} from './command-line.js';
