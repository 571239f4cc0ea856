/**
 * Env directive marker that keeps a flag away from the environment.
 */
export const ENV_SUPPRESS = '-';

/**
 * Separator placed between words of a derived env name and after a prefix.
 */
export const ENV_SEPARATOR = '_';

/**
 * Identifiers taken by the parser's built-in help option.
 */
export const RESERVED_NAMES: readonly string[] = ['h', 'help'];

/**
 * Exit codes used under ErrorHandling.ExitOnError
 */
export const EXIT_USAGE = 2;
export const EXIT_HELP = 0;
