export class EnvFlagsError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'EnvFlagsError';
    }
}

export class UnsupportedTypeError extends EnvFlagsError {
    constructor(
        public flagName: string,
        public kind: string
    ) {
        super(`Unsupported type '${kind}' for flag '${flagName}'`);
        this.name = 'UnsupportedTypeError';
    }
}

export class InvalidFlagNameError extends EnvFlagsError {
    constructor(
        public flagName: string,
        reason: string
    ) {
        super(`Invalid flag name '${flagName}': ${reason}`);
        this.name = 'InvalidFlagNameError';
    }
}

export class DuplicateFlagError extends EnvFlagsError {
    constructor(
        public setName: string,
        public flagName: string
    ) {
        super(`Flag '${flagName}' is already registered in flag set '${setName}'`);
        this.name = 'DuplicateFlagError';
    }
}

export class FlagSetSealedError extends EnvFlagsError {
    constructor(
        public setName: string,
        public flagName: string
    ) {
        super(`Cannot register flag '${flagName}': flag set '${setName}' has already been parsed`);
        this.name = 'FlagSetSealedError';
    }
}

export class FlagSetStateError extends EnvFlagsError {
    constructor(message: string) {
        super(message);
        this.name = 'FlagSetStateError';
    }
}

/**
 * Raised by the value parsers. Carries only the reason; callers wrap it with
 * the flag or variable that supplied the text.
 */
export class CoercionError extends EnvFlagsError {
    constructor(
        public kind: string,
        public text: string,
        public reason: string
    ) {
        super(`invalid ${kind} value "${text}": ${reason}`);
        this.name = 'CoercionError';
    }
}

export class ArgumentParseError extends EnvFlagsError {
    constructor(
        message: string,
        public code: string,
        public helpRequested: boolean = false
    ) {
        super(message);
        this.name = 'ArgumentParseError';
    }
}

export class EnvironmentCoercionError extends EnvFlagsError {
    constructor(
        public flagName: string,
        public envName: string,
        public text: string,
        public cause: CoercionError
    ) {
        super(`invalid value "${text}" for env ${envName} (flag '${flagName}'): ${cause.reason}`);
        this.name = 'EnvironmentCoercionError';
    }
}
