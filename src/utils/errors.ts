/**
 * Base class for every error raised by the linker.
 */
export class LinkageError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'LinkageError';
    }
}

/**
 * The corpus could not be read as text at all. Fatal: aborts the run.
 * Offsets point at the first unreadable character.
 */
export class ParseError extends LinkageError {
    constructor(
        message: string,
        public readonly byteOffset: number,
        public readonly line: number,
        public readonly column: number
    ) {
        super(`${message} (line ${line}, column ${column}, byte ${byteOffset})`);
        this.name = 'ParseError';
    }
}

/**
 * Invalid configuration value.
 */
export class ConfigError extends LinkageError {
    constructor(
        message: string,
        public readonly key: string
    ) {
        super(`${key}: ${message}`);
        this.name = 'ConfigError';
    }
}

/**
 * Missing or unusable input file.
 */
export class InputError extends LinkageError {
    constructor(
        message: string,
        public readonly path: string
    ) {
        super(`${message}: ${path}`);
        this.name = 'InputError';
    }
}
