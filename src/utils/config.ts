import { cosmiconfig } from 'cosmiconfig';
import { DEFAULT_CONFIG, type LinkerConfig, type LogLevel } from '../types/index.js';
import { ConfigError } from './errors.js';
import { getLogger } from './logger.js';

/**
 * Overrides accepted from the CLI or a config file. Nested sections may be partial.
 */
export type LinkerConfigOverrides = Partial<Omit<LinkerConfig, 'matching' | 'tokens' | 'parser'>> & {
    matching?: Partial<LinkerConfig['matching']>;
    tokens?: Partial<LinkerConfig['tokens']>;
    parser?: Partial<LinkerConfig['parser']>;
};

const WEIGHT_TOLERANCE = 1e-9;

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

const LOG_LEVELS: ReadonlySet<string> = new Set(['error', 'warn', 'info', 'debug']);

function readSection(raw: Record<string, unknown>, key: string, source: string): Record<string, unknown> {
    const value = raw[key];
    if (value === undefined) return {};
    if (!isRecord(value)) throw new ConfigError(`must be an object (${source})`, key);
    return value;
}

function readString(raw: Record<string, unknown>, key: string, path: string): string | undefined {
    const value = raw[key];
    if (value === undefined) return undefined;
    if (typeof value !== 'string') throw new ConfigError('must be a string', path);
    return value;
}

function readNumber(raw: Record<string, unknown>, key: string, path: string): number | undefined {
    const value = raw[key];
    if (value === undefined) return undefined;
    if (typeof value !== 'number') throw new ConfigError('must be a number', path);
    return value;
}

function readBoolean(raw: Record<string, unknown>, key: string, path: string): boolean | undefined {
    const value = raw[key];
    if (value === undefined) return undefined;
    if (typeof value !== 'boolean') throw new ConfigError('must be a boolean', path);
    return value;
}

function readStringList(raw: Record<string, unknown>, key: string, path: string): string[] | undefined {
    const value = raw[key];
    if (value === undefined) return undefined;
    if (!Array.isArray(value)) throw new ConfigError('must be an array of strings', path);
    const words: string[] = [];
    for (const item of value) {
        if (typeof item !== 'string') throw new ConfigError('must be an array of strings', path);
        words.push(item);
    }
    return words;
}

function readLogLevel(raw: Record<string, unknown>): LogLevel | undefined {
    const value = readString(raw, 'logLevel', 'logLevel');
    if (value === undefined) return undefined;
    if (!isLogLevel(value)) throw new ConfigError('must be one of error, warn, info, debug', 'logLevel');
    return value;
}

export function isLogLevel(value: string): value is LogLevel {
    return LOG_LEVELS.has(value);
}

/**
 * Type-check the contents of a config file. Unknown keys are ignored.
 */
export function parseConfigOverrides(raw: Record<string, unknown>, source: string): LinkerConfigOverrides {
    const matching = readSection(raw, 'matching', source);
    const tokens = readSection(raw, 'tokens', source);
    const parser = readSection(raw, 'parser', source);

    return {
        corpus: readString(raw, 'corpus', 'corpus'),
        metadata: readString(raw, 'metadata', 'metadata'),
        titleColumn: readString(raw, 'titleColumn', 'titleColumn'),
        abstractColumn: readString(raw, 'abstractColumn', 'abstractColumn'),
        doiColumn: readString(raw, 'doiColumn', 'doiColumn'),
        outDir: readString(raw, 'outDir', 'outDir'),
        db: readString(raw, 'db', 'db'),
        logLevel: readLogLevel(raw),
        jsonLogs: readBoolean(raw, 'jsonLogs', 'jsonLogs'),
        matching: {
            threshold: readNumber(matching, 'threshold', 'matching.threshold'),
            sequenceWeight: readNumber(matching, 'sequenceWeight', 'matching.sequenceWeight'),
            tokenWeight: readNumber(matching, 'tokenWeight', 'matching.tokenWeight'),
        },
        tokens: {
            minTokenLength: readNumber(tokens, 'minTokenLength', 'tokens.minTokenLength'),
            stopwords: readStringList(tokens, 'stopwords', 'tokens.stopwords'),
        },
        parser: {
            maxFieldLength: readNumber(parser, 'maxFieldLength', 'parser.maxFieldLength'),
            maxSequenceGap: readNumber(parser, 'maxSequenceGap', 'parser.maxSequenceGap'),
        },
    };
}

/**
 * Load configuration from abstractlink.config.json using cosmiconfig.
 * Returns null if no config file is found.
 */
async function loadConfigFile(searchFrom?: string): Promise<LinkerConfigOverrides | null> {
    const explorer = cosmiconfig('abstractlink', {
        searchPlaces: ['abstractlink.config.json'],
    });

    const result = await explorer.search(searchFrom);
    if (!result || result.isEmpty) return null;

    const raw: unknown = result.config;
    if (!isRecord(raw)) {
        throw new ConfigError('config file must contain a JSON object', result.filepath);
    }

    getLogger().debug({ path: result.filepath }, 'Loaded config file');
    return parseConfigOverrides(raw, result.filepath);
}

/**
 * Apply overrides over a base configuration. Undefined values keep the base value.
 */
export function mergeConfig(base: LinkerConfig, override: LinkerConfigOverrides | null | undefined): LinkerConfig {
    if (!override) return base;

    return {
        corpus: override.corpus ?? base.corpus,
        metadata: override.metadata ?? base.metadata,
        titleColumn: override.titleColumn ?? base.titleColumn,
        abstractColumn: override.abstractColumn ?? base.abstractColumn,
        doiColumn: override.doiColumn ?? base.doiColumn,
        outDir: override.outDir ?? base.outDir,
        db: override.db ?? base.db,
        logLevel: override.logLevel ?? base.logLevel,
        jsonLogs: override.jsonLogs ?? base.jsonLogs,
        matching: {
            threshold: override.matching?.threshold ?? base.matching.threshold,
            sequenceWeight: override.matching?.sequenceWeight ?? base.matching.sequenceWeight,
            tokenWeight: override.matching?.tokenWeight ?? base.matching.tokenWeight,
        },
        tokens: {
            minTokenLength: override.tokens?.minTokenLength ?? base.tokens.minTokenLength,
            stopwords: override.tokens?.stopwords ?? base.tokens.stopwords,
        },
        parser: {
            maxFieldLength: override.parser?.maxFieldLength ?? base.parser.maxFieldLength,
            maxSequenceGap: override.parser?.maxSequenceGap ?? base.parser.maxSequenceGap,
        },
    };
}

/**
 * Reject configurations the matcher cannot work with.
 */
export function validateConfig(config: LinkerConfig): LinkerConfig {
    const { threshold, sequenceWeight, tokenWeight } = config.matching;

    if (!Number.isFinite(threshold) || threshold < 0 || threshold > 1) {
        throw new ConfigError(`must be between 0 and 1, got ${threshold}`, 'matching.threshold');
    }
    if (!Number.isFinite(sequenceWeight) || sequenceWeight < 0) {
        throw new ConfigError(`must be a non-negative number, got ${sequenceWeight}`, 'matching.sequenceWeight');
    }
    if (!Number.isFinite(tokenWeight) || tokenWeight < 0) {
        throw new ConfigError(`must be a non-negative number, got ${tokenWeight}`, 'matching.tokenWeight');
    }
    if (Math.abs(sequenceWeight + tokenWeight - 1) > WEIGHT_TOLERANCE) {
        throw new ConfigError(`weights must sum to 1.0, got ${sequenceWeight + tokenWeight}`, 'matching');
    }
    if (!Number.isInteger(config.tokens.minTokenLength) || config.tokens.minTokenLength < 1) {
        throw new ConfigError(`must be a positive integer, got ${config.tokens.minTokenLength}`, 'tokens.minTokenLength');
    }
    if (!Number.isInteger(config.parser.maxFieldLength) || config.parser.maxFieldLength < 1) {
        throw new ConfigError(`must be a positive integer, got ${config.parser.maxFieldLength}`, 'parser.maxFieldLength');
    }
    if (!Number.isInteger(config.parser.maxSequenceGap) || config.parser.maxSequenceGap < 1) {
        throw new ConfigError(`must be a positive integer, got ${config.parser.maxSequenceGap}`, 'parser.maxSequenceGap');
    }

    return config;
}

/**
 * Merge configuration from multiple sources.
 * Precedence: CLI flags > config file > defaults
 */
export async function resolveConfig(
    cliFlags: LinkerConfigOverrides,
    searchFrom?: string
): Promise<LinkerConfig> {
    const fileConfig = await loadConfigFile(searchFrom);
    return validateConfig(mergeConfig(mergeConfig(DEFAULT_CONFIG, fileConfig), cliFlags));
}
