/**
 * Log level options.
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * Fuzzy matching configuration.
 */
export interface MatchingConfig {
    /** Minimum blended score for a fuzzy match to be accepted */
    threshold: number;
    /** Weight of whole-string sequence similarity in the blend */
    sequenceWeight: number;
    /** Weight of significant-token overlap in the blend */
    tokenWeight: number;
}

/**
 * Significant-token extraction configuration.
 */
export interface TokenConfig {
    minTokenLength: number;
    /** Replaces the bundled academic stopword list when set */
    stopwords?: string[];
}

/**
 * Corpus parser configuration.
 */
export interface ParserConfig {
    /** Fields longer than this are truncated and reported */
    maxFieldLength: number;
    /** Largest forward jump between consecutive record numbers taken as a boundary */
    maxSequenceGap: number;
}

/**
 * Full linker configuration merged from CLI flags and the config file.
 */
export interface LinkerConfig {
    // Input
    corpus?: string;
    metadata?: string;
    titleColumn: string;
    abstractColumn: string;
    doiColumn: string;

    // Output
    outDir: string;
    db?: string;

    // Logging
    logLevel: LogLevel;
    jsonLogs: boolean;

    matching: MatchingConfig;
    tokens: TokenConfig;
    parser: ParserConfig;
}

export const DEFAULT_MATCH_THRESHOLD = 0.7;
export const DEFAULT_SEQUENCE_WEIGHT = 0.6;
export const DEFAULT_TOKEN_WEIGHT = 0.4;
export const DEFAULT_MIN_TOKEN_LENGTH = 3;
export const DEFAULT_MAX_FIELD_LENGTH = 10_000;
export const DEFAULT_MAX_SEQUENCE_GAP = 50;

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: LinkerConfig = {
    titleColumn: 'Title',
    abstractColumn: 'Abstract',
    doiColumn: 'DOI',
    outDir: './output',
    logLevel: 'info',
    jsonLogs: false,
    matching: {
        threshold: DEFAULT_MATCH_THRESHOLD,
        sequenceWeight: DEFAULT_SEQUENCE_WEIGHT,
        tokenWeight: DEFAULT_TOKEN_WEIGHT,
    },
    tokens: {
        minTokenLength: DEFAULT_MIN_TOKEN_LENGTH,
    },
    parser: {
        maxFieldLength: DEFAULT_MAX_FIELD_LENGTH,
        maxSequenceGap: DEFAULT_MAX_SEQUENCE_GAP,
    },
};

/**
 * Run metadata stored in the SQLite `runs` table.
 */
export interface RunRecord {
    run_id?: number;
    created_at: string;
    linker_version: string;
    corpus_path: string;
    metadata_path: string;
    config_json: string;
    stats_json: string;
}
