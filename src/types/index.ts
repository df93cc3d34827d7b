/**
 * Barrel export for all shared types.
 */
export type { RawAbstractRecord, MetadataRecord, NormalizedTitleKey } from './record.js';
export { MatchStatus } from './match.js';
export type { MatchResult, MatchFailure, FailureReason } from './match.js';
export type {
    RecordField,
    RejectedMarkerReason,
    ParseWarning,
    MatchWarning,
    DuplicateTitleWarning,
    ParseStats,
    MatchStats,
    RunStats,
} from './stats.js';
export {
    DEFAULT_CONFIG,
    DEFAULT_MATCH_THRESHOLD,
    DEFAULT_SEQUENCE_WEIGHT,
    DEFAULT_TOKEN_WEIGHT,
    DEFAULT_MIN_TOKEN_LENGTH,
    DEFAULT_MAX_FIELD_LENGTH,
    DEFAULT_MAX_SEQUENCE_GAP,
} from './config.js';
export type {
    LinkerConfig,
    LogLevel,
    MatchingConfig,
    TokenConfig,
    ParserConfig,
    RunRecord,
} from './config.js';
