/** Record fields that are subject to the length limit */
export type RecordField = 'title' | 'author_block' | 'doi' | 'citation' | 'abstract_body';

/** Why a numbered line was not taken as a record boundary */
export type RejectedMarkerReason = 'doi-context' | 'out-of-sequence' | 'sequence-gap';

/**
 * Recoverable anomalies found while parsing the corpus.
 */
export type ParseWarning =
    | {
        kind: 'malformed-record';
        sequence_index: number;
        missing: RecordField[];
        /** Title-only records are dropped, body-only records are kept */
        dropped: boolean;
    }
    | {
        kind: 'truncated-field';
        sequence_index: number;
        field: RecordField;
        original_length: number;
    }
    | {
        kind: 'rejected-marker';
        line: number;
        marker: number;
        reason: RejectedMarkerReason;
    }
    | {
        /** U+FFFD left in the text by an earlier lossy decode */
        kind: 'replacement-character';
        line: number;
        column: number;
    };

/**
 * Recoverable anomalies found while matching.
 */
export interface DuplicateTitleWarning {
    kind: 'duplicate-title';
    key: string;
    /** All occurrences, ascending; the first one wins */
    sequence_indexes: number[];
}

export type MatchWarning = DuplicateTitleWarning;

export interface ParseStats {
    markersAccepted: number;
    recordsParsed: number;
    noiseDiscarded: number;
    malformedRecords: number;
    truncatedFields: number;
    rejectedMarkers: number;
    replacementCharacters: number;
    warnings: ParseWarning[];
}

export interface MatchStats {
    total: number;
    exact: number;
    fuzzy: number;
    none: number;
    existing: number;
    /** Distinct normalized keys shared by more than one corpus record */
    duplicateTitleKeys: number;
    /** Corpus records involved in those collisions */
    duplicateTitleRecords: number;
    warnings: MatchWarning[];
}

/**
 * Score-card returned alongside every completed run.
 */
export interface RunStats {
    parse: ParseStats;
    match: MatchStats;
}
