import { MatchStatus, type FailureReason, type MatchResult, type MetadataRecord } from '../types/index.js';
import { LinkageError } from '../utils/errors.js';

/**
 * Metadata row joined with its match result.
 */
export interface AssembledRow {
    row_id: number;
    /** Source columns, untouched */
    fields: Readonly<Record<string, string>>;
    title: string;
    /** Existing abstract, or the one copied from the matched corpus record */
    abstract: string;
    /** Row DOI, or the matched record's DOI when the row had none */
    doi: string | null;
    matched_title: string;
    match_type: MatchStatus;
    match_similarity: number;
    match_status: string;
}

/**
 * Unlinked row with the diagnostics needed for manual triage.
 */
export interface FailedRow extends AssembledRow {
    failure_reason: FailureReason;
    closest_candidate_title: string;
    closest_similarity: number;
}

export interface AssembledResults {
    /** Every input row, in input order */
    complete: AssembledRow[];
    /** Rows with match_type None only */
    failed: FailedRow[];
}

const FAILURE_DESCRIPTIONS: Record<FailureReason, string> = {
    'empty-title': 'Empty title',
    'no-candidate': 'No candidate scored above 0',
    'below-threshold': 'Best candidate below threshold',
};

/**
 * Display string for the `match_status` column.
 */
export function describeMatch(result: MatchResult): string {
    switch (result.status) {
        case MatchStatus.Exact:
        case MatchStatus.Fuzzy:
            return 'Success';
        case MatchStatus.Existing:
            return 'Had Abstract';
        case MatchStatus.None:
            return `Failed: ${result.failure ? FAILURE_DESCRIPTIONS[result.failure.reason] : 'Unknown'}`;
    }
}

/**
 * Join match results to metadata rows by row_id.
 * No row is dropped; every row must have exactly one result.
 */
export function assembleResults(
    rows: readonly MetadataRecord[],
    results: readonly MatchResult[]
): AssembledResults {
    const byRow = new Map<number, MatchResult>();
    for (const result of results) {
        if (byRow.has(result.row_id)) {
            throw new LinkageError(`Duplicate match result for row ${result.row_id}`);
        }
        byRow.set(result.row_id, result);
    }

    const complete: AssembledRow[] = [];
    const failed: FailedRow[] = [];

    for (const row of rows) {
        const result = byRow.get(row.row_id);
        if (!result) {
            throw new LinkageError(`No match result for row ${row.row_id}`);
        }

        const assembled: AssembledRow = {
            row_id: row.row_id,
            fields: row.fields,
            title: row.title,
            abstract: result.status === MatchStatus.Existing ? row.abstract : result.abstract_text,
            doi: row.doi ?? result.matched_doi,
            matched_title: result.matched_title,
            match_type: result.status,
            match_similarity: result.similarity,
            match_status: describeMatch(result),
        };
        complete.push(assembled);

        if (result.status === MatchStatus.None && result.failure) {
            failed.push({
                ...assembled,
                failure_reason: result.failure.reason,
                closest_candidate_title: result.failure.closest_candidate_title,
                closest_similarity: result.failure.closest_similarity,
            });
        }
    }

    return { complete, failed };
}
