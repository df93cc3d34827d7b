/**
 * Outcome of linking one metadata row.
 *
 *   Existing: the row already had an abstract, nothing was looked up
 *   Exact:    normalized titles are identical
 *   Fuzzy:    best blended score reached the threshold
 *   None:     nothing reached the threshold, closest candidate is recorded
 */
export enum MatchStatus {
    Exact = 'Exact',
    Fuzzy = 'Fuzzy',
    None = 'None',
    Existing = 'Existing',
}

/** Why a row ended as `MatchStatus.None` */
export type FailureReason = 'empty-title' | 'no-candidate' | 'below-threshold';

/**
 * Diagnostics kept for rows that could not be linked, for manual triage.
 */
export interface MatchFailure {
    readonly reason: FailureReason;
    readonly closest_candidate_title: string;
    readonly closest_similarity: number;
    readonly closest_sequence_index: number | null;
}

/**
 * Immutable result of the match engine for one metadata row.
 */
export interface MatchResult {
    readonly row_id: number;
    readonly status: MatchStatus;
    /** Title of the corpus record that supplied the abstract, or '' */
    readonly matched_title: string;
    readonly matched_sequence_index: number | null;
    /** 1.0 for Exact, the blended score for Fuzzy, 0.0 otherwise */
    readonly similarity: number;
    readonly abstract_text: string;
    readonly matched_doi: string | null;
    /** Present only when status is None */
    readonly failure: MatchFailure | null;
}
