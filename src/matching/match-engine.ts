import {
    DEFAULT_MATCH_THRESHOLD,
    MatchStatus,
    type DuplicateTitleWarning,
    type MatchFailure,
    type MatchResult,
    type MatchStats,
    type MetadataRecord,
    type NormalizedTitleKey,
    type RawAbstractRecord,
} from '../types/index.js';
import { normalizeTitle } from '../nlp/normalize.js';
import { TitleScorer, type SimilarityWeights } from '../nlp/similarity.js';
import { getLogger } from '../utils/logger.js';

/**
 * Produces a scoring function for one query title. Called once per metadata
 * row so that per-query preparation is not repeated for every candidate.
 */
export type CandidateScorer = (queryTitle: string) => (record: RawAbstractRecord) => number;

export interface MatchEngineOptions {
    /** Minimum score for a fuzzy match (inclusive) */
    threshold?: number;
    weights?: SimilarityWeights;
    stopwords?: ReadonlySet<string>;
    minTokenLength?: number;
    /** Replaces the blended title scorer */
    candidateScorer?: CandidateScorer;
}

export interface MatchOutcome {
    results: MatchResult[];
    stats: MatchStats;
}

const PROGRESS_INTERVAL = 100;

/**
 * Default scorer: profiles every corpus title once, then scores the query
 * profile against them.
 */
function blendedCandidateScorer(scorer: TitleScorer, records: readonly RawAbstractRecord[]): CandidateScorer {
    const profiles = new Map(records.map((record) => [record, scorer.profile(record.title)] as const));

    return (queryTitle) => {
        const query = scorer.profile(queryTitle);
        return (record) => {
            const profile = profiles.get(record) ?? scorer.profile(record.title);
            return scorer.score(query, profile);
        };
    };
}

/**
 * Links metadata rows without an abstract to parsed corpus records.
 *
 * Per row: Existing (abstract already present) → Exact (normalized title
 * lookup) → Fuzzy (best blended score ≥ threshold) → None (closest candidate
 * kept for review). Ties go to the lowest sequence_index.
 */
export class MatchEngine {
    /** Titled records in ascending sequence_index order */
    private readonly candidates: RawAbstractRecord[];
    private readonly exactIndex = new Map<NormalizedTitleKey, RawAbstractRecord>();
    private readonly duplicates: DuplicateTitleWarning[] = [];
    private readonly threshold: number;
    private readonly scoreAgainst: CandidateScorer;

    constructor(records: readonly RawAbstractRecord[], options: MatchEngineOptions = {}) {
        const { threshold = DEFAULT_MATCH_THRESHOLD, candidateScorer, ...scorerOptions } = options;

        this.threshold = threshold;
        this.candidates = records
            .filter((record) => normalizeTitle(record.title).length > 0)
            .sort((a, b) => a.sequence_index - b.sequence_index);
        this.scoreAgainst = candidateScorer ?? blendedCandidateScorer(new TitleScorer(scorerOptions), this.candidates);

        this.buildExactIndex();
    }

    /**
     * Index records by normalized title. The first record by sequence_index
     * owns a key; later ones are reported as duplicates.
     */
    private buildExactIndex(): void {
        const groups = new Map<NormalizedTitleKey, number[]>();

        for (const record of this.candidates) {
            const key = normalizeTitle(record.title);
            const group = groups.get(key);
            if (group) {
                group.push(record.sequence_index);
            } else {
                groups.set(key, [record.sequence_index]);
                this.exactIndex.set(key, record);
            }
        }

        for (const [key, sequenceIndexes] of groups) {
            if (sequenceIndexes.length > 1) {
                this.duplicates.push({ kind: 'duplicate-title', key, sequence_indexes: sequenceIndexes });
            }
        }

        if (this.duplicates.length > 0) {
            getLogger().warn(
                {
                    keys: this.duplicates.length,
                    records: this.duplicates.reduce((sum, d) => sum + d.sequence_indexes.length, 0),
                },
                'Duplicate corpus titles, first occurrence wins'
            );
        }
    }

    get duplicateWarnings(): readonly DuplicateTitleWarning[] {
        return this.duplicates;
    }

    /**
     * Match every row. One result per row, in input order.
     */
    match(rows: readonly MetadataRecord[]): MatchOutcome {
        const logger = getLogger();
        const results: MatchResult[] = [];
        const stats: MatchStats = {
            total: 0,
            exact: 0,
            fuzzy: 0,
            none: 0,
            existing: 0,
            duplicateTitleKeys: this.duplicates.length,
            duplicateTitleRecords: this.duplicates.reduce((sum, d) => sum + d.sequence_indexes.length, 0),
            warnings: [...this.duplicates],
        };

        logger.info({ rows: rows.length, candidates: this.candidates.length, threshold: this.threshold }, 'Matching titles');

        rows.forEach((row, i) => {
            if ((i + 1) % PROGRESS_INTERVAL === 0) {
                logger.debug({ done: i + 1, total: rows.length }, 'Matching progress');
            }

            const result = this.matchRow(row);
            results.push(result);

            stats.total++;
            switch (result.status) {
                case MatchStatus.Exact: stats.exact++; break;
                case MatchStatus.Fuzzy: stats.fuzzy++; break;
                case MatchStatus.None: stats.none++; break;
                case MatchStatus.Existing: stats.existing++; break;
            }
        });

        logger.info(
            { exact: stats.exact, fuzzy: stats.fuzzy, none: stats.none, existing: stats.existing },
            'Matching complete'
        );

        return { results, stats };
    }

    /**
     * Match a single row.
     */
    matchRow(row: MetadataRecord): MatchResult {
        if (row.abstract.trim().length > 0) {
            return Object.freeze({
                row_id: row.row_id,
                status: MatchStatus.Existing,
                matched_title: '',
                matched_sequence_index: null,
                similarity: 0,
                abstract_text: row.abstract,
                matched_doi: null,
                failure: null,
            });
        }

        const key = normalizeTitle(row.title);
        if (key.length === 0) {
            return this.unmatched(row, { reason: 'empty-title', closest_candidate_title: '', closest_similarity: 0, closest_sequence_index: null });
        }

        const exact = this.exactIndex.get(key);
        if (exact) {
            return this.matched(row, MatchStatus.Exact, exact, 1);
        }

        const scoreRecord = this.scoreAgainst(row.title);
        let best: RawAbstractRecord | null = null;
        let bestScore = -1;

        for (const candidate of this.candidates) {
            const score = scoreRecord(candidate);
            if (score > bestScore) {
                best = candidate;
                bestScore = score;
            }
        }

        if (best && bestScore >= this.threshold) {
            return this.matched(row, MatchStatus.Fuzzy, best, bestScore);
        }

        return this.unmatched(row, {
            reason: !best || bestScore <= 0 ? 'no-candidate' : 'below-threshold',
            closest_candidate_title: best?.title ?? '',
            closest_similarity: best ? Math.max(bestScore, 0) : 0,
            closest_sequence_index: best?.sequence_index ?? null,
        });
    }

    private matched(row: MetadataRecord, status: MatchStatus, record: RawAbstractRecord, similarity: number): MatchResult {
        return Object.freeze({
            row_id: row.row_id,
            status,
            matched_title: record.title,
            matched_sequence_index: record.sequence_index,
            similarity,
            abstract_text: record.abstract_body,
            matched_doi: record.doi,
            failure: null,
        });
    }

    private unmatched(row: MetadataRecord, failure: MatchFailure): MatchResult {
        return Object.freeze({
            row_id: row.row_id,
            status: MatchStatus.None,
            matched_title: '',
            matched_sequence_index: null,
            similarity: 0,
            abstract_text: '',
            matched_doi: null,
            failure: Object.freeze(failure),
        });
    }
}
