import type { MatchStats, ParseStats, RunStats } from '../types/index.js';

export function emptyParseStats(): ParseStats {
    return {
        markersAccepted: 0,
        recordsParsed: 0,
        noiseDiscarded: 0,
        malformedRecords: 0,
        truncatedFields: 0,
        rejectedMarkers: 0,
        replacementCharacters: 0,
        warnings: [],
    };
}

export function emptyMatchStats(): MatchStats {
    return {
        total: 0,
        exact: 0,
        fuzzy: 0,
        none: 0,
        existing: 0,
        duplicateTitleKeys: 0,
        duplicateTitleRecords: 0,
        warnings: [],
    };
}

export function mergeParseStats(a: ParseStats, b: ParseStats): ParseStats {
    return {
        markersAccepted: a.markersAccepted + b.markersAccepted,
        recordsParsed: a.recordsParsed + b.recordsParsed,
        noiseDiscarded: a.noiseDiscarded + b.noiseDiscarded,
        malformedRecords: a.malformedRecords + b.malformedRecords,
        truncatedFields: a.truncatedFields + b.truncatedFields,
        rejectedMarkers: a.rejectedMarkers + b.rejectedMarkers,
        replacementCharacters: a.replacementCharacters + b.replacementCharacters,
        warnings: [...a.warnings, ...b.warnings],
    };
}

/**
 * Combine the statistics of two match batches. Duplicate-title counts describe
 * the corpus index rather than the rows, so they are taken from whichever side
 * saw the larger index instead of being summed.
 */
export function mergeMatchStats(a: MatchStats, b: MatchStats): MatchStats {
    const index = b.duplicateTitleRecords > a.duplicateTitleRecords ? b : a;
    return {
        total: a.total + b.total,
        exact: a.exact + b.exact,
        fuzzy: a.fuzzy + b.fuzzy,
        none: a.none + b.none,
        existing: a.existing + b.existing,
        duplicateTitleKeys: index.duplicateTitleKeys,
        duplicateTitleRecords: index.duplicateTitleRecords,
        warnings: index.warnings,
    };
}

export function mergeStats(a: RunStats, b: RunStats): RunStats {
    return {
        parse: mergeParseStats(a.parse, b.parse),
        match: mergeMatchStats(a.match, b.match),
    };
}

/**
 * Flat score-card of a run, as logged and stored.
 */
export interface ScoreCard {
    rows: number;
    exact: number;
    fuzzy: number;
    none: number;
    existing: number;
    abstractsAdded: number;
    abstractCoverage: number;
    corpusRecords: number;
    duplicates: number;
    truncations: number;
    malformed: number;
    rejectedMarkers: number;
}

export function toScoreCard(stats: RunStats): ScoreCard {
    const { parse, match } = stats;
    const abstractsAdded = match.exact + match.fuzzy;
    return {
        rows: match.total,
        exact: match.exact,
        fuzzy: match.fuzzy,
        none: match.none,
        existing: match.existing,
        abstractsAdded,
        abstractCoverage: match.total === 0 ? 0 : (match.existing + abstractsAdded) / match.total,
        corpusRecords: parse.recordsParsed,
        duplicates: match.duplicateTitleRecords,
        truncations: parse.truncatedFields,
        malformed: parse.malformedRecords,
        rejectedMarkers: parse.rejectedMarkers,
    };
}

/**
 * Human-readable score-card lines for the terminal.
 */
export function formatScoreCard(card: ScoreCard): string[] {
    return [
        `  Rows:            ${card.rows}`,
        `  Existing:        ${card.existing}`,
        `  Exact:           ${card.exact}`,
        `  Fuzzy:           ${card.fuzzy}`,
        `  None:            ${card.none}`,
        `  Abstracts added: ${card.abstractsAdded}`,
        `  Coverage:        ${(card.abstractCoverage * 100).toFixed(1)}%`,
        `  Corpus records:  ${card.corpusRecords}`,
        `  Duplicates:      ${card.duplicates}`,
        `  Truncations:     ${card.truncations}`,
        `  Malformed:       ${card.malformed}`,
        `  Rejected marks:  ${card.rejectedMarkers}`,
    ];
}
