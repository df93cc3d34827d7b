import { mkdirSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import type { AssembledResults, AssembledRow, FailedRow } from '../matching/result-assembler.js';
import type { ParsedCorpus } from '../parser/corpus-parser.js';
import { getLogger } from '../utils/logger.js';
import { toCsv } from './csv.js';
import type { MetadataTable } from './readers.js';

export const MATCH_COLUMNS = ['matched_title', 'match_type', 'match_similarity', 'match_status'] as const;
export const FAILURE_COLUMNS = ['failure_reason', 'closest_candidate_title', 'closest_similarity'] as const;

export interface OutputPaths {
    complete: string;
    failed: string;
}

function formatSimilarity(value: number): string {
    return value.toFixed(4);
}

/**
 * `YYYYMMDD_HHMMSS` in local time, used to keep successive runs apart.
 */
export function timestampSuffix(date: Date): string {
    const pad = (n: number) => String(n).padStart(2, '0');
    return `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
        `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
}

/**
 * Source columns with the resolved abstract (and DOI, if the row had none).
 */
function baseColumns(table: MetadataTable, row: AssembledRow): Record<string, string> {
    const values: Record<string, string> = { ...row.fields };
    values[table.columns.abstract ?? 'Abstract'] = row.abstract;
    if (table.columns.doi) {
        values[table.columns.doi] = row.doi ?? '';
    }
    return values;
}

function baseHeaders(table: MetadataTable): string[] {
    return table.columns.abstract ? [...table.headers] : [...table.headers, 'Abstract'];
}

/**
 * Complete dataset: every row, source columns first, then match columns.
 */
export function completeCsv(table: MetadataTable, rows: readonly AssembledRow[]): string {
    const headers = [...baseHeaders(table), ...MATCH_COLUMNS];
    return toCsv(headers, rows.map((row) => ({
        ...baseColumns(table, row),
        matched_title: row.matched_title,
        match_type: row.match_type,
        match_similarity: formatSimilarity(row.match_similarity),
        match_status: row.match_status,
    })));
}

/**
 * Failed subset: unlinked rows with closest-candidate diagnostics.
 */
export function failedCsv(table: MetadataTable, rows: readonly FailedRow[]): string {
    const headers = [...table.headers, ...FAILURE_COLUMNS];
    return toCsv(headers, rows.map((row) => ({
        ...row.fields,
        failure_reason: row.failure_reason,
        closest_candidate_title: row.closest_candidate_title,
        closest_similarity: formatSimilarity(row.closest_similarity),
    })));
}

/**
 * Write the complete and failed CSV files into `outDir`.
 */
export function writeLinkageOutputs(
    outDir: string,
    table: MetadataTable,
    assembled: AssembledResults,
    now: Date = new Date()
): OutputPaths {
    mkdirSync(outDir, { recursive: true });
    const suffix = timestampSuffix(now);
    const paths: OutputPaths = {
        complete: join(outDir, `title_matched_complete_${suffix}.csv`),
        failed: join(outDir, `failed_matches_${suffix}.csv`),
    };

    writeFileSync(paths.complete, completeCsv(table, assembled.complete), 'utf-8');
    writeFileSync(paths.failed, failedCsv(table, assembled.failed), 'utf-8');

    getLogger().info(
        { complete: paths.complete, failed: paths.failed, failedRows: assembled.failed.length },
        'Results written'
    );
    return paths;
}

/**
 * Dump parsed corpus records and parse statistics as JSON.
 */
export function writeParsedCorpus(path: string, parsed: ParsedCorpus): void {
    writeFileSync(path, JSON.stringify(parsed, null, 2), 'utf-8');
    getLogger().info({ path, records: parsed.records.length }, 'Parsed corpus written');
}
