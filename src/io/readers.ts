import { existsSync, readFileSync } from 'node:fs';
import type { MetadataRecord } from '../types/index.js';
import { decodeCorpus } from '../parser/corpus-parser.js';
import { InputError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { parseCsv, type CsvTable } from './csv.js';

/**
 * Column names of the metadata table, as configured.
 */
export interface MetadataColumns {
    title: string;
    abstract: string;
    doi: string;
}

/**
 * Columns as they actually appear in a table's header (null when absent).
 */
export interface ResolvedColumns {
    title: string;
    abstract: string | null;
    doi: string | null;
}

export interface MetadataTable {
    headers: string[];
    columns: ResolvedColumns;
    rows: MetadataRecord[];
}

function findHeader(headers: readonly string[], wanted: string): string | null {
    return headers.find((h) => h === wanted) ?? headers.find((h) => h.toLowerCase() === wanted.toLowerCase()) ?? null;
}

/**
 * Turn a parsed CSV table into metadata records keyed by row position.
 * Header matching is exact first, then case-insensitive.
 */
export function toMetadataTable(table: CsvTable, columns: MetadataColumns, source = '<memory>'): MetadataTable {
    const title = findHeader(table.headers, columns.title);
    if (!title) {
        throw new InputError(`Metadata table has no "${columns.title}" column`, source);
    }
    const abstract = findHeader(table.headers, columns.abstract);
    const doi = findHeader(table.headers, columns.doi);

    const rows = table.records.map((fields, rowId): MetadataRecord => {
        const doiValue = doi ? (fields[doi] ?? '').trim() : '';
        return {
            row_id: rowId,
            title: (fields[title] ?? '').trim(),
            abstract: abstract ? (fields[abstract] ?? '').trim() : '',
            doi: doiValue.length > 0 ? doiValue : null,
            fields: Object.freeze({ ...fields }),
        };
    });

    return { headers: table.headers, columns: { title, abstract, doi }, rows };
}

/**
 * Read the metadata CSV in one go.
 */
export function readMetadataFile(path: string, columns: MetadataColumns): MetadataTable {
    if (!existsSync(path)) {
        throw new InputError('Metadata file not found', path);
    }

    const table = toMetadataTable(parseCsv(readFileSync(path, 'utf-8')), columns, path);
    getLogger().info({ path, rows: table.rows.length }, 'Metadata loaded');
    return table;
}

/**
 * Read the abstract corpus in one go, strictly decoded as UTF-8.
 */
export function readCorpusFile(path: string): string {
    if (!existsSync(path)) {
        throw new InputError('Corpus file not found', path);
    }

    const text = decodeCorpus(readFileSync(path));
    getLogger().info({ path, chars: text.length }, 'Corpus loaded');
    return text;
}
