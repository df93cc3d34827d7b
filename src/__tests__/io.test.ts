import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { parseCsv, parseCsvRows, escapeCsvValue, toCsv } from '../io/csv.js';
import { toMetadataTable, readMetadataFile, readCorpusFile } from '../io/readers.js';
import { completeCsv, timestampSuffix, writeParsedCorpus } from '../io/writers.js';
import { assembleResults } from '../matching/result-assembler.js';
import { MatchEngine } from '../matching/match-engine.js';
import { parseCorpus } from '../parser/corpus-parser.js';
import { InputError, ParseError } from '../utils/errors.js';

const COLUMNS = { title: 'Title', abstract: 'Abstract', doi: 'DOI' };

describe('CSV', () => {
    it('should parse quoted fields, doubled quotes and embedded newlines', () => {
        const rows = parseCsvRows('a,b\r\n"x, y","say ""hi"""\n"multi\nline",z\n');
        expect(rows).toEqual([
            ['a', 'b'],
            ['x, y', 'say "hi"'],
            ['multi\nline', 'z'],
        ]);
    });

    it('should drop empty lines', () => {
        expect(parseCsvRows('a\n\nb\n')).toEqual([['a'], ['b']]);
    });

    it('should key records by header and strip a BOM', () => {
        const table = parseCsv('\uFEFFTitle,Year\nFirst,2020\nSecond\n');
        expect(table.headers).toEqual(['Title', 'Year']);
        expect(table.records).toEqual([
            { Title: 'First', Year: '2020' },
            { Title: 'Second', Year: '' },
        ]);
    });

    it('should return an empty table for empty input', () => {
        expect(parseCsv('')).toEqual({ headers: [], records: [] });
    });

    it('should quote every value and flatten line breaks', () => {
        expect(escapeCsvValue('line1\nline2')).toBe('"line1 line2"');
        expect(escapeCsvValue('say "hi"')).toBe('"say ""hi"""');
        expect(escapeCsvValue(null)).toBe('""');
        expect(escapeCsvValue(3)).toBe('"3"');
    });

    it('should write a BOM and CRLF line endings', () => {
        expect(toCsv(['a', 'b'], [{ a: 'x', b: 'y' }])).toBe('\uFEFF"a","b"\r\n"x","y"\r\n');
    });

    it('should read back what it writes', () => {
        const rows = [{ Title: 'A, B', Note: 'He said "ok"' }];
        expect(parseCsv(toCsv(['Title', 'Note'], rows))).toEqual({ headers: ['Title', 'Note'], records: rows });
    });
});

describe('Metadata table', () => {
    it('should resolve configured columns case-insensitively', () => {
        const table = toMetadataTable(parseCsv('title,ABSTRACT,Year\nA paper,,2020\n'), COLUMNS);

        expect(table.columns).toEqual({ title: 'title', abstract: 'ABSTRACT', doi: null });
        expect(table.rows).toEqual([
            { row_id: 0, title: 'A paper', abstract: '', doi: null, fields: { title: 'A paper', ABSTRACT: '', Year: '2020' } },
        ]);
    });

    it('should trim cells and keep a present DOI', () => {
        const table = toMetadataTable(parseCsv('Title,DOI\n  Padded title  , 10.1000/x \n'), COLUMNS);
        expect(table.rows[0]?.title).toBe('Padded title');
        expect(table.rows[0]?.doi).toBe('10.1000/x');
    });

    it('should require a title column', () => {
        expect(() => toMetadataTable(parseCsv('Name\nx\n'), COLUMNS)).toThrow('Metadata table has no "Title" column: <memory>');
    });
});

describe('Writers', () => {
    it('should format timestamps as YYYYMMDD_HHMMSS', () => {
        expect(timestampSuffix(new Date(2024, 0, 5, 9, 3, 7))).toBe('20240105_090307');
    });

    it('should append an Abstract column when the table has none', () => {
        const table = toMetadataTable(parseCsv('Title,Year\nA title,2020\n'), COLUMNS);
        const { results } = new MatchEngine([
            { sequence_index: 1, title: 'A Title', author_block: null, doi: null, citation: null, abstract_body: 'Body.' },
        ]).match(table.rows);
        const { complete } = assembleResults(table.rows, results);

        expect(completeCsv(table, complete)).toBe(
            '\uFEFF"Title","Year","Abstract","matched_title","match_type","match_similarity","match_status"\r\n' +
            '"A title","2020","Body.","A Title","Exact","1.0000","Success"\r\n'
        );
    });
});

describe('File readers', () => {
    let tmpDir: string;

    beforeEach(() => {
        tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'abstractlink-io-'));
    });

    afterEach(() => {
        fs.rmSync(tmpDir, { recursive: true, force: true });
    });

    it('should reject missing files', () => {
        expect(() => readMetadataFile(path.join(tmpDir, 'missing.csv'), COLUMNS)).toThrow(InputError);
        expect(() => readCorpusFile(path.join(tmpDir, 'missing.txt'))).toThrow(InputError);
    });

    it('should reject a corpus that is not UTF-8', () => {
        const corpusPath = path.join(tmpDir, 'corpus.txt');
        fs.writeFileSync(corpusPath, Buffer.from([0x31, 0x2e, 0x20, 0xe9, 0x0a]));
        expect(() => readCorpusFile(corpusPath)).toThrow(ParseError);
    });

    it('should round-trip a parsed corpus through JSON', () => {
        const outPath = path.join(tmpDir, 'records.json');
        const parsed = parseCorpus('1. Title\nAuthor A\nBody.\n');
        writeParsedCorpus(outPath, parsed);

        expect(JSON.parse(fs.readFileSync(outPath, 'utf-8'))).toEqual(parsed);
    });
});
