import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { linkRecords, runLinkage, runParse } from '../pipeline/linker.js';
import { parseCsv } from '../io/csv.js';
import { toMetadataTable } from '../io/readers.js';
import { LinkageDatabase } from '../storage/database.js';
import { mergeConfig, resolveConfig } from '../utils/config.js';
import { TRUNCATION_MARKER } from '../parser/corpus-parser.js';
import { ConfigError, InputError } from '../utils/errors.js';
import { DEFAULT_CONFIG, MatchStatus } from '../types/index.js';

const CORPUS = [
    '1. Mobile App for Depression',
    'Author A',
    'An app-based intervention reduced symptoms.',
    'doi: 10.1000/app1',
    '',
    '2. Exercise and Sleep Quality in Older Adults',
    'Smith JA, Doe B',
    'Exercise improved sleep quality.',
    '',
].join('\n');

const METADATA = [
    'Title,Abstract,DOI,Year',
    'Mobile app for depression,,,2020',
    'Exercise and sleep quality in older adult,,,2021',
    'Existing Paper,Has its own abstract,10.1000/own,2019',
    'Unrelated Topic Entirely,,,2018',
    '',
].join('\n');

describe('Linkage pipeline', () => {
    describe('linkRecords', () => {
        it('should classify every row', () => {
            const table = toMetadataTable(parseCsv(METADATA), { title: 'Title', abstract: 'Abstract', doi: 'DOI' });
            const run = linkRecords(table, CORPUS, DEFAULT_CONFIG);

            expect(run.parsed.records).toHaveLength(2);
            expect(run.outcome.results.map((r) => r.status)).toEqual([
                MatchStatus.Exact,
                MatchStatus.Fuzzy,
                MatchStatus.Existing,
                MatchStatus.None,
            ]);
            expect(run.scoreCard).toMatchObject({
                rows: 4,
                exact: 1,
                fuzzy: 1,
                existing: 1,
                none: 1,
                abstractsAdded: 2,
                abstractCoverage: 0.75,
                corpusRecords: 2,
            });
        });

        it('should apply the configured threshold', () => {
            const table = toMetadataTable(parseCsv(METADATA), { title: 'Title', abstract: 'Abstract', doi: 'DOI' });
            const strict = mergeConfig(DEFAULT_CONFIG, { matching: { threshold: 0.95 } });
            const run = linkRecords(table, CORPUS, strict);

            expect(run.outcome.results[1]?.status).toBe(MatchStatus.None);
            expect(run.outcome.results[1]?.failure?.reason).toBe('below-threshold');
        });

        it('should link a record that follows a numbering gap', () => {
            const gapped = [
                '12. Alpha Title',
                'Author A',
                'Alpha body.',
                '14. Gamma Title',
                'Author C',
                'Gamma body.',
            ].join('\n');
            const table = toMetadataTable(parseCsv('Title,Abstract\nGamma Title,\n'), { title: 'Title', abstract: 'Abstract', doi: 'DOI' });
            const run = linkRecords(table, gapped, DEFAULT_CONFIG);

            expect(run.outcome.results[0]).toMatchObject({
                status: MatchStatus.Exact,
                matched_sequence_index: 14,
                abstract_text: 'Gamma body.',
            });
        });
    });

    describe('runLinkage', () => {
        let tmpDir: string;
        const now = new Date(2024, 4, 6, 7, 8, 9);

        beforeEach(() => {
            tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'abstractlink-run-'));
            fs.writeFileSync(path.join(tmpDir, 'corpus.txt'), CORPUS);
            fs.writeFileSync(path.join(tmpDir, 'metadata.csv'), METADATA);
        });

        afterEach(() => {
            fs.rmSync(tmpDir, { recursive: true, force: true });
        });

        function config(overrides: { db?: string } = {}) {
            return mergeConfig(DEFAULT_CONFIG, {
                corpus: path.join(tmpDir, 'corpus.txt'),
                metadata: path.join(tmpDir, 'metadata.csv'),
                outDir: path.join(tmpDir, 'out'),
                ...overrides,
            });
        }

        it('should write the complete and failed datasets', () => {
            const report = runLinkage(config(), now);

            expect(report.paths).toEqual({
                complete: path.join(tmpDir, 'out', 'title_matched_complete_20240506_070809.csv'),
                failed: path.join(tmpDir, 'out', 'failed_matches_20240506_070809.csv'),
            });

            const complete = parseCsv(fs.readFileSync(report.paths.complete, 'utf-8'));
            expect(complete.headers).toEqual([
                'Title', 'Abstract', 'DOI', 'Year',
                'matched_title', 'match_type', 'match_similarity', 'match_status',
            ]);
            expect(complete.records[0]).toEqual({
                Title: 'Mobile app for depression',
                Abstract: 'An app-based intervention reduced symptoms.',
                DOI: '10.1000/app1',
                Year: '2020',
                matched_title: 'Mobile App for Depression',
                match_type: 'Exact',
                match_similarity: '1.0000',
                match_status: 'Success',
            });
            expect(complete.records[1]?.Abstract).toBe('Exercise improved sleep quality.');
            expect(complete.records[1]?.match_type).toBe('Fuzzy');
            expect(complete.records[2]).toMatchObject({
                Abstract: 'Has its own abstract',
                DOI: '10.1000/own',
                match_type: 'Existing',
                match_similarity: '0.0000',
                match_status: 'Had Abstract',
            });

            const failed = parseCsv(fs.readFileSync(report.paths.failed, 'utf-8'));
            expect(failed.headers).toEqual([
                'Title', 'Abstract', 'DOI', 'Year',
                'failure_reason', 'closest_candidate_title', 'closest_similarity',
            ]);
            expect(failed.records).toHaveLength(1);
            expect(failed.records[0]?.Title).toBe('Unrelated Topic Entirely');
            expect(failed.records[0]?.failure_reason).toBe('below-threshold');
        });

        it('should record the run in the review store', () => {
            const dbPath = path.join(tmpDir, 'runs.db');
            const report = runLinkage(config({ db: dbPath }), now);

            expect(report.runId).toBe(1);

            const db = new LinkageDatabase(dbPath);
            try {
                expect(db.getLatestRun()).toMatchObject({
                    run_id: 1,
                    created_at: now.toISOString(),
                    linker_version: '1.0.0',
                    corpus_path: path.join(tmpDir, 'corpus.txt'),
                });
                expect(db.getMatchResults(1)).toHaveLength(4);
                expect(db.getFailedMatches(1).map((m) => m.title)).toEqual(['Unrelated Topic Entirely']);
            } finally {
                db.close();
            }
        });

        it('should not open a review store unless configured', () => {
            expect(runLinkage(config(), now).runId).toBeNull();
        });

        it('should require both input paths', () => {
            expect(() => runLinkage(DEFAULT_CONFIG, now)).toThrow(ConfigError);
        });

        it('should fail on a missing input file', () => {
            const missing = mergeConfig(config(), { corpus: path.join(tmpDir, 'nope.txt') });
            expect(() => runLinkage(missing, now)).toThrow(InputError);
        });
    });

    describe('runParse', () => {
        let tmpDir: string;

        beforeEach(() => {
            tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'abstractlink-parse-'));
            fs.writeFileSync(path.join(tmpDir, 'corpus.txt'), CORPUS);
        });

        afterEach(() => {
            fs.rmSync(tmpDir, { recursive: true, force: true });
        });

        it('should apply parser settings from the config file', async () => {
            fs.writeFileSync(path.join(tmpDir, 'abstractlink.config.json'), JSON.stringify({ parser: { maxFieldLength: 10 } }));
            const config = await resolveConfig({ corpus: path.join(tmpDir, 'corpus.txt') }, tmpDir);

            const { parsed, outputPath } = runParse(config);

            expect(outputPath).toBe(path.join(tmpDir, 'corpus.records.json'));
            expect(parsed.records[0]?.title).toBe('Mobile App' + TRUNCATION_MARKER);
            expect(JSON.parse(fs.readFileSync(outputPath, 'utf-8'))).toEqual(parsed);
        });

        it('should require a corpus path', () => {
            expect(() => runParse(DEFAULT_CONFIG)).toThrow(ConfigError);
        });
    });
});
