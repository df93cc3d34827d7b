#!/usr/bin/env node

import { Command, InvalidArgumentError } from 'commander';
import { isLogLevel, resolveConfig, type LinkerConfigOverrides } from '../utils/config.js';
import { initLogger, getLogger } from '../utils/logger.js';
import { LINKER_VERSION, runLinkage, runParse } from '../pipeline/linker.js';
import { formatScoreCard } from '../matching/stats.js';
import { LinkageDatabase } from '../storage/database.js';
import type { LogLevel } from '../types/index.js';

interface LinkOptions {
    corpus?: string;
    metadata?: string;
    outDir?: string;
    db?: string;
    threshold?: number;
    minTokenLength?: number;
    maxSequenceGap?: number;
    titleColumn?: string;
    abstractColumn?: string;
    doiColumn?: string;
    logLevel?: LogLevel;
    jsonLogs?: boolean;
}

interface ParseCommandOptions {
    corpus: string;
    out?: string;
    maxSequenceGap?: number;
    logLevel?: LogLevel;
    jsonLogs?: boolean;
}

interface InspectOptions {
    input: string;
}

function parseNumber(value: string): number {
    const n = Number(value);
    if (value.trim() === '' || !Number.isFinite(n)) {
        throw new InvalidArgumentError('Not a number.');
    }
    return n;
}

function parseInteger(value: string): number {
    const n = parseNumber(value);
    if (!Number.isInteger(n)) {
        throw new InvalidArgumentError('Not an integer.');
    }
    return n;
}

function parseLogLevel(value: string): LogLevel {
    if (!isLogLevel(value)) {
        throw new InvalidArgumentError('Expected one of: debug, info, warn, error.');
    }
    return value;
}

const program = new Command();

program
    .name('abstractlink')
    .description('Fill in missing abstracts of a metadata table from a numbered plain-text abstract corpus.')
    .version(LINKER_VERSION);

// ─── LINK command ─────────────────────────────────────────

program
    .command('link')
    .description('Match metadata rows to corpus records by title and write the results')
    .option('-c, --corpus <path>', 'Plain-text abstract corpus')
    .option('-m, --metadata <path>', 'Metadata CSV')
    .option('-o, --out-dir <dir>', 'Output directory')
    .option('--db <path>', 'Record the run in this SQLite review store')
    .option('-t, --threshold <n>', 'Fuzzy match threshold (0-1)', parseNumber)
    .option('--min-token-length <n>', 'Shortest significant token', parseInteger)
    .option('--max-sequence-gap <n>', 'Largest jump between record numbers taken as a new record', parseInteger)
    .option('--title-column <name>', 'Title column header')
    .option('--abstract-column <name>', 'Abstract column header')
    .option('--doi-column <name>', 'DOI column header')
    .option('--log-level <level>', 'Log level: debug | info | warn | error', parseLogLevel)
    .option('--json-logs', 'Output JSON logs')
    .action(async (opts: LinkOptions) => {
        try {
            const cliConfig: LinkerConfigOverrides = {
                corpus: opts.corpus,
                metadata: opts.metadata,
                outDir: opts.outDir,
                db: opts.db,
                titleColumn: opts.titleColumn,
                abstractColumn: opts.abstractColumn,
                doiColumn: opts.doiColumn,
                logLevel: opts.logLevel,
                jsonLogs: opts.jsonLogs,
                matching: { threshold: opts.threshold },
                tokens: { minTokenLength: opts.minTokenLength },
                parser: { maxSequenceGap: opts.maxSequenceGap },
            };

            const config = await resolveConfig(cliConfig);
            initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });
            getLogger().info(
                { corpus: config.corpus, metadata: config.metadata, threshold: config.matching.threshold },
                'Starting linkage'
            );

            const report = runLinkage(config);

            console.log('\n📄 Abstract linkage\n');
            for (const line of formatScoreCard(report.scoreCard)) {
                console.log(line);
            }
            console.log(`\n  Complete: ${report.paths.complete}`);
            console.log(`  Failed:   ${report.paths.failed}`);
            if (report.runId !== null) {
                console.log(`  Run id:   ${report.runId}`);
            }
            console.log('');
        } catch (error) {
            getLogger().error({ err: error }, 'Linkage failed');
            process.exit(1);
        }
    });

// ─── PARSE command ────────────────────────────────────────

program
    .command('parse')
    .description('Parse the corpus only and dump its records as JSON')
    .requiredOption('-c, --corpus <path>', 'Plain-text abstract corpus')
    .option('-o, --out <path>', 'Output JSON path')
    .option('--max-sequence-gap <n>', 'Largest jump between record numbers taken as a new record', parseInteger)
    .option('--log-level <level>', 'Log level: debug | info | warn | error', parseLogLevel)
    .option('--json-logs', 'Output JSON logs')
    .action(async (opts: ParseCommandOptions) => {
        try {
            const config = await resolveConfig({
                corpus: opts.corpus,
                logLevel: opts.logLevel,
                jsonLogs: opts.jsonLogs,
                parser: { maxSequenceGap: opts.maxSequenceGap },
            });
            initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });

            const { parsed, outputPath } = runParse(config, opts.out);

            console.log(`Parsed ${parsed.records.length} records into ${outputPath}`);
            console.log(`  Malformed: ${parsed.stats.malformedRecords}`);
            console.log(`  Truncated: ${parsed.stats.truncatedFields}`);
            console.log(`  Rejected:  ${parsed.stats.rejectedMarkers}`);
            console.log(`  U+FFFD:    ${parsed.stats.replacementCharacters}`);
        } catch (error) {
            getLogger().error({ err: error }, 'Parse failed');
            process.exit(1);
        }
    });

// ─── INSPECT command ──────────────────────────────────────

program
    .command('inspect')
    .description('Show review store statistics')
    .requiredOption('-i, --input <dbPath>', 'Review store path')
    .action((opts: InspectOptions) => {
        try {
            const db = new LinkageDatabase(opts.input);
            const stats = db.getStats();
            const latest = db.getLatestRun();
            db.close();

            console.log('\n📊 Review Store Statistics\n');
            console.log(`  Runs:          ${stats.runs}`);
            console.log(`  Match results: ${stats.matchResults}`);

            if (Object.keys(stats.resultsByType).length > 0) {
                console.log('\n  Match Types:');
                for (const [type, count] of Object.entries(stats.resultsByType)) {
                    console.log(`    ${type}: ${count}`);
                }
            }

            if (latest) {
                console.log(`\n  Latest run: #${latest.run_id ?? '?'} at ${latest.created_at} (v${latest.linker_version})`);
                console.log(`    Corpus:   ${latest.corpus_path}`);
                console.log(`    Metadata: ${latest.metadata_path}`);
            }

            console.log('');
        } catch (error) {
            console.error('Inspect failed:', error);
            process.exit(1);
        }
    });

await program.parseAsync();
