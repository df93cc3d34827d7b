import type { LinkerConfig, RunStats } from '../types/index.js';
import { parseCorpus, type ParsedCorpus } from '../parser/corpus-parser.js';
import { MatchEngine, type MatchOutcome } from '../matching/match-engine.js';
import { assembleResults, type AssembledResults } from '../matching/result-assembler.js';
import { toScoreCard, type ScoreCard } from '../matching/stats.js';
import { toStopwordSet } from '../nlp/stopwords.js';
import { readCorpusFile, readMetadataFile, type MetadataTable } from '../io/readers.js';
import { writeLinkageOutputs, writeParsedCorpus, type OutputPaths } from '../io/writers.js';
import { LinkageDatabase } from '../storage/database.js';
import { ConfigError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

export const LINKER_VERSION = '1.0.0';

export interface LinkageRun {
    parsed: ParsedCorpus;
    outcome: MatchOutcome;
    assembled: AssembledResults;
    stats: RunStats;
    scoreCard: ScoreCard;
}

export interface LinkageReport {
    paths: OutputPaths;
    stats: RunStats;
    scoreCard: ScoreCard;
    /** Review store run id, when a database was configured */
    runId: number | null;
}

/**
 * In-memory pipeline: parse → match → assemble.
 */
export function linkRecords(table: MetadataTable, corpusText: string, config: LinkerConfig): LinkageRun {
    const parsed = parseCorpus(corpusText, config.parser);

    const engine = new MatchEngine(parsed.records, {
        threshold: config.matching.threshold,
        weights: { sequence: config.matching.sequenceWeight, token: config.matching.tokenWeight },
        stopwords: toStopwordSet(config.tokens.stopwords),
        minTokenLength: config.tokens.minTokenLength,
    });
    const outcome = engine.match(table.rows);
    const assembled = assembleResults(table.rows, outcome.results);

    const stats: RunStats = { parse: parsed.stats, match: outcome.stats };
    return { parsed, outcome, assembled, stats, scoreCard: toScoreCard(stats) };
}

/**
 * Full run: read both inputs up front, link, write the two CSV outputs,
 * and record the run in the review store when `config.db` is set.
 */
export function runLinkage(config: LinkerConfig, now: Date = new Date()): LinkageReport {
    const logger = getLogger();
    if (!config.corpus) throw new ConfigError('corpus path is required', 'corpus');
    if (!config.metadata) throw new ConfigError('metadata path is required', 'metadata');

    const corpusText = readCorpusFile(config.corpus);
    const table = readMetadataFile(config.metadata, {
        title: config.titleColumn,
        abstract: config.abstractColumn,
        doi: config.doiColumn,
    });

    const run = linkRecords(table, corpusText, config);
    const paths = writeLinkageOutputs(config.outDir, table, run.assembled, now);

    let runId: number | null = null;
    if (config.db) {
        const db = new LinkageDatabase(config.db);
        try {
            runId = db.insertRun({
                created_at: now.toISOString(),
                linker_version: LINKER_VERSION,
                corpus_path: config.corpus,
                metadata_path: config.metadata,
                config_json: JSON.stringify({ matching: config.matching, tokens: config.tokens, parser: config.parser }),
                stats_json: JSON.stringify(run.scoreCard),
            });
            db.insertMatchResults(runId, run.outcome.results, new Map(table.rows.map((row) => [row.row_id, row.title] as const)));
        } finally {
            db.close();
        }
    }

    logger.info({ ...run.scoreCard, runId }, 'Linkage complete');
    return { paths, stats: run.stats, scoreCard: run.scoreCard, runId };
}

export interface ParseReport {
    parsed: ParsedCorpus;
    outputPath: string;
}

/**
 * Parse the corpus alone and dump its records as JSON, by default beside
 * the corpus as `<name>.records.json`.
 */
export function runParse(config: LinkerConfig, outputPath?: string): ParseReport {
    if (!config.corpus) throw new ConfigError('corpus path is required', 'corpus');

    const parsed = parseCorpus(readCorpusFile(config.corpus), config.parser);
    const target = outputPath ?? config.corpus.replace(/\.txt$/i, '') + '.records.json';
    writeParsedCorpus(target, parsed);

    getLogger().info({ records: parsed.records.length, path: target }, 'Parsed corpus written');
    return { parsed, outputPath: target };
}
