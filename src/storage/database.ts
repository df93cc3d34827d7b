import Database from 'better-sqlite3';
import type { FailureReason, MatchResult, MatchStatus, RunRecord } from '../types/index.js';
import { getLogger } from '../utils/logger.js';

/**
 * SQLite schema migration v1: run history plus one row per matched metadata row.
 */
const MIGRATION_V1 = `
-- Runs: one linkage invocation
CREATE TABLE IF NOT EXISTS runs (
  run_id INTEGER PRIMARY KEY,
  created_at TEXT NOT NULL DEFAULT (datetime('now')),
  linker_version TEXT NOT NULL,
  corpus_path TEXT NOT NULL,
  metadata_path TEXT NOT NULL,
  config_json TEXT NOT NULL,
  stats_json TEXT NOT NULL DEFAULT '{}'
);

-- Match results: one per metadata row per run
CREATE TABLE IF NOT EXISTS match_results (
  run_id INTEGER NOT NULL REFERENCES runs(run_id) ON DELETE CASCADE,
  row_id INTEGER NOT NULL,
  title TEXT NOT NULL,
  match_type TEXT NOT NULL,
  matched_title TEXT NOT NULL DEFAULT '',
  matched_sequence_index INTEGER,
  similarity REAL NOT NULL DEFAULT 0,
  matched_doi TEXT,
  failure_reason TEXT,
  closest_candidate_title TEXT,
  closest_similarity REAL,
  PRIMARY KEY (run_id, row_id)
);

CREATE INDEX IF NOT EXISTS idx_match_results_type ON match_results(run_id, match_type);
`;

/**
 * Stored form of a match result.
 */
export interface StoredMatch {
    run_id: number;
    row_id: number;
    title: string;
    match_type: MatchStatus;
    matched_title: string;
    matched_sequence_index: number | null;
    similarity: number;
    matched_doi: string | null;
    failure_reason: FailureReason | null;
    closest_candidate_title: string | null;
    closest_similarity: number | null;
}

/**
 * Review store wrapper around better-sqlite3.
 * Handles schema migration, WAL mode, foreign keys, and run persistence.
 */
export class LinkageDatabase {
    private db: Database.Database;

    constructor(dbPath: string) {
        this.db = new Database(dbPath);

        // Set pragmas
        this.db.pragma('journal_mode = WAL');
        this.db.pragma('foreign_keys = ON');

        this.migrate();

        getLogger().debug({ dbPath }, 'Database initialized');
    }

    private migrate(): void {
        const version = this.db.pragma('user_version', { simple: true });
        const currentVersion = typeof version === 'number' ? version : 0;

        if (currentVersion < 1) {
            this.db.exec(MIGRATION_V1);
            this.db.pragma('user_version = 1');
            getLogger().info('Database migrated to v1');
        }
    }

    // ─── Runs ─────────────────────────────────────────────────

    insertRun(run: Omit<RunRecord, 'run_id'>): number {
        const stmt = this.db.prepare<Omit<RunRecord, 'run_id'>>(`
      INSERT INTO runs (created_at, linker_version, corpus_path, metadata_path, config_json, stats_json)
      VALUES (@created_at, @linker_version, @corpus_path, @metadata_path, @config_json, @stats_json)
    `);
        const result = stmt.run(run);
        return Number(result.lastInsertRowid);
    }

    getRuns(): RunRecord[] {
        return this.db.prepare<[], RunRecord>('SELECT * FROM runs ORDER BY run_id').all();
    }

    getLatestRun(): RunRecord | undefined {
        return this.db.prepare<[], RunRecord>('SELECT * FROM runs ORDER BY run_id DESC LIMIT 1').get();
    }

    // ─── Match results ────────────────────────────────────────

    /**
     * Insert the results of one run in a single transaction.
     * `titles` maps row_id to the metadata title.
     */
    insertMatchResults(runId: number, results: readonly MatchResult[], titles: ReadonlyMap<number, string>): void {
        const stmt = this.db.prepare<StoredMatch>(`
      INSERT INTO match_results (run_id, row_id, title, match_type, matched_title, matched_sequence_index, similarity,
        matched_doi, failure_reason, closest_candidate_title, closest_similarity)
      VALUES (@run_id, @row_id, @title, @match_type, @matched_title, @matched_sequence_index, @similarity,
        @matched_doi, @failure_reason, @closest_candidate_title, @closest_similarity)
    `);

        const insertAll = this.db.transaction((items: readonly MatchResult[]) => {
            for (const result of items) {
                stmt.run({
                    run_id: runId,
                    row_id: result.row_id,
                    title: titles.get(result.row_id) ?? '',
                    match_type: result.status,
                    matched_title: result.matched_title,
                    matched_sequence_index: result.matched_sequence_index,
                    similarity: result.similarity,
                    matched_doi: result.matched_doi,
                    failure_reason: result.failure?.reason ?? null,
                    closest_candidate_title: result.failure?.closest_candidate_title ?? null,
                    closest_similarity: result.failure?.closest_similarity ?? null,
                });
            }
        });

        insertAll(results);
    }

    getMatchResults(runId: number): StoredMatch[] {
        return this.db
            .prepare<[number], StoredMatch>('SELECT * FROM match_results WHERE run_id = ? ORDER BY row_id')
            .all(runId);
    }

    getFailedMatches(runId: number): StoredMatch[] {
        return this.db
            .prepare<[number], StoredMatch>("SELECT * FROM match_results WHERE run_id = ? AND match_type = 'None' ORDER BY row_id")
            .all(runId);
    }

    // ─── Stats ────────────────────────────────────────────────

    getStats(): {
        runs: number;
        matchResults: number;
        resultsByType: Record<string, number>;
    } {
        const runs = this.db.prepare<[], { count: number }>('SELECT COUNT(*) as count FROM runs').get()?.count ?? 0;
        const matchResults = this.db.prepare<[], { count: number }>('SELECT COUNT(*) as count FROM match_results').get()?.count ?? 0;

        const typeRows = this.db
            .prepare<[], { match_type: string; count: number }>('SELECT match_type, COUNT(*) as count FROM match_results GROUP BY match_type')
            .all();
        const resultsByType: Record<string, number> = {};
        for (const row of typeRows) {
            resultsByType[row.match_type] = row.count;
        }

        return { runs, matchResults, resultsByType };
    }

    // ─── Utility ──────────────────────────────────────────────

    /**
     * Close the database connection.
     */
    close(): void {
        this.db.close();
        getLogger().debug('Database closed');
    }

    /**
     * Get the raw better-sqlite3 instance (for advanced queries).
     */
    getRawDb(): Database.Database {
        return this.db;
    }
}
