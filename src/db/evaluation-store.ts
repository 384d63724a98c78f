import Database, { type Database as DatabaseType } from "better-sqlite3";
import path from "node:path";
import fs from "node:fs";
import { z } from "zod";
import { config } from "../config.js";
import { logDb } from "../logging.js";
import { consistencyLevel, round2 } from "../eval/ensemble/stats.js";
import { PROMPT_TEMPLATE_IDS, type Answer, type ConsistencyLevel, type FinalScore, type RawScore } from "../eval/types.js";

// ── Row schemas ──────────────────────────────────────────────────────────────

const EvaluationRowSchema = z.object({
  id: z.string(),
  answer_id: z.string(),
  template_id: z.enum(PROMPT_TEMPLATE_IDS),
  value: z.number().nullable(),
  mean_raw: z.number().nullable(),
  std_dev: z.number().nullable(),
  consistency: z.enum(["excellent", "good", "fair", "poor"]).nullable(),
  outliers_removed: z.number().int(),
  floor_applied: z.number().int(),
  unevaluated: z.number().int(),
  degraded: z.number().int(),
  adaptive_escalated: z.number().int(),
  requested_calls: z.number().int(),
  successful_calls: z.number().int(),
  reason: z.string().nullable(),
  call_failures: z.string(),
  created_at: z.string(),
});

const RawScoreRowSchema = z.object({
  answer_id: z.string(),
  call_index: z.number().int(),
  value: z.number(),
  rationale: z.string(),
  latency_ms: z.number(),
  provider: z.enum(["openai", "claude", "gemini"]),
  model: z.string(),
  template_id: z.enum(PROMPT_TEMPLATE_IDS),
  prompt_hash: z.string(),
  excluded: z.number().int(),
  created_at: z.string(),
});

const CallFailuresSchema = z.array(
  z.object({
    call_index: z.number().int(),
    kind: z.string(),
    message: z.string(),
  }),
);

const StdDevRowSchema = z.object({
  std_dev: z.number(),
  degraded: z.number().int(),
  floor_applied: z.number().int(),
});

export interface ConsistencyReport {
  sample_count: number;
  average_std_dev: number | null;
  consistency: ConsistencyLevel | null;
  degraded_count: number;
  floor_applied_count: number;
}

// ── Store ────────────────────────────────────────────────────────────────────

/**
 * Append-only audit log of final scores and the raw scores behind them.
 * Raw score rows are inserted once and never updated.
 */
export class EvaluationStore {
  private db: DatabaseType;

  constructor(dbPath: string = config.db.path) {
    if (dbPath !== ":memory:") {
      const dir = path.dirname(dbPath);
      if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });
    }
    this.db = new Database(dbPath);
    this.initialize();
  }

  private initialize(): void {
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("synchronous = NORMAL");
    this.db.pragma("foreign_keys = ON");

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS evaluations (
        id TEXT PRIMARY KEY,
        answer_id TEXT NOT NULL,
        question TEXT,
        domain TEXT,
        answer_text TEXT NOT NULL,
        template_id TEXT NOT NULL,
        value REAL,
        mean_raw REAL,
        std_dev REAL,
        consistency TEXT,
        outliers_removed INTEGER NOT NULL,
        floor_applied INTEGER NOT NULL,
        unevaluated INTEGER NOT NULL,
        degraded INTEGER NOT NULL,
        adaptive_escalated INTEGER NOT NULL,
        requested_calls INTEGER NOT NULL,
        successful_calls INTEGER NOT NULL,
        reason TEXT,
        call_failures TEXT NOT NULL,  -- JSON array
        created_at TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS raw_scores (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        evaluation_id TEXT NOT NULL REFERENCES evaluations(id),
        answer_id TEXT NOT NULL,
        call_index INTEGER NOT NULL,
        value REAL NOT NULL,
        rationale TEXT NOT NULL,
        latency_ms INTEGER NOT NULL,
        provider TEXT NOT NULL,
        model TEXT NOT NULL,
        template_id TEXT NOT NULL,
        prompt_hash TEXT NOT NULL,
        excluded INTEGER NOT NULL,  -- 1 = removed as an outlier
        created_at TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_evaluations_created ON evaluations(created_at);
      CREATE INDEX IF NOT EXISTS idx_evaluations_answer ON evaluations(answer_id);
      CREATE INDEX IF NOT EXISTS idx_raw_scores_eval ON raw_scores(evaluation_id);
    `);
  }

  saveFinalScore(final: FinalScore, answer: Answer): void {
    this.db.transaction(() => this.insertFinalScore(final, answer))();
    logDb.debug({ evaluation_id: final.id, raw_scores: final.raw_scores.length }, "Stored evaluation");
  }

  /** All or nothing: one failing insert rolls back the whole batch. */
  saveFinalScores(entries: ReadonlyArray<{ final: FinalScore; answer: Answer }>): void {
    this.db.transaction(() => {
      for (const { final, answer } of entries) this.insertFinalScore(final, answer);
    })();
    logDb.debug({ evaluations: entries.length }, "Stored evaluation batch");
  }

  private insertFinalScore(final: FinalScore, answer: Answer): void {
    const insertEval = this.db.prepare(`
      INSERT INTO evaluations (
        id, answer_id, question, domain, answer_text, template_id, value, mean_raw, std_dev, consistency,
        outliers_removed, floor_applied, unevaluated, degraded, adaptive_escalated,
        requested_calls, successful_calls, reason, call_failures, created_at
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);
    const insertRaw = this.db.prepare(`
      INSERT INTO raw_scores (
        evaluation_id, answer_id, call_index, value, rationale, latency_ms,
        provider, model, template_id, prompt_hash, excluded, created_at
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);

    const excluded = new Set(final.excluded_call_indexes);
    insertEval.run(
      final.id,
      final.answer_id,
      answer.question ?? null,
      answer.domain ?? null,
      answer.text,
      final.template_id,
      final.value,
      final.mean_raw,
      final.std_dev,
      final.consistency,
      final.outliers_removed,
      final.floor_applied ? 1 : 0,
      final.unevaluated ? 1 : 0,
      final.degraded ? 1 : 0,
      final.adaptive_escalated ? 1 : 0,
      final.requested_calls,
      final.successful_calls,
      final.reason,
      JSON.stringify(final.call_failures),
      final.created_at,
    );
    for (const s of final.raw_scores) {
      insertRaw.run(
        final.id,
        s.answer_id,
        s.call_index,
        s.value,
        s.rationale,
        s.latency_ms,
        s.provider,
        s.model,
        s.template_id,
        s.prompt_hash,
        excluded.has(s.call_index) ? 1 : 0,
        s.created_at,
      );
    }
  }

  getEvaluation(id: string): FinalScore | null {
    const row = this.db.prepare("SELECT * FROM evaluations WHERE id = ?").get(id);
    if (row === undefined) return null;
    return this.toFinalScore(EvaluationRowSchema.parse(row));
  }

  recentEvaluations(limit: number = 20): FinalScore[] {
    const rows = this.db.prepare("SELECT * FROM evaluations ORDER BY created_at DESC, rowid DESC LIMIT ?").all(limit);
    return rows.map((row) => this.toFinalScore(EvaluationRowSchema.parse(row)));
  }

  /** Average spread of recent scored evaluations; unevaluated answers are skipped. */
  consistencyReport(limit: number = 100): ConsistencyReport {
    const rows = this.db
      .prepare(
        `SELECT std_dev, degraded, floor_applied FROM evaluations
         WHERE unevaluated = 0 AND std_dev IS NOT NULL
         ORDER BY created_at DESC, rowid DESC LIMIT ?`,
      )
      .all(limit)
      .map((row) => StdDevRowSchema.parse(row));

    if (rows.length === 0) {
      return { sample_count: 0, average_std_dev: null, consistency: null, degraded_count: 0, floor_applied_count: 0 };
    }

    const avg = rows.reduce((s, r) => s + r.std_dev, 0) / rows.length;
    return {
      sample_count: rows.length,
      average_std_dev: round2(avg),
      consistency: consistencyLevel(avg),
      degraded_count: rows.filter((r) => r.degraded === 1).length,
      floor_applied_count: rows.filter((r) => r.floor_applied === 1).length,
    };
  }

  close(): void {
    this.db.close();
  }

  private toFinalScore(row: z.infer<typeof EvaluationRowSchema>): FinalScore {
    const rawRows = this.db
      .prepare("SELECT * FROM raw_scores WHERE evaluation_id = ? ORDER BY call_index ASC")
      .all(row.id)
      .map((r) => RawScoreRowSchema.parse(r));

    const rawScores: RawScore[] = rawRows.map(({ excluded: _excluded, ...score }) => score);

    return {
      id: row.id,
      answer_id: row.answer_id,
      template_id: row.template_id,
      value: row.value,
      mean_raw: row.mean_raw,
      std_dev: row.std_dev,
      consistency: row.consistency,
      outliers_removed: row.outliers_removed,
      floor_applied: row.floor_applied === 1,
      unevaluated: row.unevaluated === 1,
      degraded: row.degraded === 1,
      adaptive_escalated: row.adaptive_escalated === 1,
      requested_calls: row.requested_calls,
      successful_calls: row.successful_calls,
      reason: row.reason,
      raw_scores: rawScores,
      excluded_call_indexes: rawRows.filter((r) => r.excluded === 1).map((r) => r.call_index),
      call_failures: CallFailuresSchema.parse(JSON.parse(row.call_failures)),
      created_at: row.created_at,
    };
  }
}
