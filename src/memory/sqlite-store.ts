import Database from "better-sqlite3";
import { randomUUID } from "node:crypto";
import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import { z } from "zod";
import type { Memory, MemoryMeta, MemoryPatch, NewMemory } from "./types.js";
import {
  applyPatch,
  parseMemoryState,
  validateNewMemory,
  validatePatch,
  type ListMemoriesOptions,
  type MemoryStore,
  type UpdateResult,
} from "./store.js";
import { assertUnitInterval, ValidationError } from "./errors.js";
import { log } from "../logger.js";

// ── SQLite Memory Store (better-sqlite3) ─────────────────

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS memories (
    id TEXT PRIMARY KEY,
    spirit_id TEXT NOT NULL,
    summary TEXT NOT NULL DEFAULT '',
    importance REAL NOT NULL CHECK (importance BETWEEN 0 AND 1),
    confidence REAL NOT NULL CHECK (confidence BETWEEN 0 AND 1),
    state TEXT NOT NULL DEFAULT 'active'
      CHECK (state IN ('active', 'decaying', 'archived')),
    recency_score REAL CHECK (recency_score BETWEEN 0 AND 1),
    decay_score REAL CHECK (decay_score BETWEEN 0 AND 1),
    time_start INTEGER,
    time_end INTEGER,
    reinforced_at INTEGER,
    state_changed_at INTEGER,
    meta TEXT NOT NULL DEFAULT '{}',
    is_deleted INTEGER NOT NULL DEFAULT 0,
    created_at INTEGER NOT NULL,
    updated_at INTEGER NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_memories_spirit ON memories(spirit_id, id);
  CREATE INDEX IF NOT EXISTS idx_memories_state ON memories(spirit_id, state);
`;

const rowSchema = z.object({
  id: z.string(),
  spirit_id: z.string(),
  summary: z.string(),
  importance: z.number(),
  confidence: z.number(),
  state: z.string(),
  recency_score: z.number().nullable(),
  decay_score: z.number().nullable(),
  time_start: z.number().nullable(),
  time_end: z.number().nullable(),
  reinforced_at: z.number().nullable(),
  state_changed_at: z.number().nullable(),
  meta: z.string(),
  is_deleted: z.number(),
  created_at: z.number(),
  updated_at: z.number(),
});

type MemoryRow = z.infer<typeof rowSchema>;

const metaSchema = z.record(z.unknown());
const spiritRowSchema = z.object({ spirit_id: z.string() });
const idRowSchema = z.object({ id: z.string() });

function rowToMemory(raw: unknown): Memory {
  const parsed = rowSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ValidationError("memory row", raw, parsed.error.issues[0]?.message ?? "malformed row");
  }
  const row: MemoryRow = parsed.data;

  assertUnitInterval("importance", row.importance);
  assertUnitInterval("confidence", row.confidence);
  if (row.recency_score !== null) assertUnitInterval("recencyScore", row.recency_score);
  if (row.decay_score !== null) assertUnitInterval("decayScore", row.decay_score);

  return {
    id: row.id,
    spiritId: row.spirit_id,
    summary: row.summary,
    importance: row.importance,
    confidence: row.confidence,
    state: parseMemoryState(row.state),
    recencyScore: row.recency_score,
    decayScore: row.decay_score,
    timeStart: row.time_start,
    timeEnd: row.time_end,
    reinforcedAt: row.reinforced_at,
    stateChangedAt: row.state_changed_at,
    meta: parseMeta(row.id, row.meta),
    isDeleted: row.is_deleted !== 0,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function parseMeta(id: string, text: string): MemoryMeta {
  try {
    const result = metaSchema.safeParse(JSON.parse(text));
    if (result.success) return result.data;
  } catch (err) {
    log.warn({ id, err }, "⚠️ Unreadable memory meta — treating as empty");
    return {};
  }
  log.warn({ id }, "⚠️ Memory meta is not an object — treating as empty");
  return {};
}

/** Shared WHERE/ORDER/LIMIT for the listing queries; null when nothing can match. */
function buildListQuery(
  columns: string,
  spiritId: string,
  options: ListMemoriesOptions,
): { sql: string; params: Array<string | number> } | null {
  const clauses = ["spirit_id = ?"];
  const params: Array<string | number> = [spiritId];

  if (!options.includeDeleted) clauses.push("is_deleted = 0");
  if (options.states) {
    if (options.states.length === 0) return null;
    clauses.push(`state IN (${options.states.map(() => "?").join(", ")})`);
    params.push(...options.states);
  }
  if (options.afterId !== undefined) {
    clauses.push("id > ?");
    params.push(options.afterId);
  }

  let sql = `SELECT ${columns} FROM memories WHERE ${clauses.join(" AND ")} ORDER BY id`;
  if (options.limit !== undefined) {
    sql += " LIMIT ?";
    params.push(Math.max(0, Math.floor(options.limit)));
  }
  return { sql, params };
}

/** Bind parameters for every mutable column, keyed by column name. */
function mutableParams(memory: Memory) {
  return {
    id: memory.id,
    summary: memory.summary,
    importance: memory.importance,
    confidence: memory.confidence,
    state: memory.state,
    recency_score: memory.recencyScore,
    decay_score: memory.decayScore,
    time_start: memory.timeStart,
    time_end: memory.timeEnd,
    reinforced_at: memory.reinforcedAt,
    state_changed_at: memory.stateChangedAt,
    meta: JSON.stringify(memory.meta),
    is_deleted: memory.isDeleted ? 1 : 0,
    updated_at: memory.updatedAt,
  };
}

export class SqliteMemoryStore implements MemoryStore {
  private readonly db: Database.Database;

  /**
   * Opens (and migrates) the database. Pass ":memory:" for a throwaway store,
   * or an open connection to share it with other code.
   */
  constructor(source: string | Database.Database) {
    if (typeof source === "string") {
      if (source !== ":memory:") {
        mkdirSync(dirname(source), { recursive: true });
      }
      this.db = new Database(source);
    } else {
      this.db = source;
    }
    this.db.pragma("journal_mode = WAL");
    this.db.exec(SCHEMA);
    log.debug({ path: this.db.name }, "🗄️ Memory store opened");
  }

  async listMemories(
    spiritId: string,
    options: ListMemoriesOptions = {},
  ): Promise<Memory[]> {
    const query = buildListQuery("*", spiritId, options);
    if (!query) return [];
    return this.db.prepare(query.sql).all(...query.params).map(rowToMemory);
  }

  async listMemoryIds(
    spiritId: string,
    options: ListMemoriesOptions = {},
  ): Promise<string[]> {
    const query = buildListQuery("id", spiritId, options);
    if (!query) return [];
    return this.db
      .prepare(query.sql)
      .all(...query.params)
      .map((row) => idRowSchema.parse(row).id);
  }

  async getMemory(id: string): Promise<Memory | null> {
    const row = this.db.prepare("SELECT * FROM memories WHERE id = ?").get(id);
    return row === undefined ? null : rowToMemory(row);
  }

  async updateMemory(
    id: string,
    patch: MemoryPatch,
    expectedUpdatedAt: number,
  ): Promise<UpdateResult> {
    validatePatch(patch);

    const apply = this.db.transaction((): UpdateResult => {
      const row = this.db.prepare("SELECT * FROM memories WHERE id = ?").get(id);
      if (row === undefined) return { status: "not_found" };

      const current = rowToMemory(row);
      if (current.updatedAt !== expectedUpdatedAt) return { status: "conflict" };

      const next = applyPatch(current, patch);
      const params = mutableParams(next);

      const info = this.db
        .prepare(
          `UPDATE memories SET
             summary = @summary, importance = @importance, confidence = @confidence,
             state = @state, recency_score = @recency_score, decay_score = @decay_score,
             time_start = @time_start, time_end = @time_end,
             reinforced_at = @reinforced_at, state_changed_at = @state_changed_at,
             meta = @meta, is_deleted = @is_deleted, updated_at = @updated_at
           WHERE id = @id AND updated_at = @expected_updated_at`,
        )
        .run({ ...params, expected_updated_at: expectedUpdatedAt });

      if (info.changes === 0) return { status: "conflict" };
      return { status: "updated", memory: next };
    });

    return apply();
  }

  async insertMemory(input: NewMemory): Promise<Memory> {
    validateNewMemory(input);

    const memory: Memory = {
      id: input.id ?? randomUUID(),
      spiritId: input.spiritId,
      summary: input.summary,
      importance: input.importance,
      confidence: input.confidence,
      state: "active",
      recencyScore: null,
      decayScore: null,
      timeStart: input.timeStart ?? null,
      timeEnd: input.timeEnd ?? null,
      reinforcedAt: null,
      stateChangedAt: null,
      meta: input.meta ?? {},
      isDeleted: false,
      createdAt: input.createdAt,
      updatedAt: input.createdAt,
    };

    this.db
      .prepare(
        `INSERT INTO memories (
           id, spirit_id, summary, importance, confidence, state,
           recency_score, decay_score, time_start, time_end,
           reinforced_at, state_changed_at, meta, is_deleted, created_at, updated_at
         ) VALUES (
           @id, @spirit_id, @summary, @importance, @confidence, @state,
           @recency_score, @decay_score, @time_start, @time_end,
           @reinforced_at, @state_changed_at, @meta, @is_deleted, @created_at, @updated_at
         )`,
      )
      .run({
        ...mutableParams(memory),
        spirit_id: memory.spiritId,
        created_at: memory.createdAt,
      });

    return memory;
  }

  async listSpiritIds(): Promise<string[]> {
    const rows = this.db
      .prepare(
        "SELECT DISTINCT spirit_id FROM memories WHERE is_deleted = 0 ORDER BY spirit_id",
      )
      .all();
    return rows.map((row) => spiritRowSchema.parse(row).spirit_id);
  }

  close(): void {
    this.db.close();
  }
}
