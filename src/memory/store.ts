import type { Memory, MemoryPatch, MemoryState, NewMemory } from "./types.js";
import { assertTimestamp, assertUnitInterval, ValidationError } from "./errors.js";
import { MEMORY_STATES } from "./types.js";

// ── Memory Store — persistence boundary ──────────────────

export interface ListMemoriesOptions {
  /** Only these states; all states when omitted */
  states?: readonly MemoryState[];
  /** Exclusive lower bound on id, for batch paging and resume */
  afterId?: string;
  limit?: number;
  includeDeleted?: boolean;
}

export type UpdateResult =
  | { status: "updated"; memory: Memory }
  | { status: "conflict" }
  | { status: "not_found" };

/**
 * What the recall core needs from storage. Lists come back in ascending id
 * order; `updateMemory` is a single atomic compare-and-set on `updatedAt`.
 */
export interface MemoryStore {
  listMemories(spiritId: string, options?: ListMemoriesOptions): Promise<Memory[]>;
  /** Same filters and order as `listMemories`, without decoding the rows */
  listMemoryIds(spiritId: string, options?: ListMemoriesOptions): Promise<string[]>;
  getMemory(id: string): Promise<Memory | null>;
  updateMemory(
    id: string,
    patch: MemoryPatch,
    expectedUpdatedAt: number,
  ): Promise<UpdateResult>;
  insertMemory(input: NewMemory): Promise<Memory>;
  listSpiritIds(): Promise<string[]>;
}

// ── Validation shared by store implementations ──────────

export function parseMemoryState(value: unknown): MemoryState {
  const found = MEMORY_STATES.find((s) => s === value);
  if (!found) {
    throw new ValidationError("state", value, `must be one of ${MEMORY_STATES.join(", ")}`);
  }
  return found;
}

/** Reject a patch that would break a memory invariant. Never clamps. */
export function validatePatch(patch: MemoryPatch): void {
  if (patch.importance !== undefined) assertUnitInterval("importance", patch.importance);
  if (patch.confidence !== undefined) assertUnitInterval("confidence", patch.confidence);
  if (patch.recencyScore != null) assertUnitInterval("recencyScore", patch.recencyScore);
  if (patch.decayScore != null) assertUnitInterval("decayScore", patch.decayScore);
  if (patch.state !== undefined) parseMemoryState(patch.state);
  if (patch.timeStart != null) assertTimestamp("timeStart", patch.timeStart);
  if (patch.timeEnd != null) assertTimestamp("timeEnd", patch.timeEnd);
  if (patch.reinforcedAt != null) assertTimestamp("reinforcedAt", patch.reinforcedAt);
  if (patch.stateChangedAt != null) assertTimestamp("stateChangedAt", patch.stateChangedAt);
  if (patch.updatedAt !== undefined) assertTimestamp("updatedAt", patch.updatedAt);
}

export function validateNewMemory(input: NewMemory): void {
  if (!input.spiritId) {
    throw new ValidationError("spiritId", input.spiritId, "must not be empty");
  }
  assertUnitInterval("importance", input.importance);
  assertUnitInterval("confidence", input.confidence);
  assertTimestamp("createdAt", input.createdAt);
  if (input.timeStart != null) assertTimestamp("timeStart", input.timeStart);
  if (input.timeEnd != null) assertTimestamp("timeEnd", input.timeEnd);
}

/** Copy the defined fields of `patch` over `current`, stamping a new token. */
export function applyPatch(current: Memory, patch: MemoryPatch): Memory {
  const next: Memory = { ...current, meta: { ...current.meta } };
  if (patch.summary !== undefined) next.summary = patch.summary;
  if (patch.importance !== undefined) next.importance = patch.importance;
  if (patch.confidence !== undefined) next.confidence = patch.confidence;
  if (patch.state !== undefined) next.state = patch.state;
  if (patch.recencyScore !== undefined) next.recencyScore = patch.recencyScore;
  if (patch.decayScore !== undefined) next.decayScore = patch.decayScore;
  if (patch.timeStart !== undefined) next.timeStart = patch.timeStart;
  if (patch.timeEnd !== undefined) next.timeEnd = patch.timeEnd;
  if (patch.reinforcedAt !== undefined) next.reinforcedAt = patch.reinforcedAt;
  if (patch.stateChangedAt !== undefined) next.stateChangedAt = patch.stateChangedAt;
  if (patch.meta !== undefined) next.meta = { ...patch.meta };
  if (patch.isDeleted !== undefined) next.isDeleted = patch.isDeleted;
  next.updatedAt = nextUpdatedAt(current.updatedAt, patch.updatedAt);
  return next;
}

/** Next concurrency token: the requested time, but always past the old one. */
export function nextUpdatedAt(previous: number, requested: number | undefined): number {
  return Math.max(requested ?? previous + 1, previous + 1);
}
