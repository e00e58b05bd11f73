import type { Memory, MemoryPatch, NewMemory } from "../../src/memory/types.js";
import {
  applyPatch,
  validateNewMemory,
  validatePatch,
  type ListMemoriesOptions,
  type MemoryStore,
  type UpdateResult,
} from "../../src/memory/store.js";

/**
 * In-process MemoryStore for tests. `beforeUpdate` runs ahead of every
 * conditional write and can simulate a concurrent writer or an I/O failure.
 */
export class InMemoryStore implements MemoryStore {
  readonly rows = new Map<string, Memory>();
  beforeUpdate: ((id: string) => void) | null = null;

  constructor(memories: Memory[] = []) {
    for (const m of memories) this.rows.set(m.id, { ...m });
  }

  async listMemories(spiritId: string, options: ListMemoriesOptions = {}): Promise<Memory[]> {
    const result = [...this.rows.values()]
      .filter((m) => m.spiritId === spiritId)
      .filter((m) => options.includeDeleted || !m.isDeleted)
      .filter((m) => !options.states || options.states.includes(m.state))
      .filter((m) => options.afterId === undefined || m.id > options.afterId)
      .sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0))
      .map((m) => ({ ...m }));
    return options.limit === undefined ? result : result.slice(0, options.limit);
  }

  async listMemoryIds(spiritId: string, options: ListMemoriesOptions = {}): Promise<string[]> {
    return (await this.listMemories(spiritId, options)).map((m) => m.id);
  }

  async getMemory(id: string): Promise<Memory | null> {
    const row = this.rows.get(id);
    return row ? { ...row } : null;
  }

  async updateMemory(id: string, patch: MemoryPatch, expectedUpdatedAt: number): Promise<UpdateResult> {
    validatePatch(patch);
    this.beforeUpdate?.(id);

    const current = this.rows.get(id);
    if (!current) return { status: "not_found" };
    if (current.updatedAt !== expectedUpdatedAt) return { status: "conflict" };

    const next = applyPatch(current, patch);
    this.rows.set(id, next);
    return { status: "updated", memory: { ...next } };
  }

  async insertMemory(input: NewMemory): Promise<Memory> {
    validateNewMemory(input);
    const memory: Memory = {
      id: input.id ?? `mem-${this.rows.size + 1}`,
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
    this.rows.set(memory.id, memory);
    return { ...memory };
  }

  async listSpiritIds(): Promise<string[]> {
    return [...new Set([...this.rows.values()].filter((m) => !m.isDeleted).map((m) => m.spiritId))].sort();
  }

  /** Direct read for assertions. */
  row(id: string): Memory {
    const row = this.rows.get(id);
    if (!row) throw new Error(`no row ${id}`);
    return row;
  }
}
