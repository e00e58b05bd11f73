import type { Memory } from "../../src/memory/types.js";

export const DAY = 86_400_000;
export const NOW = Date.UTC(2025, 0, 1);

export function makeMemory(overrides: Partial<Memory> = {}): Memory {
  return {
    id: "m1",
    spiritId: "spirit-1",
    summary: "Discussed the garden layout",
    importance: 0.5,
    confidence: 0.5,
    state: "active",
    recencyScore: null,
    decayScore: null,
    timeStart: null,
    timeEnd: NOW,
    reinforcedAt: null,
    stateChangedAt: null,
    meta: {},
    isDeleted: false,
    createdAt: NOW - 400 * DAY,
    updatedAt: NOW - 400 * DAY,
    ...overrides,
  };
}
