import type { ParamValue } from "../types/intent.js";

export interface FactVersion {
  v: number;
  value: ParamValue;
  at: string; // ISO timestamp
  step: number;
}

/** Versioned facts accumulated across the steps of one command. Plain data, JSON-safe. */
export type FactStore = Record<string, FactVersion[]>;

export function createFactStore(): FactStore {
  return {};
}

export function readFact(store: FactStore, key: string): ParamValue | undefined {
  const arr = Object.hasOwn(store, key) ? store[key] : undefined;
  return arr?.[arr.length - 1]?.value;
}

export function writeFact(store: FactStore, key: string, value: ParamValue, step: number): FactVersion {
  const arr = Object.hasOwn(store, key) ? store[key] : (store[key] = []);
  const rec = { v: (arr[arr.length - 1]?.v ?? 0) + 1, value, at: new Date().toISOString(), step };
  arr.push(rec);
  return rec;
}

/** Latest value of every fact. */
export function latestFacts(store: FactStore): Record<string, ParamValue> {
  const out: Record<string, ParamValue> = {};
  for (const key of Object.keys(store)) {
    const value = readFact(store, key);
    if (value !== undefined) out[key] = value;
  }
  return out;
}
