/**
 * Simulation Cache - Zustand vanilla store holding finished results
 *
 * The engine never creates one on its own; callers that reuse an engine
 * across many templates inject a cache explicitly, so separate test runs
 * never share state.
 */

import { createStore, type StoreApi } from 'zustand/vanilla';
import { configKey, type InsilicoConfig } from './config.js';
import type { InsilicoPCRResult } from '../../types/insilico.js';

export interface SimulationCacheState {
  /** Insertion order doubles as recency order (oldest first) */
  entries: ReadonlyMap<string, InsilicoPCRResult>;
  hits: number;
  misses: number;
}

export interface SimulationCacheStats {
  size: number;
  hits: number;
  misses: number;
}

export interface SimulationCache {
  get(key: string): InsilicoPCRResult | undefined;
  set(key: string, result: InsilicoPCRResult): void;
  clear(): void;
  stats(): SimulationCacheStats;
  readonly store: StoreApi<SimulationCacheState>;
}

export interface SimulationCacheOptions {
  maxEntries?: number;
}

export const DEFAULT_CACHE_MAX_ENTRIES = 128;

/**
 * Key for one simulation: the inputs plus the resolved configuration
 */
export function simulationCacheKey(
  template: string,
  forwardPrimer: string,
  reversePrimer: string,
  templateName: string,
  config: Readonly<InsilicoConfig>,
): string {
  return JSON.stringify([template, forwardPrimer, reversePrimer, templateName, configKey(config)]);
}

function withEntry(
  entries: ReadonlyMap<string, InsilicoPCRResult>,
  key: string,
  result: InsilicoPCRResult,
  maxEntries: number,
): Map<string, InsilicoPCRResult> {
  const next = new Map(entries);
  next.delete(key);
  next.set(key, result);
  for (const oldest of next.keys()) {
    if (next.size <= maxEntries) break;
    next.delete(oldest);
  }
  return next;
}

/**
 * Create a least-recently-used result cache
 */
export function createSimulationCache(options: SimulationCacheOptions = {}): SimulationCache {
  const { maxEntries = DEFAULT_CACHE_MAX_ENTRIES } = options;
  if (!Number.isInteger(maxEntries) || maxEntries < 1) {
    throw new RangeError(`maxEntries must be a positive integer, got ${maxEntries}`);
  }

  const store = createStore<SimulationCacheState>()(() => ({
    entries: new Map(),
    hits: 0,
    misses: 0,
  }));

  return {
    store,

    get(key) {
      const state = store.getState();
      const result = state.entries.get(key);
      if (result === undefined) {
        store.setState({ misses: state.misses + 1 });
        return undefined;
      }
      store.setState({
        entries: withEntry(state.entries, key, result, maxEntries),
        hits: state.hits + 1,
      });
      return result;
    },

    set(key, result) {
      store.setState(state => ({ entries: withEntry(state.entries, key, result, maxEntries) }));
    },

    clear() {
      store.setState({ entries: new Map(), hits: 0, misses: 0 });
    },

    stats() {
      const { entries, hits, misses } = store.getState();
      return { size: entries.size, hits, misses };
    },
  };
}
