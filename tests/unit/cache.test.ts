import { describe, it, expect } from 'vitest';
import { createSimulationCache, simulationCacheKey } from '../../src/lib/insilico/cache.js';
import { DEFAULT_INSILICO_CONFIG, resolveConfig } from '../../src/lib/insilico/config.js';
import type { InsilicoPCRResult } from '../../src/types/insilico.js';

function result(templateName: string): InsilicoPCRResult {
  return {
    success: false,
    templateName,
    templateLength: 0,
    forwardPrimer: '',
    reversePrimer: '',
    products: [],
    allForwardBindings: [],
    allReverseBindings: [],
    config: DEFAULT_INSILICO_CONFIG,
    warnings: [],
    errors: [],
    primerDimer: null,
  };
}

describe('createSimulationCache', () => {
  it('stores and returns results while counting hits and misses', () => {
    const cache = createSimulationCache();
    const stored = result('a');

    expect(cache.get('a')).toBeUndefined();
    cache.set('a', stored);
    expect(cache.get('a')).toBe(stored);
    expect(cache.stats()).toEqual({ size: 1, hits: 1, misses: 1 });
  });

  it('evicts the least recently used entry', () => {
    const cache = createSimulationCache({ maxEntries: 2 });
    cache.set('a', result('a'));
    cache.set('b', result('b'));
    cache.get('a');
    cache.set('c', result('c'));

    expect(cache.get('b')).toBeUndefined();
    expect(cache.get('a')?.templateName).toBe('a');
    expect(cache.get('c')?.templateName).toBe('c');
    expect(cache.stats().size).toBe(2);
  });

  it('clears entries and counters', () => {
    const cache = createSimulationCache();
    cache.set('a', result('a'));
    cache.get('a');
    cache.clear();

    expect(cache.stats()).toEqual({ size: 0, hits: 0, misses: 0 });
  });

  it('notifies store subscribers', () => {
    const cache = createSimulationCache();
    const sizes: number[] = [];
    const unsubscribe = cache.store.subscribe(state => sizes.push(state.entries.size));

    cache.set('a', result('a'));
    cache.set('b', result('b'));
    unsubscribe();
    cache.set('c', result('c'));

    expect(sizes).toEqual([1, 2]);
  });

  it('keeps separate caches independent', () => {
    const first = createSimulationCache();
    const second = createSimulationCache();
    first.set('a', result('a'));

    expect(second.get('a')).toBeUndefined();
  });

  it('rejects a non-positive capacity', () => {
    expect(() => createSimulationCache({ maxEntries: 0 })).toThrow(RangeError);
  });
});

describe('simulationCacheKey', () => {
  it('depends on inputs and configuration', () => {
    const base = simulationCacheKey('ACGT', 'AC', 'GT', 't', DEFAULT_INSILICO_CONFIG);

    expect(simulationCacheKey('ACGT', 'AC', 'GT', 't', resolveConfig())).toBe(base);
    expect(simulationCacheKey('ACGT', 'AC', 'GT', 't', resolveConfig({ circular: true }))).not.toBe(base);
    expect(simulationCacheKey('ACGA', 'AC', 'GT', 't', DEFAULT_INSILICO_CONFIG)).not.toBe(base);
  });
});
