import { describe, it, expect } from 'vitest';
import {
  bindingScore,
  calculateLikelihood,
  estimateExtensionTime,
  predictProducts,
} from '../../src/lib/insilico/products.js';
import { resolveConfig } from '../../src/lib/insilico/config.js';
import type { PrimerBinding } from '../../src/types/insilico.js';
import { TEMPLATE_200 } from '../fixtures/templates.js';

const PRIMER_20 = 'ACGTACGTACGTACGTACGT';

function binding(overrides: Partial<PrimerBinding>): PrimerBinding {
  return {
    primerName: 'Forward',
    primerSeq: PRIMER_20,
    strand: '+',
    position: 0,
    matchPercent: 100,
    mismatches: 0,
    threePrimeMatch: 20,
    bindingTm: 60,
    isValid: true,
    alignment: '|'.repeat(20),
    ...overrides,
  };
}

const reverseAt = (position: number, overrides: Partial<PrimerBinding> = {}) =>
  binding({ primerName: 'Reverse', strand: '-', position, ...overrides });

describe('scoring', () => {
  it('caps the 3\' run contribution at 10 bp', () => {
    expect(bindingScore(binding({ threePrimeMatch: 20 }))).toBe(100);
    expect(bindingScore(binding({ threePrimeMatch: 10 }))).toBe(100);
    expect(bindingScore(binding({ threePrimeMatch: 5 }))).toBe(85);
  });

  it('averages both sides and clamps to 100', () => {
    expect(calculateLikelihood(binding({}), reverseAt(100))).toBe(100);
    expect(calculateLikelihood(binding({}), reverseAt(100, { matchPercent: 90, threePrimeMatch: 5 })))
      .toBeCloseTo(89, 10);
  });

  it('estimates one minute per kilobase', () => {
    expect(estimateExtensionTime(1000)).toBe(60);
    expect(estimateExtensionTime(500)).toBe(30);
  });
});

describe('predictProducts', () => {
  it('pairs a forward and reverse binding into one product', () => {
    const products = predictProducts([binding({})], [reverseAt(100)], TEMPLATE_200);

    expect(products).toHaveLength(1);
    expect(products[0]).toMatchObject({
      productSize: 120,
      startPosition: 0,
      endPosition: 120,
      productSequence: TEMPLATE_200.slice(0, 120),
      likelihoodScore: 100,
      isPrimary: true,
      warnings: [],
    });
    expect(products[0].extensionTimeSec).toBeCloseTo(7.2, 10);
  });

  it('discards products above productSizeMax', () => {
    const config = resolveConfig({ productSizeMax: 100 });
    expect(predictProducts([binding({})], [reverseAt(100)], TEMPLATE_200, config)).toEqual([]);
  });

  it('applies an inclusive size window', () => {
    // end = position + 20
    const atMin = predictProducts([binding({})], [reverseAt(30)], TEMPLATE_200);
    expect(atMin.map(p => p.productSize)).toEqual([50]);

    expect(predictProducts([binding({})], [reverseAt(29)], TEMPLATE_200)).toEqual([]);
  });

  it('ignores reverse sites upstream of the forward site', () => {
    expect(predictProducts([binding({ position: 150 })], [reverseAt(10)], TEMPLATE_200)).toEqual([]);
  });

  it('never pairs invalid bindings', () => {
    expect(predictProducts([binding({ isValid: false })], [reverseAt(100)], TEMPLATE_200)).toEqual([]);
    expect(predictProducts([binding({})], [reverseAt(100, { isValid: false })], TEMPLATE_200)).toEqual([]);
  });

  it('warns about long amplicons', () => {
    const [product] = predictProducts([binding({})], [reverseAt(3500)], TEMPLATE_200);

    expect(product.productSize).toBe(3520);
    expect(product.warnings).toEqual(['Long amplicon (3520bp) may need extended extension time']);
    expect(product.extensionTimeSec).toBeCloseTo(211.2, 10);
  });

  it('marks exactly one primary product, the most likely one', () => {
    const forwards = [
      binding({ position: 0, matchPercent: 90, threePrimeMatch: 4 }),
      binding({ position: 10, matchPercent: 100, threePrimeMatch: 20 }),
      binding({ position: 20, matchPercent: 95, threePrimeMatch: 8 }),
    ];
    const products = predictProducts(forwards, [reverseAt(150)], TEMPLATE_200);

    expect(products.map(p => p.startPosition)).toEqual([10, 20, 0]);
    expect(products.filter(p => p.isPrimary)).toHaveLength(1);
    expect(products[0].isPrimary).toBe(true);
    const best = Math.max(...products.map(p => p.likelihoodScore));
    expect(products[0].likelihoodScore).toBe(best);
  });

  it('keeps the first-sorted product primary on ties', () => {
    const products = predictProducts(
      [binding({ position: 0 }), binding({ position: 5 })],
      [reverseAt(150)],
      TEMPLATE_200,
    );

    expect(products.map(p => [p.startPosition, p.isPrimary])).toEqual([
      [0, true],
      [5, false],
    ]);
  });

  it('truncates to maxProducts', () => {
    const forwards = [0, 5, 10, 15].map(position => binding({ position }));
    const config = resolveConfig({ maxProducts: 2 });
    const products = predictProducts(forwards, [reverseAt(150)], TEMPLATE_200, config);

    expect(products).toHaveLength(2);
    expect(products.map(p => p.startPosition)).toEqual([0, 5]);
  });

  it('does not mutate the input bindings', () => {
    const fwd = Object.freeze(binding({}));
    const rev = Object.freeze(reverseAt(100));
    const [product] = predictProducts([fwd], [rev], TEMPLATE_200);

    expect(product.forwardBinding).toBe(fwd);
    expect(product.reverseBinding).toBe(rev);
  });
});
