import { describe, it, expect } from 'vitest';
import { checkPrimerDimer, classifyPrimerDimer } from '../../src/lib/insilico/dimer.js';
import { FORWARD_80, REVERSE_200 } from '../fixtures/templates.js';

describe('classifyPrimerDimer', () => {
  it('maps run lengths to severity', () => {
    expect(classifyPrimerDimer(3, 2)).toBe('none');
    expect(classifyPrimerDimer(4, 0)).toBe('low');
    expect(classifyPrimerDimer(5, 2)).toBe('low');
    expect(classifyPrimerDimer(6, 0)).toBe('moderate');
    expect(classifyPrimerDimer(3, 3)).toBe('moderate');
    expect(classifyPrimerDimer(8, 0)).toBe('severe');
    expect(classifyPrimerDimer(0, 4)).toBe('severe');
  });
});

describe('checkPrimerDimer', () => {
  it('reports no risk for non-complementary primers', () => {
    expect(checkPrimerDimer('AAAAAAAAAA', 'AAAAAAAAAA')).toEqual({
      hasDimer: false,
      maxComplementary: 0,
      threePrimeComplementary: 0,
      dimerRegions: [],
      severity: 'none',
      warning: null,
    });
  });

  it('flags self-complementary primers as severe', () => {
    const result = checkPrimerDimer('GAATTCGAATTC', 'GAATTCGAATTC');

    expect(result.hasDimer).toBe(true);
    expect(result.maxComplementary).toBe(12);
    expect(result.threePrimeComplementary).toBe(6);
    expect(result.severity).toBe('severe');
    expect(result.warning).toBe('Severe primer-dimer risk: 12 consecutive complementary bases');
    expect(result.dimerRegions).toEqual([
      { fwdStart: 6, fwdEnd: 12, length: 6 },
      { fwdStart: 0, fwdEnd: 12, length: 12 },
      { fwdStart: 0, fwdEnd: 6, length: 6 },
    ]);
  });

  it('detects a fully complementary reverse primer', () => {
    const result = checkPrimerDimer('ACGTACGTAAGG', 'CCTTACGTACGT');

    expect(result.maxComplementary).toBe(12);
    expect(result.threePrimeComplementary).toBe(0);
    expect(result.severity).toBe('severe');
  });

  it('weighs 3\' complementarity on its own', () => {
    const result = checkPrimerDimer(FORWARD_80, REVERSE_200);

    expect(result.maxComplementary).toBe(3);
    expect(result.threePrimeComplementary).toBe(3);
    expect(result.severity).toBe('moderate');
    expect(result.warning).toBe('Moderate primer-dimer risk: 3 consecutive complementary bases');
  });

  it('uses minComplementary only for region reporting', () => {
    const result = checkPrimerDimer('GAATTCGAATTC', 'GAATTCGAATTC', { minComplementary: 13 });

    expect(result.hasDimer).toBe(false);
    expect(result.dimerRegions).toEqual([]);
    expect(result.severity).toBe('severe');
  });
});
