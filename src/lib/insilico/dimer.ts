/**
 * Primer-dimer check between the forward and reverse primers.
 *
 * Independent of the template: it is a primer-quality signal and runs even
 * when neither primer binds.
 */

import { basesMatch, reverseComplement } from '../sequence.js';
import type { DimerRegion, DimerSeverity, PrimerDimerResult } from '../../types/insilico.js';

/**
 * Complementary-run thresholds (bp)
 */
export const PRIMER_DIMER_THRESHOLDS = {
  severe: { maxRun: 8, threePrime: 4 },
  moderate: { maxRun: 6, threePrime: 3 },
  low: { maxRun: 4 },
  threePrimeWindow: 6,
  maxRegions: 5,
} as const;

export interface PrimerDimerOptions {
  /** Shortest complementary run reported as a dimer region */
  minComplementary?: number;
}

/**
 * Classify dimer severity from the longest complementary run and the
 * 3' complementarity
 */
export function classifyPrimerDimer(maxComplementary: number, threePrimeComplementary: number): DimerSeverity {
  const { severe, moderate, low } = PRIMER_DIMER_THRESHOLDS;
  if (maxComplementary >= severe.maxRun || threePrimeComplementary >= severe.threePrime) return 'severe';
  if (maxComplementary >= moderate.maxRun || threePrimeComplementary >= moderate.threePrime) return 'moderate';
  if (maxComplementary >= low.maxRun) return 'low';
  return 'none';
}

const SEVERITY_LABEL: Record<Exclude<DimerSeverity, 'none'>, string> = {
  severe: 'Severe',
  moderate: 'Moderate',
  low: 'Low',
};

/**
 * Check for primer-dimer formation between forward and reverse primers.
 *
 * The forward primer slides over the reverse complement of the reverse
 * primer at every offset; runs of compatible positions are complementary
 * stretches between the two primers.
 *
 * @param forwardPrimer - Forward primer (5'→3')
 * @param reversePrimer - Reverse primer (5'→3')
 */
export function checkPrimerDimer(
  forwardPrimer: string,
  reversePrimer: string,
  options: PrimerDimerOptions = {},
): PrimerDimerResult {
  const { minComplementary = 4 } = options;

  const fwd = forwardPrimer.toUpperCase();
  const rev = reversePrimer.toUpperCase();
  const revRc = reverseComplement(rev);

  const dimerRegions: DimerRegion[] = [];
  let maxComplementary = 0;

  const closeRun = (start: number, length: number) => {
    if (length >= minComplementary) {
      dimerRegions.push({ fwdStart: start, fwdEnd: start + length, length });
    }
    maxComplementary = Math.max(maxComplementary, length);
  };

  for (let offset = -fwd.length + 1; offset < revRc.length; offset++) {
    let run = 0;
    let runStart = 0;

    for (let i = 0; i < fwd.length; i++) {
      const j = i + offset;
      if (j < 0 || j >= revRc.length) continue;

      if (basesMatch(fwd[i], revRc[j])) {
        if (run === 0) runStart = i;
        run++;
      } else {
        closeRun(runStart, run);
        run = 0;
      }
    }
    closeRun(runStart, run);
  }

  // 3' ends: last bases of the forward primer against the reverse primer's 3' tail
  const window = PRIMER_DIMER_THRESHOLDS.threePrimeWindow;
  const fwd3p = fwd.slice(-window);
  const rev3pRc = reverseComplement(rev.slice(-window));
  let threePrimeComplementary = 0;
  for (let i = 0; i < Math.min(fwd3p.length, rev3pRc.length); i++) {
    if (basesMatch(fwd3p[i], rev3pRc[i])) threePrimeComplementary++;
  }

  const severity = classifyPrimerDimer(maxComplementary, threePrimeComplementary);
  const warning = severity === 'none'
    ? null
    : `${SEVERITY_LABEL[severity]} primer-dimer risk: ${maxComplementary} consecutive complementary bases`;

  return {
    hasDimer: maxComplementary >= minComplementary,
    maxComplementary,
    threePrimeComplementary,
    dimerRegions: dimerRegions.slice(0, PRIMER_DIMER_THRESHOLDS.maxRegions),
    severity,
    warning,
  };
}
