/**
 * Binding Site Analysis
 *
 * Per-window binding quality for a primer aligned against a template region:
 * - IUPAC-aware match statistics
 * - 3' end stability (ΔG) over the terminal pentamer
 * - Binding Tm with position-weighted mismatch penalties
 * - Validation against the configured binding requirements
 *
 * The last character of the searched sequence is its 3' end; on the '-'
 * strand that sequence is the primer's reverse complement.
 */

import { basesMatch, gcCount } from '../sequence.js';
import { DEFAULT_INSILICO_CONFIG, type InsilicoConfig } from './config.js';
import type {
  BindingSite,
  SequenceComparison,
  StabilityCheck,
  Strand,
} from '../../types/insilico.js';

// Terminal region length used for 3' ΔG, 5' mismatch and Tm weighting
export const END_REGION_LENGTH = 5;

// Tm bounds (°C)
export const BINDING_TM_MIN = 30;
export const BINDING_TM_MAX = 90;

// Tm penalty per mismatch (°C); polymerase extends from the 3' end
export const TM_PENALTY_3PRIME_MISMATCH = 10;
export const TM_PENALTY_MISMATCH = 5;

// Dinucleotide stacking ΔG (kcal/mol), simplified
export const NN_STACK_DG: Readonly<Record<string, number>> = {
  'AA': -1.0, 'TT': -1.0,
  'AT': -0.9, 'TA': -0.6,
  'CA': -1.3, 'TG': -1.3,
  'GT': -1.4, 'AC': -1.4,
  'CT': -1.5, 'AG': -1.5,
  'GA': -1.4, 'TC': -1.4,
  'CG': -2.1,
  'GC': -2.4,
  'GG': -1.5, 'CC': -1.5,
};

const DEFAULT_STACK_DG = -1.0;
const TRUE_MISMATCH_PENALTY = 1.5;
const DEGENERATE_PENALTY = 0.5;

function round(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

/**
 * Upper-case both sequences and right-pad the shorter one with `N`
 */
export function padToSameLength(primer: string, target: string): [string, string] {
  const length = Math.max(primer.length, target.length);
  return [
    primer.toUpperCase().padEnd(length, 'N'),
    target.toUpperCase().padEnd(length, 'N'),
  ];
}

/**
 * Length of the perfectly matched run ending at the primer's 3' end
 */
export function countThreePrimeMatch(primer: string, target: string): number {
  let run = 0;
  for (let i = primer.length - 1; i >= 0; i--) {
    if (!basesMatch(primer[i], target[i])) break;
    run++;
  }
  return run;
}

/**
 * Match percentage, total mismatches and 3' run between primer and target.
 * Unequal lengths are right-padded with `N`.
 */
export function compareSequences(primerSeq: string, targetSeq: string): SequenceComparison {
  const [primer, target] = padToSameLength(primerSeq, targetSeq);
  if (primer.length === 0) {
    return { matchPercent: 0, mismatches: 0, threePrimeMatch: 0 };
  }

  let matches = 0;
  for (let i = 0; i < primer.length; i++) {
    if (basesMatch(primer[i], target[i])) matches++;
  }

  return {
    matchPercent: (matches / primer.length) * 100,
    mismatches: primer.length - matches,
    threePrimeMatch: countThreePrimeMatch(primer, target),
  };
}

/**
 * Visual alignment: `|` for a match, `x` for a mismatch
 */
export function createAlignmentString(primer: string, target: string): string {
  let alignment = '';
  const length = Math.min(primer.length, target.length);
  for (let i = 0; i < length; i++) {
    alignment += basesMatch(primer[i], target[i]) ? '|' : 'x';
  }
  return alignment;
}

/**
 * Calculate ΔG for the 3' end binding.
 *
 * Identical dinucleotides contribute their stacking energy. A dinucleotide
 * containing a true mismatch adds +1.5; one that only pairs through an
 * ambiguity code adds +0.5. The sum is scaled by a simplified Na+ factor.
 *
 * @param primer3p - 3' end of primer
 * @param target3p - Corresponding target region
 * @param naConc - Na+ concentration (mM)
 * @returns ΔG in kcal/mol (negative = stable), 2 decimals
 */
export function calculateThreePrimeDg(primer3p: string, target3p: string, naConc: number = 50): number {
  const [primer, target] = padToSameLength(primer3p, target3p);
  let totalDg = 0;

  for (let i = 0; i < primer.length - 1; i++) {
    const p1 = primer[i], p2 = primer[i + 1];
    const t1 = target[i], t2 = target[i + 1];

    if (p1 === t1 && p2 === t2) {
      totalDg += NN_STACK_DG[p1 + p2] ?? DEFAULT_STACK_DG;
    } else if (basesMatch(p1, t1) && basesMatch(p2, t2)) {
      totalDg += DEGENERATE_PENALTY;
    } else {
      totalDg += TRUE_MISMATCH_PENALTY;
    }
  }

  const saltFactor = 1 + 0.02 * (naConc / 50.0 - 1);
  return round(totalDg * saltFactor, 2);
}

/**
 * Approximate binding Tm.
 *
 * Starts from the %GC-linear estimate `64.9 + 41 × (GC − 16.4) / N` and
 * subtracts 10 °C per mismatch within the last 5 bases and 5 °C per other
 * mismatch. Clamped to [30, 90] °C.
 */
export function calculateBindingTm(primerSeq: string, targetSeq: string): number {
  const [primer, target] = padToSameLength(primerSeq, targetSeq);
  if (primer.length === 0) return BINDING_TM_MIN;

  const baseTm = 64.9 + (41 * (gcCount(primer) - 16.4)) / primer.length;

  let penalty = 0;
  for (let i = 0; i < primer.length; i++) {
    if (basesMatch(primer[i], target[i])) continue;
    const distFrom3Prime = primer.length - 1 - i;
    penalty += distFrom3Prime < END_REGION_LENGTH ? TM_PENALTY_3PRIME_MISMATCH : TM_PENALTY_MISMATCH;
  }

  const tm = Math.max(BINDING_TM_MIN, Math.min(BINDING_TM_MAX, baseTm - penalty));
  return round(tm, 1);
}

/**
 * Correct Tm by a flat amount per mismatch.
 *
 * @returns Corrected Tm in °C (floor at 30 °C)
 */
export function calculateCorrectedTm(
  baseTm: number,
  mismatches: number,
  correctionPerMismatch: number = 1.0,
): number {
  const corrected = baseTm - mismatches * correctionPerMismatch;
  return Math.max(round(corrected, 1), BINDING_TM_MIN);
}

/**
 * Check if the 3' end is too stable or too weak.
 *
 * A very stable 3' end may reduce specificity; a weak one may amplify poorly.
 */
export function checkThreePrimeStability(
  threePrimeDg: number,
  thresholdStrong: number = -9.0,
  thresholdWeak: number = -3.0,
): StabilityCheck {
  if (threePrimeDg < thresholdStrong) {
    return {
      status: 'strong',
      warning: `3' end may be too stable (ΔG=${threePrimeDg.toFixed(1)} kcal/mol). Consider redesign for better specificity.`,
    };
  }
  if (threePrimeDg > thresholdWeak) {
    return {
      status: 'weak',
      warning: `3' end may be too weak (ΔG=${threePrimeDg.toFixed(1)} kcal/mol). May result in poor amplification.`,
    };
  }
  return { status: 'ok', warning: null };
}

/**
 * Highest mismatch count a binding may carry and still be valid
 */
export function maxAllowedMismatches(primerLength: number, config: Readonly<InsilicoConfig>): number {
  return primerLength - config.min3PrimeMatch + config.max5PrimeMismatch;
}

/**
 * Perform detailed binding site analysis.
 *
 * @param primerSeq - Searched sequence (5'→3'); the reverse complement on '-'
 * @param targetSeq - '+' strand template window
 * @param position - Position on template
 * @param strand - '+' or '-'
 * @param config - Resolved configuration
 */
export function analyzeBinding(
  primerSeq: string,
  targetSeq: string,
  position: number,
  strand: Strand,
  config: Readonly<InsilicoConfig> = DEFAULT_INSILICO_CONFIG,
): BindingSite {
  const [primer, target] = padToSameLength(primerSeq, targetSeq);
  const { matchPercent, mismatches, threePrimeMatch } = compareSequences(primer, target);
  const matchCount = primer.length - mismatches;

  const endLength = Math.min(END_REGION_LENGTH, primer.length);
  const threePrimeDg = calculateThreePrimeDg(
    primer.slice(primer.length - endLength),
    target.slice(target.length - endLength),
    config.naConc,
  );

  let fivePrimeMismatch = 0;
  for (let i = 0; i < endLength; i++) {
    if (!basesMatch(primer[i], target[i])) fivePrimeMismatch++;
  }

  const bindingTm = calculateBindingTm(primer, target);
  const bindingDg = round(-1.5 * matchCount + 1.0 * mismatches, 2);

  const validationNotes: string[] = [];
  let isValid = true;

  if (threePrimeMatch < config.min3PrimeMatch) {
    isValid = false;
    validationNotes.push(`3' match (${threePrimeMatch}bp) < required (${config.min3PrimeMatch}bp)`);
  }

  if (matchPercent < config.minTotalMatchPercent) {
    isValid = false;
    validationNotes.push(`Match (${matchPercent.toFixed(1)}%) < required (${config.minTotalMatchPercent}%)`);
  }

  const allowed = maxAllowedMismatches(primer.length, config);
  if (mismatches > allowed) {
    isValid = false;
    validationNotes.push(`Mismatches (${mismatches}) > allowed (${allowed})`);
  }

  // Advisory only
  if (fivePrimeMismatch > config.max5PrimeMismatch) {
    validationNotes.push(`5' mismatches (${fivePrimeMismatch}) > allowed (${config.max5PrimeMismatch})`);
  }
  if (threePrimeDg > config.threePrimeDgMax) {
    validationNotes.push(`3' ΔG (${threePrimeDg}) > max (${config.threePrimeDgMax})`);
  }
  const stability = checkThreePrimeStability(
    threePrimeDg,
    config.threePrimeDgStrong,
    config.threePrimeDgWeak,
  );
  if (stability.warning) {
    validationNotes.push(stability.warning);
  }

  if (isValid) {
    validationNotes.push('All requirements met');
  }

  return {
    position,
    strand,
    primerSeq,
    targetSeq,
    matchCount,
    mismatchCount: mismatches,
    matchPercent,
    threePrimeMatch,
    threePrimeDg,
    fivePrimeMismatch,
    bindingTm,
    bindingDg,
    isValid,
    validationNotes,
    alignment: createAlignmentString(primer, target),
  };
}
