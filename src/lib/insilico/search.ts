/**
 * Binding-site search.
 *
 * Slides a primer across the template and reports every window whose match
 * percentage reaches the report threshold. Windows are always read from the
 * '+' strand; a reverse primer is searched as its reverse complement, so
 * positions and amplicon arithmetic are the same for both strands.
 */

import { reverseComplement } from '../sequence.js';
import { DEFAULT_INSILICO_CONFIG, type InsilicoConfig } from './config.js';
import {
  analyzeBinding,
  calculateBindingTm,
  compareSequences,
  createAlignmentString,
  maxAllowedMismatches,
} from './binding.js';
import type { BindingSite, PrimerBinding, Strand } from '../../types/insilico.js';

interface SearchWindow {
  position: number;
  /** '+' strand template region */
  region: string;
}

/**
 * Sequence compared against the template: the primer itself on '+',
 * its reverse complement on '-'
 */
function searchSequence(primerSeq: string, strand: Strand): string {
  const primer = primerSeq.toUpperCase();
  return strand === '-' ? reverseComplement(primer) : primer;
}

/**
 * Template used for the scan; circular templates get their first
 * `primerLength - 1` bases appended so windows can span the origin.
 */
function searchTemplate(template: string, primerLength: number, circular: boolean): string {
  const upper = template.toUpperCase();
  if (!circular || primerLength < 2) return upper;
  return upper + upper.slice(0, primerLength - 1);
}

function* windows(primerLength: number, template: string, circular: boolean): Generator<SearchWindow> {
  if (primerLength === 0) return;
  const scanned = searchTemplate(template, primerLength, circular);

  for (let i = 0; i + primerLength <= scanned.length; i++) {
    yield { position: i, region: scanned.slice(i, i + primerLength) };
  }
}

/**
 * Find all potential binding sites for a primer on the template.
 *
 * @param primerSeq - Primer sequence (5'→3')
 * @param templateSeq - Template sequence ('+' strand, 5'→3')
 * @param primerName - Label copied into each binding
 * @param strand - '+' for forward, '-' for reverse
 * @param config - Resolved configuration
 * @returns Bindings at or above `reportThreshold`, best first
 */
export function findBindingSites(
  primerSeq: string,
  templateSeq: string,
  primerName: string,
  strand: Strand,
  config: Readonly<InsilicoConfig> = DEFAULT_INSILICO_CONFIG,
): PrimerBinding[] {
  const searchSeq = searchSequence(primerSeq, strand);
  const allowedMismatches = maxAllowedMismatches(searchSeq.length, config);
  const bindings: PrimerBinding[] = [];

  for (const { position, region } of windows(searchSeq.length, templateSeq, config.circular)) {
    const { matchPercent, mismatches, threePrimeMatch } = compareSequences(searchSeq, region);
    if (matchPercent < config.reportThreshold) continue;

    const isValid =
      matchPercent >= config.minTotalMatchPercent &&
      threePrimeMatch >= config.min3PrimeMatch &&
      mismatches <= allowedMismatches;

    bindings.push({
      primerName,
      primerSeq,
      strand,
      position,
      matchPercent,
      mismatches,
      threePrimeMatch,
      bindingTm: calculateBindingTm(searchSeq, region),
      isValid,
      alignment: createAlignmentString(searchSeq, region),
    });
  }

  // Best first; sort is stable so equal sites keep template order
  bindings.sort((a, b) =>
    b.matchPercent - a.matchPercent || b.threePrimeMatch - a.threePrimeMatch,
  );

  return bindings;
}

/**
 * Find all binding sites with full thermodynamic analysis.
 *
 * Same scan as {@link findBindingSites}; every reported window is run
 * through {@link analyzeBinding}. Sorted by match %, 3' run, then the most
 * stable 3' ΔG.
 */
export function findDetailedBindingSites(
  primerSeq: string,
  templateSeq: string,
  strand: Strand,
  config: Readonly<InsilicoConfig> = DEFAULT_INSILICO_CONFIG,
): BindingSite[] {
  const searchSeq = searchSequence(primerSeq, strand);
  const sites: BindingSite[] = [];

  for (const { position, region } of windows(searchSeq.length, templateSeq, config.circular)) {
    const { matchPercent } = compareSequences(searchSeq, region);
    if (matchPercent < config.reportThreshold) continue;
    sites.push({ ...analyzeBinding(searchSeq, region, position, strand, config), primerSeq });
  }

  sites.sort((a, b) =>
    b.matchPercent - a.matchPercent ||
    b.threePrimeMatch - a.threePrimeMatch ||
    a.threePrimeDg - b.threePrimeDg,
  );

  return sites;
}
