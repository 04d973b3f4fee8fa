/**
 * Amplicon prediction from forward and reverse binding sites
 */

import { DEFAULT_INSILICO_CONFIG, type InsilicoConfig } from './config.js';
import type { AmpliconPrediction, PrimerBinding } from '../../types/insilico.js';

// Extension rate: ~1 minute per kilobase
export const EXTENSION_SEC_PER_KB = 60;

/**
 * Binding quality of one primer; 3' run capped at 10 bp
 */
export function bindingScore(binding: PrimerBinding): number {
  return binding.matchPercent * 0.7 + Math.min(10, binding.threePrimeMatch) * 3;
}

/**
 * Likelihood (0-100) that a forward/reverse pair yields a product
 */
export function calculateLikelihood(forward: PrimerBinding, reverse: PrimerBinding): number {
  const likelihood = (bindingScore(forward) + bindingScore(reverse)) / 2;
  return Math.max(0, Math.min(100, likelihood));
}

/**
 * Estimated extension time in seconds
 */
export function estimateExtensionTime(productSize: number): number {
  return (productSize / 1000) * EXTENSION_SEC_PER_KB;
}

/**
 * Predict PCR products from forward and reverse binding sites.
 *
 * A product requires a valid forward binding on '+' and a valid reverse
 * binding on '-' spanning a size within `[productSizeMin, productSizeMax]`.
 * Invalid bindings never pair, however high their match percentage.
 *
 * @returns Predictions sorted by likelihood; the first is primary; at most `maxProducts`
 */
export function predictProducts(
  forwardBindings: readonly PrimerBinding[],
  reverseBindings: readonly PrimerBinding[],
  templateSeq: string,
  config: Readonly<InsilicoConfig> = DEFAULT_INSILICO_CONFIG,
): AmpliconPrediction[] {
  const validForward = forwardBindings.filter(b => b.isValid);
  const validReverse = reverseBindings.filter(b => b.isValid);
  const candidates: Omit<AmpliconPrediction, 'isPrimary'>[] = [];

  for (const fwd of validForward) {
    for (const rev of validReverse) {
      // Product spans from the forward 5' end to the reverse 5' end
      const start = fwd.position;
      const end = rev.position + rev.primerSeq.length;
      const productSize = end - start;

      if (productSize < config.productSizeMin || productSize > config.productSizeMax) {
        continue;
      }

      const warnings: string[] = [];
      if (productSize > config.maxAmpliconForExtension) {
        warnings.push(`Long amplicon (${productSize}bp) may need extended extension time`);
      }

      candidates.push({
        forwardBinding: fwd,
        reverseBinding: rev,
        productSize,
        productSequence: templateSeq.slice(start, end),
        startPosition: start,
        endPosition: end,
        likelihoodScore: calculateLikelihood(fwd, rev),
        warnings,
        extensionTimeSec: estimateExtensionTime(productSize),
      });
    }
  }

  candidates.sort((a, b) => b.likelihoodScore - a.likelihoodScore);

  return candidates
    .slice(0, config.maxProducts)
    .map((candidate, index) => ({ ...candidate, isPrimary: index === 0 }));
}
