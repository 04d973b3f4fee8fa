/**
 * Core Type Definitions for In-silico PCR
 *
 * Value objects produced by the simulation engine. Every object is built
 * once and never mutated afterwards.
 */

import type { InsilicoConfig } from '../lib/insilico/config.js';

// ============================================================================
// Binding Types
// ============================================================================

export type Strand = '+' | '-';

export interface PrimerBinding {
  readonly primerName: string;
  readonly primerSeq: string;
  readonly strand: Strand;
  /** 0-indexed start on the template */
  readonly position: number;
  readonly matchPercent: number;
  readonly mismatches: number;
  /** Perfectly matched bases counted back from the primer's 3' end */
  readonly threePrimeMatch: number;
  readonly bindingTm: number;
  readonly isValid: boolean;
  /** One `|` or `x` per aligned base, 5'→3' of the primer */
  readonly alignment: string;
}

export interface BindingSite {
  readonly position: number;
  readonly strand: Strand;
  readonly primerSeq: string;
  /** '+' strand template window */
  readonly targetSeq: string;

  readonly matchCount: number;
  readonly mismatchCount: number;
  readonly matchPercent: number;

  readonly threePrimeMatch: number;
  readonly threePrimeDg: number;      // kcal/mol
  readonly fivePrimeMismatch: number;

  readonly bindingTm: number;         // °C
  readonly bindingDg: number;         // kcal/mol

  readonly isValid: boolean;
  readonly validationNotes: readonly string[];
  readonly alignment: string;
}

export type ThreePrimeStability = 'ok' | 'strong' | 'weak';

export interface StabilityCheck {
  status: ThreePrimeStability;
  warning: string | null;
}

export interface SequenceComparison {
  matchPercent: number;
  mismatches: number;
  threePrimeMatch: number;
}

// ============================================================================
// Product Types
// ============================================================================

export interface AmpliconPrediction {
  readonly forwardBinding: PrimerBinding;
  readonly reverseBinding: PrimerBinding;
  readonly productSize: number;
  readonly productSequence: string;
  readonly startPosition: number;
  readonly endPosition: number;
  /** 0-100 */
  readonly likelihoodScore: number;
  readonly isPrimary: boolean;
  readonly warnings: readonly string[];
  /** ~1 minute per kilobase */
  readonly extensionTimeSec: number;
}

// ============================================================================
// Primer-Dimer Types
// ============================================================================

export type DimerSeverity = 'none' | 'low' | 'moderate' | 'severe';

export interface DimerRegion {
  readonly fwdStart: number;
  readonly fwdEnd: number;
  readonly length: number;
}

export interface PrimerDimerResult {
  readonly hasDimer: boolean;
  readonly maxComplementary: number;
  readonly threePrimeComplementary: number;
  readonly dimerRegions: readonly DimerRegion[];
  readonly severity: DimerSeverity;
  readonly warning: string | null;
}

// ============================================================================
// Simulation Result
// ============================================================================

export interface InsilicoPCRResult {
  readonly success: boolean;
  readonly templateName: string;
  readonly templateLength: number;
  readonly forwardPrimer: string;
  readonly reversePrimer: string;
  readonly products: readonly AmpliconPrediction[];
  readonly allForwardBindings: readonly PrimerBinding[];
  readonly allReverseBindings: readonly PrimerBinding[];
  readonly config: Readonly<InsilicoConfig>;
  readonly warnings: readonly string[];
  readonly errors: readonly string[];
  readonly primerDimer: PrimerDimerResult | null;
}

export type SimulationStage =
  | 'validating'
  | 'searchingForward'
  | 'searchingReverse'
  | 'predictingProducts'
  | 'checkingDimer'
  | 'assembled';
