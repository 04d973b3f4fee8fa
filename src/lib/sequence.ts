/**
 * Sequence Utility Functions
 *
 * Reverse complement and IUPAC-aware base comparison for the in-silico
 * PCR engine.
 */

// =============================================================================
// Types and Interfaces
// =============================================================================

export interface IupacCodes {
  [key: string]: readonly string[];
}

export interface ComplementMap {
  [key: string]: string;
}

// =============================================================================
// Ambiguous Base Codes (IUPAC)
// =============================================================================

export const IUPAC_CODES: IupacCodes = {
  'A': ['A'],
  'T': ['T'],
  'G': ['G'],
  'C': ['C'],
  'R': ['A', 'G'],        // puRine
  'Y': ['C', 'T'],        // pYrimidine
  'S': ['G', 'C'],        // Strong
  'W': ['A', 'T'],        // Weak
  'K': ['G', 'T'],        // Keto
  'M': ['A', 'C'],        // aMino
  'B': ['C', 'G', 'T'],   // not A
  'D': ['A', 'G', 'T'],   // not C
  'H': ['A', 'C', 'T'],   // not G
  'V': ['A', 'C', 'G'],   // not T
  'N': ['A', 'C', 'G', 'T'],
};

export const IUPAC_COMPLEMENT: ComplementMap = {
  'A': 'T', 'T': 'A', 'G': 'C', 'C': 'G',
  'R': 'Y', 'Y': 'R', 'S': 'S', 'W': 'W',
  'K': 'M', 'M': 'K', 'B': 'V', 'V': 'B',
  'D': 'H', 'H': 'D', 'N': 'N',
};

/**
 * Check whether two bases can pair with the same concrete base.
 *
 * Identical symbols always match. Otherwise both symbols are expanded to
 * their IUPAC base sets and the sets must intersect, so `R` matches `A`
 * and `N` matches anything. A symbol outside the alphabet matches only
 * itself.
 */
export function basesMatch(b1: string, b2: string): boolean {
  const a = b1.toUpperCase();
  const b = b2.toUpperCase();
  if (a === b) return true;

  const setA = IUPAC_CODES[a];
  const setB = IUPAC_CODES[b];
  if (!setA || !setB) return false;

  return setA.some(base => setB.includes(base));
}

// =============================================================================
// Sequence Manipulation
// =============================================================================

/**
 * Get reverse complement of sequence.
 * Lowercase input stays lowercase; unknown symbols are kept as they are.
 */
export function reverseComplement(sequence: string): string {
  return sequence
    .split('')
    .reverse()
    .map(base => {
      const upper = base.toUpperCase();
      const comp = IUPAC_COMPLEMENT[upper];
      if (!comp) return base;
      return base === upper ? comp : comp.toLowerCase();
    })
    .join('');
}

/**
 * Count G and C symbols (case-insensitive)
 */
export function gcCount(sequence: string): number {
  return (sequence.toUpperCase().match(/[GC]/g) || []).length;
}
