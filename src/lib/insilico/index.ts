/**
 * In-silico PCR simulation
 *
 * Virtual PCR for amplicon prediction and primer validation.
 */

export { InsilicoPCR, runInsilicoPcr, MIN_TEMPLATE_LENGTH } from './engine.js';
export type { InsilicoLogger, InsilicoEngineOptions } from './engine.js';
export {
  DEFAULT_INSILICO_CONFIG,
  InsilicoConfigSchema,
  resolveConfig,
  configKey,
} from './config.js';
export type { InsilicoConfig, InsilicoConfigInput } from './config.js';
export { findBindingSites, findDetailedBindingSites } from './search.js';
export {
  analyzeBinding,
  compareSequences,
  countThreePrimeMatch,
  createAlignmentString,
  calculateThreePrimeDg,
  calculateBindingTm,
  calculateCorrectedTm,
  checkThreePrimeStability,
  maxAllowedMismatches,
  NN_STACK_DG,
} from './binding.js';
export {
  predictProducts,
  bindingScore,
  calculateLikelihood,
  estimateExtensionTime,
} from './products.js';
export { checkPrimerDimer, classifyPrimerDimer, PRIMER_DIMER_THRESHOLDS } from './dimer.js';
export type { PrimerDimerOptions } from './dimer.js';
export { createSimulationCache, simulationCacheKey, DEFAULT_CACHE_MAX_ENTRIES } from './cache.js';
export type {
  SimulationCache,
  SimulationCacheOptions,
  SimulationCacheState,
  SimulationCacheStats,
} from './cache.js';
