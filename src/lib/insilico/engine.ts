/**
 * Virtual PCR Engine
 *
 * Simulates primer binding and amplicon prediction on a single template.
 * Each run is a pure function of its inputs and the configuration captured
 * at construction.
 */

import { resolveConfig, type InsilicoConfig, type InsilicoConfigInput } from './config.js';
import { findBindingSites } from './search.js';
import { predictProducts } from './products.js';
import { checkPrimerDimer } from './dimer.js';
import { simulationCacheKey, type SimulationCache } from './cache.js';
import type {
  AmpliconPrediction,
  InsilicoPCRResult,
  PrimerBinding,
  PrimerDimerResult,
  SimulationStage,
} from '../../types/insilico.js';

export const MIN_TEMPLATE_LENGTH = 50;

export interface InsilicoLogger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
}

export interface InsilicoEngineOptions {
  logger?: InsilicoLogger;
  cache?: SimulationCache;
}

/**
 * In-silico PCR simulation engine.
 *
 * @example
 * const engine = new InsilicoPCR({ productSizeMax: 2000 });
 * const result = engine.run(template, 'ATGAGTAAAGGAGAAGAACT', 'CAGCAGTTACAAACTCAAGA', 'GFP');
 * if (result.success) console.log(result.products[0].productSize);
 */
export class InsilicoPCR {
  readonly config: Readonly<InsilicoConfig>;
  private readonly logger: InsilicoLogger;
  private readonly cache: SimulationCache | undefined;

  /**
   * @param config - Overrides merged with the defaults; unknown keys throw `ConfigError`
   */
  constructor(config: InsilicoConfigInput = {}, options: InsilicoEngineOptions = {}) {
    this.config = resolveConfig(config);
    this.logger = options.logger ?? console;
    this.cache = options.cache;
  }

  /**
   * Run in-silico PCR simulation.
   *
   * @param template - Template sequence ('+' strand, 5'→3')
   * @param forwardPrimer - Forward primer (5'→3')
   * @param reversePrimer - Reverse primer (5'→3')
   * @param templateName - Label echoed into the result
   */
  run(
    template: string,
    forwardPrimer: string,
    reversePrimer: string,
    templateName: string = 'template',
  ): InsilicoPCRResult {
    const cache = this.cache;
    if (!cache) {
      return this.simulate(template, forwardPrimer, reversePrimer, templateName);
    }

    const key = simulationCacheKey(template, forwardPrimer, reversePrimer, templateName, this.config);
    const cached = cache.get(key);
    if (cached) {
      this.logger.debug(`[insilico] Cache hit for ${templateName}`);
      return cached;
    }

    const result = this.simulate(template, forwardPrimer, reversePrimer, templateName);
    cache.set(key, result);
    return result;
  }

  private simulate(
    template: string,
    forwardPrimer: string,
    reversePrimer: string,
    templateName: string,
  ): InsilicoPCRResult {
    this.logger.info(`[insilico] Running in-silico PCR on ${templateName}`);

    const warnings: string[] = [];
    const errors: string[] = [];
    let stage: SimulationStage = 'validating';
    this.logger.debug(`[insilico] ${stage}: template ${template.length}bp`);

    if (template.length < MIN_TEMPLATE_LENGTH) {
      errors.push(`Template sequence too short (< ${MIN_TEMPLATE_LENGTH}bp)`);
      this.logger.warn(`[insilico] ${templateName}: ${errors[0]}`);
      return this.assemble({
        success: false,
        template,
        templateName,
        forwardPrimer,
        reversePrimer,
        products: [],
        forwardBindings: [],
        reverseBindings: [],
        warnings,
        errors,
        primerDimer: null,
      });
    }

    stage = 'searchingForward';
    this.logger.debug(`[insilico] ${stage}: finding forward primer binding sites...`);
    const forwardBindings = findBindingSites(forwardPrimer, template, 'Forward', '+', this.config);
    this.reportBindings('forward', forwardBindings, warnings);

    stage = 'searchingReverse';
    this.logger.debug(`[insilico] ${stage}: finding reverse primer binding sites...`);
    const reverseBindings = findBindingSites(reversePrimer, template, 'Reverse', '-', this.config);
    this.reportBindings('reverse', reverseBindings, warnings);

    stage = 'predictingProducts';
    this.logger.debug(`[insilico] ${stage}`);
    const products = predictProducts(forwardBindings, reverseBindings, template, this.config);

    stage = 'checkingDimer';
    this.logger.debug(`[insilico] ${stage}`);
    const primerDimer = checkPrimerDimer(forwardPrimer, reversePrimer);
    if (primerDimer.warning) {
      warnings.push(primerDimer.warning);
    }

    if (products.length === 0) {
      warnings.push('No valid products predicted');
    } else {
      this.logger.info(`[insilico] Predicted ${products.length} products`);
      if (products.length > 1) {
        warnings.push(`Multiple products (${products.length}) - potential non-specific amplification`);
      }
    }

    stage = 'assembled';
    this.logger.debug(`[insilico] ${stage}`);
    return this.assemble({
      success: products.length > 0 && errors.length === 0,
      template,
      templateName,
      forwardPrimer,
      reversePrimer,
      products,
      forwardBindings,
      reverseBindings,
      warnings,
      errors,
      primerDimer,
    });
  }

  private reportBindings(label: 'forward' | 'reverse', bindings: readonly PrimerBinding[], warnings: string[]): void {
    if (bindings.length === 0) {
      warnings.push(`No ${label} primer binding sites found`);
      return;
    }
    const valid = bindings.filter(b => b.isValid).length;
    this.logger.info(`[insilico] Found ${bindings.length} ${label} binding sites (${valid} valid)`);
  }

  private assemble(parts: {
    success: boolean;
    template: string;
    templateName: string;
    forwardPrimer: string;
    reversePrimer: string;
    products: AmpliconPrediction[];
    forwardBindings: PrimerBinding[];
    reverseBindings: PrimerBinding[];
    warnings: string[];
    errors: string[];
    primerDimer: PrimerDimerResult | null;
  }): InsilicoPCRResult {
    return Object.freeze({
      success: parts.success,
      templateName: parts.templateName,
      templateLength: parts.template.length,
      forwardPrimer: parts.forwardPrimer,
      reversePrimer: parts.reversePrimer,
      products: Object.freeze(parts.products),
      allForwardBindings: Object.freeze(parts.forwardBindings),
      allReverseBindings: Object.freeze(parts.reverseBindings),
      config: this.config,
      warnings: Object.freeze(parts.warnings),
      errors: Object.freeze(parts.errors),
      primerDimer: parts.primerDimer,
    });
  }
}

/**
 * Convenience function to run in-silico PCR with a one-off engine
 */
export function runInsilicoPcr(
  template: string,
  forwardPrimer: string,
  reversePrimer: string,
  templateName: string = 'template',
  config: InsilicoConfigInput = {},
  options: InsilicoEngineOptions = {},
): InsilicoPCRResult {
  return new InsilicoPCR(config, options).run(template, forwardPrimer, reversePrimer, templateName);
}
