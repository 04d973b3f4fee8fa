/**
 * In-silico PCR library - primer binding-site search and amplicon prediction
 *
 * Given a template and a primer pair, predicts where the primers bind and
 * which products amplification would yield.
 */

export * from './insilico/index.js';

export {
  reverseComplement,
  basesMatch,
  gcCount,
  IUPAC_CODES,
  IUPAC_COMPLEMENT,
} from './sequence.js';

export { InsilicoError, ConfigError } from './errors.js';

export type * from '../types/insilico.js';
