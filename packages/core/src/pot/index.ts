/**
 * Template System - string extraction and .pot writing
 */

export { PotWriter, POT_HEADER, POT_CREATION_DATE, formatPotEntry } from './writer.js';

export {
  ConfigStringExtractor,
  extractStrings,
  consoleAdvisorySink,
  isPresent,
  toPotText,
  type EntryTarget,
} from './extractor.js';
