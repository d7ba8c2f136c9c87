/**
 * Build matrix: configurations and their derived names
 */

export {
  BuildConfiguration,
  NAME_DELIMITER,
  BUILD_DIR_PREFIX,
  RESULT_FILE_PREFIX,
  RESULT_FILE_EXTENSION,
  UNIVERSAL_BENCHMARK_FLAG,
  nameComponentProblem,
} from './build-configuration.js';
export { generateMatrix, type ConfigurationMatrix } from './generator.js';
