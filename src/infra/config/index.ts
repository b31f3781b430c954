/**
 * Configuration - barrel exports
 */

export {
  INPUT_SPECS,
  envVarNamesFor,
  loadInputs,
  type InputOverrides,
  type EnvSource,
} from './inputs.js';
