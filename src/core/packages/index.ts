export { parsePackageIndex, loadPackageIndex, findPackage } from './packageIndex.js';
export {
  ENVIRONMENT_PLACEHOLDER,
  hasPlaceholder,
  substituteEnvironment,
  parseEnvironmentList,
  resolveTargets,
  type EnvironmentContext,
} from './targets.js';
