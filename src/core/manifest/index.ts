export {
  isApplicationManifest,
  getSingleSource,
  getSourceList,
  referencesChart,
} from './application.js';
export {
  loadApplicationFile,
  findApplicationInDir,
  resolveApplicationPath,
  type LocateOptions,
} from './locator.js';
export { updateTargetRevision, type RevisionUpdate } from './updater.js';
