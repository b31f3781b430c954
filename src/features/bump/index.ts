export { executeBump } from './execute.js';
export {
  createWorkdir,
  cloneIntoWorkdir,
  prepareUpdates,
  writeUpdates,
  buildCommitMessage,
  stageAndCommit,
} from './steps.js';
export type {
  BumpExecutionOptions,
  BumpResult,
  PackageNotFoundResult,
  NoChangesResult,
  PushedResult,
  PreparedUpdate,
} from './types.js';
