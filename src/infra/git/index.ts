/**
 * git integration - barrel exports
 */

export { buildAuthUrl, normalizeRepoUrl, TOKEN_USERNAME } from './auth.js';
export {
  BOT_IDENTITY,
  runGit,
  cloneRepository,
  configureIdentity,
  stageFiles,
  listStagedFiles,
  commitStaged,
  pushBranch,
  type GitIdentity,
  type CloneOptions,
} from './git.js';
