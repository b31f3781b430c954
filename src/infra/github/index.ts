/**
 * GitHub integration - barrel exports
 */

export { announceSecret } from './actions.js';
