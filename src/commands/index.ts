/**
 * Command exports
 */

export { planCommand } from './plan.js';
export { applyCommand } from './apply.js';
export { refreshCommand } from './refresh.js';
export { destroyCommand } from './destroy.js';
export { statusCommand, type ResourceStatus, type StatusData } from './status.js';
export {
  lookupCommand,
  isLookupKind,
  LOOKUP_KINDS,
  type LookupKind,
  type LookupOptions,
  type LookupEntry,
} from './lookup.js';
