// ============================================================================
// Desktop Module — Barrel Export
// ============================================================================

export type { MoveOptions, MoveRecord } from './mover.js';
export { ensureCategoryFolders, isCandidate, resolveDestination, moveFiles } from './mover.js';
export { BaseDirectoryNotFoundError } from './errors.js';
