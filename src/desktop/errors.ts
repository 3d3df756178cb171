// ============================================================================
// Desktop Mover Error Types
// ============================================================================

/** Thrown when the folder to organize does not exist or is not a directory. */
export class BaseDirectoryNotFoundError extends Error {
  readonly baseDir: string;

  constructor(baseDir: string) {
    super(`Base path ${baseDir} does not exist or is not a directory`);
    this.name = 'BaseDirectoryNotFoundError';
    this.baseDir = baseDir;
  }
}
