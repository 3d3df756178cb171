// ============================================================================
// Drive Error Types
// ============================================================================

/**
 * Thrown when no usable Google credentials are configured, or a configured
 * credential cannot be parsed. Messages never include secret values.
 */
export class DriveCredentialsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DriveCredentialsError';
  }
}

/** Thrown when a Drive API call succeeds but its response lacks a required field. */
export class DriveApiError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DriveApiError';
  }
}
