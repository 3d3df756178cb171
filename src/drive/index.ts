// ============================================================================
// Drive Module — Barrel Export
// ============================================================================

export { getDriveClient, resetDriveClient, loadTokenFile, DRIVE_SCOPE } from './drive-client.js';
export type { DriveClient } from './drive-client.js';

export {
  FOLDER_MIME_TYPE,
  ROOT_FOLDER_ID,
  escapeDriveQuery,
  findFolder,
  createFolder,
  findOrCreateFolder,
} from './folders.js';

export {
  resolveCategoryFolders,
  listRootItems,
  moveItemToFolder,
  organizeDrive,
} from './organizer.js';
export type { DriveItem, DriveMoveRecord, OrganizeDriveOptions } from './organizer.js';

export { DriveCredentialsError, DriveApiError } from './errors.js';
