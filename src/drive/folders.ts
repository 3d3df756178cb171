/**
 * Google Drive Folder Operations
 *
 * - escapeDriveQuery: escape string literals for Drive API queries
 * - findFolder: search for a folder by name within a parent
 * - createFolder: create a new folder within a parent
 * - findOrCreateFolder: idempotent folder resolution
 *
 * Parents default to 'root', the alias for the user's My Drive.
 * All functions take the DriveClient as a parameter for testability.
 */

import type { DriveClient } from './drive-client.js';
import { DriveApiError } from './errors.js';

export const FOLDER_MIME_TYPE = 'application/vnd.google-apps.folder';
export const ROOT_FOLDER_ID = 'root';

/**
 * Escapes backslashes and single quotes in Drive API query strings.
 * The Drive API uses single quotes for string literals in queries.
 */
export function escapeDriveQuery(str: string): string {
  return str.replace(/\\/g, '\\\\').replace(/'/g, "\\'");
}

/**
 * Finds a folder by exact name within a parent folder.
 *
 * @returns Folder ID if found, null otherwise
 */
export async function findFolder(
  drive: DriveClient,
  name: string,
  parentId: string = ROOT_FOLDER_ID,
): Promise<string | null> {
  const query =
    `name = '${escapeDriveQuery(name)}' and '${escapeDriveQuery(parentId)}' in parents ` +
    `and mimeType = '${FOLDER_MIME_TYPE}' and trashed = false`;

  const response = await drive.files.list({
    q: query,
    fields: 'files(id, name)',
    pageSize: 1,
  });

  const files = response.data.files;
  if (files && files.length > 0 && files[0].id) {
    return files[0].id;
  }

  return null;
}

/**
 * Creates a new folder within a parent folder.
 *
 * @returns The created folder's Drive ID
 */
export async function createFolder(
  drive: DriveClient,
  name: string,
  parentId: string = ROOT_FOLDER_ID,
): Promise<string> {
  const response = await drive.files.create({
    requestBody: {
      name,
      mimeType: FOLDER_MIME_TYPE,
      parents: [parentId],
    },
    fields: 'id',
  });

  const folderId = response.data.id;
  if (!folderId) {
    throw new DriveApiError(`Drive API returned no ID after creating folder "${name}"`);
  }

  return folderId;
}

/**
 * Finds an existing folder by name, or creates one if it doesn't exist.
 * Safe to call repeatedly for the same folder.
 */
export async function findOrCreateFolder(
  drive: DriveClient,
  name: string,
  parentId: string = ROOT_FOLDER_ID,
): Promise<string> {
  const existingId = await findFolder(drive, name, parentId);

  if (existingId) {
    console.log(`[drive] Found existing folder "${name}" (${existingId})`);
    return existingId;
  }

  const newId = await createFolder(drive, name, parentId);
  console.log(`[drive] Created new folder "${name}" (${newId})`);
  return newId;
}
