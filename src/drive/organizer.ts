/**
 * Google Drive Organizer
 *
 * Moves the items sitting directly in My Drive into one folder per category.
 * Items are classified by NAME ONLY: nothing is downloaded, so the content
 * stage never runs and an unmatched name lands in DEFAULT_CATEGORY.
 *
 * - resolveCategoryFolders: find/create one root folder per category
 * - listRootItems: every non-trashed item whose parent is root (paginated)
 * - moveItemToFolder: re-parent an item from its current parents
 * - organizeDrive: the whole pass
 *
 * Drive API errors propagate to the caller.
 */

import { CATEGORIES, DEFAULT_CATEGORY, classifyByFilename } from '../classification/index.js';
import type { Category } from '../classification/index.js';
import { getDriveClient } from './drive-client.js';
import type { DriveClient } from './drive-client.js';
import { ROOT_FOLDER_ID, escapeDriveQuery, findOrCreateFolder } from './folders.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface DriveItem {
  id: string;
  name: string;
  mimeType: string;
}

export interface DriveMoveRecord {
  itemId: string;
  name: string;
  category: Category;
  /** false in a dry run */
  moved: boolean;
}

export interface OrganizeDriveOptions {
  /** Defaults to getDriveClient() */
  drive?: DriveClient;
  dryRun?: boolean;
}

// ---------------------------------------------------------------------------
// Drive Operations
// ---------------------------------------------------------------------------

/** Resolves the folder ID of every category, in category order. */
export async function resolveCategoryFolders(drive: DriveClient): Promise<Map<Category, string>> {
  const folders = new Map<Category, string>();
  for (const category of CATEGORIES) {
    folders.set(category, await findOrCreateFolder(drive, category, ROOT_FOLDER_ID));
  }
  return folders;
}

/** Lists every non-trashed item directly under My Drive, following pagination. */
export async function listRootItems(drive: DriveClient): Promise<DriveItem[]> {
  const items: DriveItem[] = [];
  let pageToken: string | undefined;

  do {
    const res = await drive.files.list({
      q: `'${escapeDriveQuery(ROOT_FOLDER_ID)}' in parents and trashed = false`,
      fields: 'nextPageToken, files(id, name, mimeType)',
      pageSize: 100,
      pageToken,
    });

    for (const file of res.data.files ?? []) {
      if (file.id && file.name) {
        items.push({ id: file.id, name: file.name, mimeType: file.mimeType ?? '' });
      }
    }
    pageToken = res.data.nextPageToken ?? undefined;
  } while (pageToken);

  return items;
}

/**
 * Moves an item into a folder: adds the folder as parent and removes every
 * parent the item had before.
 */
export async function moveItemToFolder(
  drive: DriveClient,
  itemId: string,
  folderId: string,
): Promise<void> {
  const current = await drive.files.get({ fileId: itemId, fields: 'parents' });
  const previousParents = (current.data.parents ?? []).join(',');

  await drive.files.update({
    fileId: itemId,
    addParents: folderId,
    removeParents: previousParents,
    fields: 'id, parents',
  });
}

// ---------------------------------------------------------------------------
// Organize Pass
// ---------------------------------------------------------------------------

/**
 * Classifies each root item by name and moves it into its category folder.
 * The category folders themselves are skipped.
 */
export async function organizeDrive(options: OrganizeDriveOptions = {}): Promise<DriveMoveRecord[]> {
  const drive = options.drive ?? getDriveClient();
  const dryRun = options.dryRun ?? false;

  const folderIds = await resolveCategoryFolders(drive);
  const categoryFolderIds = new Set(folderIds.values());
  const items = await listRootItems(drive);

  console.log(`[drive] Found ${items.length} item(s) in My Drive root`);

  const records: DriveMoveRecord[] = [];

  for (const item of items) {
    if (categoryFolderIds.has(item.id)) continue;

    const category = classifyByFilename(item.name) ?? DEFAULT_CATEGORY;
    const folderId = folderIds.get(category);
    if (!folderId) continue;

    if (dryRun) {
      console.log(`[drive] Would move '${item.name}' (${item.mimeType || 'unknown type'}) -> ${category}`);
      records.push({ itemId: item.id, name: item.name, category, moved: false });
      continue;
    }

    await moveItemToFolder(drive, item.id, folderId);
    console.log(`[drive] Moved '${item.name}' -> ${category}`);
    records.push({ itemId: item.id, name: item.name, category, moved: true });
  }

  return records;
}
