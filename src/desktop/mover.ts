/**
 * Desktop Mover
 *
 * Sorts the top-level files of a folder (the Desktop by default) into one
 * subfolder per category:
 * - ensureCategoryFolders: create missing category folders
 * - isCandidate: top-level, visible, regular files (or links to them) only
 * - resolveDestination: "<stem>_dup<n><ext>" on name collisions
 * - moveFiles: classify and move (or plan, in a dry run)
 *
 * Files are handled one at a time so collision checks see earlier moves.
 */

import type { Dirent } from 'node:fs';
import fs from 'node:fs/promises';
import path from 'node:path';
import { CATEGORIES, classifyFile } from '../classification/index.js';
import type { Category } from '../classification/index.js';
import { appConfig } from '../config.js';
import { BaseDirectoryNotFoundError } from './errors.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface MoveOptions {
  /** Folder to organize (default: appConfig.desktop.baseDir) */
  baseDir?: string;
  /** Log planned moves without touching any file (default: appConfig.desktop.dryRun) */
  dryRun?: boolean;
}

export interface MoveRecord {
  source: string;
  destination: string;
  category: Category;
  /** false in a dry run */
  moved: boolean;
}

// ---------------------------------------------------------------------------
// Filesystem Helpers
// ---------------------------------------------------------------------------

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

async function pathExists(target: string): Promise<boolean> {
  try {
    await fs.stat(target);
    return true;
  } catch (err) {
    if (isNotFound(err)) return false;
    throw err;
  }
}

async function isSameFile(a: string, b: string): Promise<boolean> {
  const [statA, statB] = await Promise.all([fs.stat(a), fs.stat(b)]);
  return statA.dev === statB.dev && statA.ino === statB.ino;
}

/** Renames, falling back to copy + unlink when source and target are on different devices. */
async function relocate(source: string, destination: string): Promise<void> {
  try {
    await fs.rename(source, destination);
  } catch (err) {
    if (!(err instanceof Error && 'code' in err && err.code === 'EXDEV')) throw err;
    await fs.copyFile(source, destination);
    await fs.unlink(source);
  }
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/** Creates every category folder under baseDir that does not exist yet. */
export async function ensureCategoryFolders(baseDir: string): Promise<void> {
  for (const category of CATEGORIES) {
    await fs.mkdir(path.join(baseDir, category), { recursive: true });
  }
}

/**
 * A directory entry is organized only if it is a regular file, or a symlink
 * to one, and not hidden ("." dotfiles, "~" editor lock files). Directories,
 * category folders included, and broken links are never touched.
 *
 * @param dir - Directory the entry was read from
 */
export async function isCandidate(entry: Dirent, dir: string): Promise<boolean> {
  if (entry.name.startsWith('.') || entry.name.startsWith('~')) return false;
  if (entry.isFile()) return true;
  if (!entry.isSymbolicLink()) return false;

  try {
    return (await fs.stat(path.join(dir, entry.name))).isFile();
  } catch (err) {
    if (isNotFound(err)) return false;
    throw err;
  }
}

/**
 * Returns dir/name if free, else dir/<stem>_dup<n><ext> for the smallest free n.
 */
export async function resolveDestination(dir: string, name: string): Promise<string> {
  const { name: stem, ext } = path.parse(name);
  let destination = path.join(dir, name);
  let n = 1;

  while (await pathExists(destination)) {
    destination = path.join(dir, `${stem}_dup${n}${ext}`);
    n++;
  }

  return destination;
}

/**
 * Classifies every candidate file directly inside baseDir and moves it into
 * its category folder.
 *
 * @returns One record per file moved (or planned, in a dry run)
 */
export async function moveFiles(options: MoveOptions = {}): Promise<MoveRecord[]> {
  const baseDir = path.resolve(options.baseDir ?? appConfig.desktop.baseDir);
  const dryRun = options.dryRun ?? appConfig.desktop.dryRun;

  try {
    const stat = await fs.stat(baseDir);
    if (!stat.isDirectory()) throw new BaseDirectoryNotFoundError(baseDir);
  } catch (err) {
    if (isNotFound(err)) throw new BaseDirectoryNotFoundError(baseDir);
    throw err;
  }

  await ensureCategoryFolders(baseDir);

  const entries: Dirent[] = [];
  for (const entry of await fs.readdir(baseDir, { withFileTypes: true })) {
    if (await isCandidate(entry, baseDir)) entries.push(entry);
  }
  entries.sort((a, b) => a.name.localeCompare(b.name));

  const records: MoveRecord[] = [];

  for (const entry of entries) {
    const source = path.join(baseDir, entry.name);
    const category = await classifyFile(source);
    const destDir = path.join(baseDir, category);
    const direct = path.join(destDir, entry.name);

    if ((await pathExists(direct)) && (await isSameFile(source, direct))) {
      continue;
    }

    const destination = await resolveDestination(destDir, entry.name);

    if (dryRun) {
      console.log(`[desktop] Would move ${source} -> ${destination}`);
      records.push({ source, destination, category, moved: false });
      continue;
    }

    await relocate(source, destination);
    console.log(`[desktop] Moved ${entry.name} -> ${category}`);
    records.push({ source, destination, category, moved: true });
  }

  return records;
}
