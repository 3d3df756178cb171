/**
 * Tests for the Desktop Mover
 *
 * Runs against a real temp directory per test.
 *
 * Tests cover:
 * - isCandidate: regular visible files and links to them only
 * - resolveDestination: _dup<n> suffixes on collision
 * - ensureCategoryFolders: idempotent creation
 * - moveFiles: filename, content and fallback classification, collisions,
 *   dry run, missing base directory
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { lstat, mkdir, mkdtemp, readdir, readFile, rm, stat, symlink, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { BaseDirectoryNotFoundError } from '../errors.js';
import { ensureCategoryFolders, isCandidate, moveFiles, resolveDestination } from '../mover.js';

let baseDir: string;
let outsideDir: string;

beforeEach(async () => {
  baseDir = await mkdtemp(path.join(os.tmpdir(), 'desktop-mover-'));
  outsideDir = await mkdtemp(path.join(os.tmpdir(), 'desktop-outside-'));
  vi.spyOn(console, 'log').mockImplementation(() => {});
});

afterEach(async () => {
  vi.mocked(console.log).mockRestore();
  await rm(baseDir, { recursive: true, force: true });
  await rm(outsideDir, { recursive: true, force: true });
});

async function exists(target: string): Promise<boolean> {
  try {
    await stat(target);
    return true;
  } catch {
    return false;
  }
}

async function seedDesktop(): Promise<void> {
  await writeFile(path.join(baseDir, 'semester_plan.txt'), 'weeks 1-14');
  await writeFile(path.join(baseDir, 'docker-notes.md'), 'compose up');
  await writeFile(path.join(baseDir, 'capstone project outline.txt'), 'outline');
  await writeFile(path.join(baseDir, 'notes.txt'), 'abstract methodology results');
  await writeFile(path.join(baseDir, 'holiday.jpg'), Buffer.from([0xff, 0xd8, 0xff, 0xe0]));
  await writeFile(path.join(baseDir, '.hidden.txt'), 'semester');
  await writeFile(path.join(baseDir, '~lock.docx'), 'lock');
  await mkdir(path.join(baseDir, 'archive'));
  await writeFile(path.join(baseDir, 'archive', 'semester_old.txt'), 'old');
}

// ============================================================================
// isCandidate
// ============================================================================

describe('isCandidate', () => {
  it('accepts visible regular files and rejects hidden files and directories', async () => {
    await seedDesktop();
    const accepted: string[] = [];
    for (const entry of await readdir(baseDir, { withFileTypes: true })) {
      if (await isCandidate(entry, baseDir)) accepted.push(entry.name);
    }
    accepted.sort();

    expect(accepted).toEqual([
      'capstone project outline.txt',
      'docker-notes.md',
      'holiday.jpg',
      'notes.txt',
      'semester_plan.txt',
    ]);
  });

  it('follows symlinks to files and rejects links to folders or nowhere', async () => {
    await writeFile(path.join(outsideDir, 'transcript.txt'), 'grades');
    await symlink(path.join(outsideDir, 'transcript.txt'), path.join(baseDir, 'transcript link.txt'));
    await symlink(outsideDir, path.join(baseDir, 'folder link'));
    await symlink(path.join(outsideDir, 'missing.txt'), path.join(baseDir, 'broken link.txt'));

    const accepted: string[] = [];
    for (const entry of await readdir(baseDir, { withFileTypes: true })) {
      if (await isCandidate(entry, baseDir)) accepted.push(entry.name);
    }

    expect(accepted).toEqual(['transcript link.txt']);
  });
});

// ============================================================================
// resolveDestination
// ============================================================================

describe('resolveDestination', () => {
  it('returns the plain name when it is free', async () => {
    expect(await resolveDestination(baseDir, 'report.pdf')).toBe(path.join(baseDir, 'report.pdf'));
  });

  it('appends the smallest free _dup<n> before the extension', async () => {
    await writeFile(path.join(baseDir, 'report.pdf'), '');
    await writeFile(path.join(baseDir, 'report_dup1.pdf'), '');

    expect(await resolveDestination(baseDir, 'report.pdf')).toBe(
      path.join(baseDir, 'report_dup2.pdf'),
    );
  });

  it('handles names without an extension', async () => {
    await writeFile(path.join(baseDir, 'Makefile'), '');

    expect(await resolveDestination(baseDir, 'Makefile')).toBe(
      path.join(baseDir, 'Makefile_dup1'),
    );
  });
});

// ============================================================================
// ensureCategoryFolders
// ============================================================================

describe('ensureCategoryFolders', () => {
  it('creates every category folder and can run twice', async () => {
    await ensureCategoryFolders(baseDir);
    await ensureCategoryFolders(baseDir);

    const names = (await readdir(baseDir)).sort();
    expect(names).toEqual(['Capstone Work', 'Technical Work', 'University Docs']);
  });
});

// ============================================================================
// moveFiles
// ============================================================================

describe('moveFiles', () => {
  it('moves each top-level file into its category folder', async () => {
    await seedDesktop();

    const records = await moveFiles({ baseDir, dryRun: false });

    expect(records).toEqual([
      {
        source: path.join(baseDir, 'capstone project outline.txt'),
        destination: path.join(baseDir, 'Capstone Work', 'capstone project outline.txt'),
        category: 'Capstone Work',
        moved: true,
      },
      {
        source: path.join(baseDir, 'docker-notes.md'),
        destination: path.join(baseDir, 'Technical Work', 'docker-notes.md'),
        category: 'Technical Work',
        moved: true,
      },
      {
        source: path.join(baseDir, 'holiday.jpg'),
        destination: path.join(baseDir, 'Technical Work', 'holiday.jpg'),
        category: 'Technical Work',
        moved: true,
      },
      {
        source: path.join(baseDir, 'notes.txt'),
        destination: path.join(baseDir, 'Capstone Work', 'notes.txt'),
        category: 'Capstone Work',
        moved: true,
      },
      {
        source: path.join(baseDir, 'semester_plan.txt'),
        destination: path.join(baseDir, 'University Docs', 'semester_plan.txt'),
        category: 'University Docs',
        moved: true,
      },
    ]);

    expect(await readFile(path.join(baseDir, 'Capstone Work', 'notes.txt'), 'utf-8')).toBe(
      'abstract methodology results',
    );
    expect(await exists(path.join(baseDir, 'notes.txt'))).toBe(false);
  });

  it('leaves hidden files, lock files and subfolders in place', async () => {
    await seedDesktop();

    await moveFiles({ baseDir, dryRun: false });

    expect(await exists(path.join(baseDir, '.hidden.txt'))).toBe(true);
    expect(await exists(path.join(baseDir, '~lock.docx'))).toBe(true);
    expect(await exists(path.join(baseDir, 'archive', 'semester_old.txt'))).toBe(true);
  });

  it('moves a symlinked document as a link and leaves its target in place', async () => {
    const target = path.join(outsideDir, 'semester_calendar.txt');
    await writeFile(target, 'term dates');
    await symlink(target, path.join(baseDir, 'semester_calendar.txt'));

    const records = await moveFiles({ baseDir, dryRun: false });

    expect(records).toEqual([
      {
        source: path.join(baseDir, 'semester_calendar.txt'),
        destination: path.join(baseDir, 'University Docs', 'semester_calendar.txt'),
        category: 'University Docs',
        moved: true,
      },
    ]);
    const moved = await lstat(path.join(baseDir, 'University Docs', 'semester_calendar.txt'));
    expect(moved.isSymbolicLink()).toBe(true);
    expect(await readFile(target, 'utf-8')).toBe('term dates');
  });

  it('renames on collision instead of overwriting', async () => {
    await mkdir(path.join(baseDir, 'University Docs'));
    await writeFile(path.join(baseDir, 'University Docs', 'semester_plan.txt'), 'first');
    await writeFile(path.join(baseDir, 'University Docs', 'semester_plan_dup1.txt'), 'second');
    await writeFile(path.join(baseDir, 'semester_plan.txt'), 'third');

    const records = await moveFiles({ baseDir, dryRun: false });

    expect(records).toHaveLength(1);
    expect(records[0].destination).toBe(
      path.join(baseDir, 'University Docs', 'semester_plan_dup2.txt'),
    );
    expect(await readFile(path.join(baseDir, 'University Docs', 'semester_plan.txt'), 'utf-8')).toBe(
      'first',
    );
    expect(
      await readFile(path.join(baseDir, 'University Docs', 'semester_plan_dup2.txt'), 'utf-8'),
    ).toBe('third');
  });

  it('plans moves without touching files in a dry run', async () => {
    await seedDesktop();

    const records = await moveFiles({ baseDir, dryRun: true });

    expect(records).toHaveLength(5);
    expect(records.every((r) => !r.moved)).toBe(true);
    expect(records[4]).toEqual({
      source: path.join(baseDir, 'semester_plan.txt'),
      destination: path.join(baseDir, 'University Docs', 'semester_plan.txt'),
      category: 'University Docs',
      moved: false,
    });
    expect(await exists(path.join(baseDir, 'semester_plan.txt'))).toBe(true);
    expect(console.log).toHaveBeenCalledWith(
      `[desktop] Would move ${path.join(baseDir, 'semester_plan.txt')} -> ` +
        path.join(baseDir, 'University Docs', 'semester_plan.txt'),
    );
  });

  it('returns no records for an empty folder', async () => {
    expect(await moveFiles({ baseDir, dryRun: false })).toEqual([]);
  });

  it('rejects a base directory that does not exist', async () => {
    const missing = path.join(baseDir, 'nope');

    await expect(moveFiles({ baseDir: missing })).rejects.toBeInstanceOf(
      BaseDirectoryNotFoundError,
    );
    await expect(moveFiles({ baseDir: missing })).rejects.toThrow(
      `Base path ${missing} does not exist or is not a directory`,
    );
  });

  it('rejects a base path that is a file', async () => {
    const file = path.join(baseDir, 'plain.txt');
    await writeFile(file, '');

    await expect(moveFiles({ baseDir: file })).rejects.toBeInstanceOf(BaseDirectoryNotFoundError);
  });
});
