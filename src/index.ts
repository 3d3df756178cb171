#!/usr/bin/env node
/**
 * Command-line Entry Point
 *
 * Usage:
 *   doc-sorter classify <path>               Print the category of one file
 *   doc-sorter desktop [--dry] [--base DIR]  Sort a folder (default: ~/Desktop)
 *   doc-sorter drive [--dry]                 Sort the root of My Drive
 *
 * Development: npx tsx src/index.ts <command> ...
 */

import { run } from './cli.js';

run(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    console.error('Error:', err instanceof Error ? err.message : err);
    process.exitCode = 1;
  });
