/**
 * Shared Application Configuration
 *
 * Centralizes environment variable access for the movers and the CLI.
 * Google credentials (GOOGLE_CLIENT_ID, GOOGLE_CLIENT_SECRET,
 * GOOGLE_REFRESH_TOKEN, GOOGLE_SERVICE_ACCOUNT_KEY) are read lazily by
 * src/drive/drive-client.ts, only when the Drive mover runs.
 *
 * Environment variables:
 * - ORGANIZER_BASE_DIR: Folder the desktop mover scans (default: ~/Desktop)
 * - ORGANIZER_DRY_RUN: Set to 'true' to plan desktop moves without performing them
 *   (the drive command only honours --dry)
 * - DRIVE_TOKEN_PATH: Where the OAuth setup script saves tokens (default: token.json)
 * - DRIVE_IMPERSONATE_AS: User to impersonate with a service account (optional)
 */

import 'dotenv/config';
import os from 'node:os';
import path from 'node:path';

export interface AppConfig {
  desktop: {
    baseDir: string;
    dryRun: boolean;
  };
  drive: {
    tokenPath: string;
    impersonateAs: string | undefined;
  };
}

function optionalEnv(key: string, fallback = ''): string {
  return process.env[key] || fallback;
}

export const appConfig: AppConfig = {
  desktop: {
    baseDir: path.resolve(optionalEnv('ORGANIZER_BASE_DIR', path.join(os.homedir(), 'Desktop'))),
    dryRun: process.env.ORGANIZER_DRY_RUN === 'true',
  },
  drive: {
    tokenPath: path.resolve(optionalEnv('DRIVE_TOKEN_PATH', 'token.json')),
    impersonateAs: process.env.DRIVE_IMPERSONATE_AS || undefined,
  },
};
