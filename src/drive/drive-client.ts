/**
 * Google Drive API Client
 *
 * Supports three credential sources, checked in this order:
 * 1. OAuth2 refresh token from the environment
 *    (GOOGLE_CLIENT_ID + GOOGLE_CLIENT_SECRET + GOOGLE_REFRESH_TOKEN)
 * 2. OAuth2 token file written by src/drive/setup/get-refresh-token.ts
 *    (DRIVE_TOKEN_PATH, with GOOGLE_CLIENT_ID + GOOGLE_CLIENT_SECRET)
 * 3. Service account (GOOGLE_SERVICE_ACCOUNT_KEY, base64 JSON), optionally
 *    impersonating DRIVE_IMPERSONATE_AS
 *
 * OAuth2 access tokens are refreshed by google-auth-library. When the client
 * was built from the token file, refreshed tokens are written back to it.
 */

import { existsSync, readFileSync } from 'node:fs';
import { writeFile } from 'node:fs/promises';
import { google } from 'googleapis';
import { JWT, OAuth2Client } from 'google-auth-library';
import type { Credentials } from 'google-auth-library';
import { z } from 'zod';
import { appConfig } from '../config.js';
import { DriveCredentialsError } from './errors.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type DriveClient = ReturnType<typeof google.drive>;

export const DRIVE_SCOPE = 'https://www.googleapis.com/auth/drive';

const TokenFileSchema = z.object({
  refresh_token: z.string().min(1),
  access_token: z.string().nullish(),
  expiry_date: z.number().nullish(),
  scope: z.string().optional(),
  token_type: z.string().nullish(),
  id_token: z.string().nullish(),
});

const ServiceAccountKeySchema = z.object({
  client_email: z.string().min(1),
  private_key: z.string().min(1),
});

// ---------------------------------------------------------------------------
// Credential Loading
// ---------------------------------------------------------------------------

function requireClientSecrets(source: string): { clientId: string; clientSecret: string } {
  const clientId = process.env.GOOGLE_CLIENT_ID;
  const clientSecret = process.env.GOOGLE_CLIENT_SECRET;

  if (!clientId || !clientSecret) {
    throw new DriveCredentialsError(
      `OAuth2 credentials incomplete. Set GOOGLE_CLIENT_ID and GOOGLE_CLIENT_SECRET alongside ${source}.`,
    );
  }

  return { clientId, clientSecret };
}

/** Reads and validates the saved OAuth2 token file. */
export function loadTokenFile(tokenPath: string): Credentials {
  try {
    return TokenFileSchema.parse(JSON.parse(readFileSync(tokenPath, 'utf-8')));
  } catch (err) {
    throw new DriveCredentialsError(
      `Token file ${tokenPath} is unreadable: ${err instanceof Error ? err.message : String(err)}. ` +
        'Re-run src/drive/setup/get-refresh-token.ts.',
    );
  }
}

/** Loads and validates the base64-encoded service account key. */
function loadServiceAccountKey(encoded: string): { client_email: string; private_key: string } {
  let decoded: unknown;
  try {
    decoded = JSON.parse(Buffer.from(encoded, 'base64').toString('utf-8'));
  } catch (err) {
    throw new DriveCredentialsError(
      `GOOGLE_SERVICE_ACCOUNT_KEY is malformed: ${err instanceof Error ? err.message : String(err)}. ` +
        'Ensure it is a base64-encoded JSON service account key file.',
    );
  }

  const parsed = ServiceAccountKeySchema.safeParse(decoded);
  if (!parsed.success) {
    throw new DriveCredentialsError(
      'GOOGLE_SERVICE_ACCOUNT_KEY is malformed: Missing client_email or private_key fields.',
    );
  }

  return parsed.data;
}

function persistRefreshedTokens(client: OAuth2Client, tokenPath: string, saved: Credentials): void {
  client.on('tokens', (tokens) => {
    const merged: Credentials = { ...saved, ...tokens, refresh_token: tokens.refresh_token ?? saved.refresh_token };
    writeFile(tokenPath, JSON.stringify(merged, null, 2), 'utf-8').catch((err: unknown) => {
      console.warn(
        `[drive] Could not save refreshed token to ${tokenPath}: ` +
          (err instanceof Error ? err.message : String(err)),
      );
    });
  });
}

function createAuth(): OAuth2Client | JWT {
  if (process.env.GOOGLE_REFRESH_TOKEN) {
    const { clientId, clientSecret } = requireClientSecrets('GOOGLE_REFRESH_TOKEN');
    const client = new OAuth2Client(clientId, clientSecret);
    client.setCredentials({ refresh_token: process.env.GOOGLE_REFRESH_TOKEN });
    return client;
  }

  const { tokenPath } = appConfig.drive;
  if (existsSync(tokenPath)) {
    const { clientId, clientSecret } = requireClientSecrets(`the token file ${tokenPath}`);
    const saved = loadTokenFile(tokenPath);
    const client = new OAuth2Client(clientId, clientSecret);
    client.setCredentials(saved);
    persistRefreshedTokens(client, tokenPath, saved);
    return client;
  }

  const encodedKey = process.env.GOOGLE_SERVICE_ACCOUNT_KEY;
  if (encodedKey) {
    const key = loadServiceAccountKey(encodedKey);
    return new JWT({
      email: key.client_email,
      key: key.private_key,
      scopes: [DRIVE_SCOPE],
      subject: appConfig.drive.impersonateAs,
    });
  }

  throw new DriveCredentialsError(
    'No Drive credentials found. Set either:\n' +
      '  - GOOGLE_CLIENT_ID + GOOGLE_CLIENT_SECRET + GOOGLE_REFRESH_TOKEN (OAuth2), or\n' +
      `  - GOOGLE_CLIENT_ID + GOOGLE_CLIENT_SECRET and run the setup script to write ${tokenPath}, or\n` +
      '  - GOOGLE_SERVICE_ACCOUNT_KEY (service account)',
  );
}

// ---------------------------------------------------------------------------
// Drive Client Singleton
// ---------------------------------------------------------------------------

let _driveClient: DriveClient | null = null;

/**
 * Returns an authenticated Google Drive API v3 client.
 * Lazily initialized and cached for reuse.
 */
export function getDriveClient(): DriveClient {
  if (_driveClient) return _driveClient;
  _driveClient = google.drive({ version: 'v3', auth: createAuth() });
  return _driveClient;
}

/**
 * Resets the cached Drive client. Used in tests to clear singleton state.
 */
export function resetDriveClient(): void {
  _driveClient = null;
}
