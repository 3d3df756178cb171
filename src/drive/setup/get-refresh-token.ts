/**
 * One-time setup script: authorize Google Drive access with OAuth2.
 *
 * Run with: npx tsx src/drive/setup/get-refresh-token.ts
 *
 * Opens a browser for Google OAuth consent, catches the redirect on a local
 * server, writes the tokens to DRIVE_TOKEN_PATH (default token.json) and
 * prints the refresh token for .env.
 */

import 'dotenv/config';
import * as http from 'node:http';
import { writeFile } from 'node:fs/promises';
import { OAuth2Client } from 'google-auth-library';
import open from 'open';
import { appConfig } from '../../config.js';
import { DRIVE_SCOPE } from '../drive-client.js';

const CLIENT_ID = process.env.GOOGLE_CLIENT_ID;
const CLIENT_SECRET = process.env.GOOGLE_CLIENT_SECRET;
const PORT = 3333;
const REDIRECT_URI = `http://localhost:${PORT}`;

function waitForAuthCode(authUrl: string): Promise<string> {
  return new Promise<string>((resolve, reject) => {
    const finish = (err: Error | null, code?: string) => {
      clearTimeout(timer);
      server.close();
      if (err) reject(err);
      else if (code) resolve(code);
    };

    const server = http.createServer((req, res) => {
      const url = new URL(req.url ?? '/', REDIRECT_URI);
      const authCode = url.searchParams.get('code');
      const error = url.searchParams.get('error');

      if (error) {
        res.writeHead(200, { 'Content-Type': 'text/html' });
        res.end('<h1>Authorization failed</h1><p>You can close this tab.</p>');
        finish(new Error(`OAuth error: ${error}`));
        return;
      }

      if (authCode) {
        res.writeHead(200, { 'Content-Type': 'text/html' });
        res.end('<h1>Authorization successful!</h1><p>You can close this tab and go back to the terminal.</p>');
        finish(null, authCode);
        return;
      }

      res.writeHead(400, { 'Content-Type': 'text/plain' });
      res.end('Missing code parameter');
    });

    const timer = setTimeout(() => {
      finish(new Error('Timed out waiting for authorization'));
    }, 120_000);

    server.listen(PORT, () => {
      console.log('Opening browser for Google OAuth consent...');
      open(authUrl).catch(() => {
        console.log('Could not open browser automatically. Open this URL manually:');
        console.log(authUrl);
      });
    });
  });
}

async function main(): Promise<void> {
  if (!CLIENT_ID || !CLIENT_SECRET) {
    console.error('ERROR: GOOGLE_CLIENT_ID and GOOGLE_CLIENT_SECRET must be set in .env');
    process.exit(1);
  }

  const oauth2Client = new OAuth2Client(CLIENT_ID, CLIENT_SECRET, REDIRECT_URI);

  const authUrl = oauth2Client.generateAuthUrl({
    access_type: 'offline',
    scope: [DRIVE_SCOPE],
    prompt: 'consent',
  });

  const code = await waitForAuthCode(authUrl);
  const { tokens } = await oauth2Client.getToken(code);

  if (!tokens.refresh_token) {
    console.error('ERROR: No refresh token returned.');
    console.error('Consent was probably not forced. Revoke access at https://myaccount.google.com/permissions and retry.');
    process.exit(1);
  }

  await writeFile(appConfig.drive.tokenPath, JSON.stringify(tokens, null, 2), 'utf-8');

  console.log('='.repeat(60));
  console.log(`Tokens saved to ${appConfig.drive.tokenPath}`);
  console.log('Or add the following to your .env file:');
  console.log('='.repeat(60));
  console.log('');
  console.log(`GOOGLE_REFRESH_TOKEN=${tokens.refresh_token}`);
  console.log('');
  console.log('='.repeat(60));
}

main().catch((err: unknown) => {
  console.error('Script failed:', err instanceof Error ? err.message : err);
  process.exit(1);
});
