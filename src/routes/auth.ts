/**
 * @fileoverview Google OAuth routes for connecting the mailbox.
 *
 * Flow:
 * 1. The UI links to /auth/google
 * 2. We issue a one-time state and redirect to Google consent
 * 3. Google redirects back to /auth/google/callback
 * 4. We store the tokens and send the user back to the UI
 */

import { Router } from 'express';
import { google } from 'googleapis';
import config from '../config.js';
import {
  getCredentialStore,
  GOOGLE_PROVIDER,
  MAILBOX_ACCOUNT,
} from '../services/credentials/index.js';
import { getOAuthStateStore } from '../services/auth/oauth-state.js';
import { errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/observability/index.js';

const router = Router();
const log = createLogger({ domain: 'auth' });

// Read-only access is all the analysis needs
export const SCOPES = ['https://www.googleapis.com/auth/gmail.readonly'];

function getOAuth2Client() {
  return new google.auth.OAuth2(
    config.google.clientId,
    config.google.clientSecret,
    config.google.redirectUri
  );
}

function queryString(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

/**
 * GET /auth/google
 * Redirects to the Google consent screen.
 */
router.get('/auth/google', (_req, res) => {
  const state = getOAuthStateStore().issue();
  const authUrl = getOAuth2Client().generateAuthUrl({
    access_type: 'offline', // Get refresh token
    scope: SCOPES,
    state,
    prompt: 'consent', // Force consent to always get refresh token
  });
  res.redirect(authUrl);
});

/**
 * GET /auth/google/callback
 * Exchanges the authorization code and stores the tokens.
 */
router.get('/auth/google/callback', async (req, res) => {
  const code = queryString(req.query.code);
  const state = queryString(req.query.state);
  const error = queryString(req.query.error);

  if (error) {
    log.info('oauth_declined', { reason: error });
    res.send(errorHtml('Authorization was declined. You can try again from the inbox page.'));
    return;
  }

  if (!code || !state) {
    res.status(400).send(errorHtml('Missing code or state parameter'));
    return;
  }

  if (!getOAuthStateStore().consume(state)) {
    log.warn('oauth_state_rejected');
    res.status(400).send(errorHtml('Invalid or expired link. Please start again.'));
    return;
  }

  try {
    const { tokens } = await getOAuth2Client().getToken(code);
    const store = getCredentialStore();
    const existing = await store.get(MAILBOX_ACCOUNT, GOOGLE_PROVIDER);
    const refreshToken = tokens.refresh_token ?? existing?.refreshToken;

    if (!tokens.access_token || !refreshToken) {
      throw new Error('Missing tokens in response');
    }

    await store.set(MAILBOX_ACCOUNT, GOOGLE_PROVIDER, {
      accessToken: tokens.access_token,
      refreshToken,
      expiresAt: tokens.expiry_date || Date.now() + 3600000,
    });

    log.info('oauth_completed');
    res.send(successHtml());
  } catch (err) {
    log.error('oauth_token_exchange_failed', { error: errorMessage(err) });
    res.status(500).send(errorHtml('Failed to connect the Google account. Please try again.'));
  }
});

/**
 * GET /auth/status
 * Whether mailbox credentials are stored.
 */
router.get('/auth/status', async (_req, res) => {
  try {
    const creds = await getCredentialStore().get(MAILBOX_ACCOUNT, GOOGLE_PROVIDER);
    res.json({ connected: creds !== null });
  } catch (err) {
    log.error('auth_status_failed', { error: errorMessage(err) });
    res.status(500).json({ success: false, error: 'Failed to read credential store' });
  }
});

/**
 * POST /auth/logout
 * Forget the stored mailbox credentials.
 */
router.post('/auth/logout', async (_req, res) => {
  try {
    await getCredentialStore().delete(MAILBOX_ACCOUNT, GOOGLE_PROVIDER);
    log.info('mailbox_disconnected');
    res.json({ success: true });
  } catch (err) {
    log.error('auth_logout_failed', { error: errorMessage(err) });
    res.status(500).json({ success: false, error: 'Failed to remove credentials' });
  }
});

const PAGE_STYLE = `
    body {
      font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, sans-serif;
      display: flex;
      justify-content: center;
      align-items: center;
      min-height: 100vh;
      margin: 0;
      background: #f5f5f5;
    }
    .card {
      background: white;
      padding: 2rem;
      border-radius: 12px;
      box-shadow: 0 2px 8px rgba(0,0,0,0.1);
      text-align: center;
      max-width: 400px;
    }
    h1 { margin: 0 0 0.5rem; color: #1a1a1a; }
    p { color: #666; margin: 0 0 1rem; }
    a { color: #1a73e8; }`;

function successHtml(): string {
  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>Connected</title>
  <meta http-equiv="refresh" content="2;url=/">
  <style>${PAGE_STYLE}
  </style>
</head>
<body>
  <div class="card">
    <h1>Mailbox connected</h1>
    <p>Returning to the inbox...</p>
    <a href="/">Go now</a>
  </div>
</body>
</html>`;
}

function errorHtml(message: string): string {
  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>Error</title>
  <style>${PAGE_STYLE}
  </style>
</head>
<body>
  <div class="card">
    <h1>Something Went Wrong</h1>
    <p>${escapeHtml(message)}</p>
    <a href="/">Back to the inbox</a>
  </div>
</body>
</html>`;
}

function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

export default router;
