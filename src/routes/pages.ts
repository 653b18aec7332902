/**
 * @fileoverview Serves the single-page inbox UI.
 *
 * GET / - public/index.html, with headers that keep the page from being
 * framed or cached.
 */

import { Router } from 'express';
import { fileURLToPath } from 'url';
import { createLogger } from '../utils/observability/index.js';

const router = Router();
const log = createLogger({ domain: 'pages' });

export const INDEX_HTML_PATH = fileURLToPath(new URL('../../public/index.html', import.meta.url));

router.get('/', (_req, res) => {
  res.setHeader('Referrer-Policy', 'no-referrer');
  res.setHeader('X-Content-Type-Options', 'nosniff');
  res.setHeader('X-Frame-Options', 'DENY');
  res.setHeader('Cache-Control', 'no-cache');

  res.sendFile(INDEX_HTML_PATH, (error) => {
    if (error) {
      log.error('page_send_failed', { error: error.message });
      if (!res.headersSent) {
        res.status(500).send('UI unavailable');
      }
    }
  });
});

export default router;
