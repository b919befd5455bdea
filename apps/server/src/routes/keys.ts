/**
 * routes/keys.ts
 *
 * REST API for order keys.
 *
 * Routes:
 *   POST /api/keys/between  — one key between { a, b }
 *   POST /api/keys/batch    — n keys between { a, b }
 *
 * Keys are returned, never stored: the caller writes them to its own
 * ordered column.
 */
import { Router, type Request, type Response } from 'express';
import { keyBetween, keysBetween, type ServiceOutcome } from '../services/keyService';

function send<T>(res: Response, outcome: ServiceOutcome<T>): void {
  if (!outcome.ok) {
    res.status(400).json({ ok: false, code: outcome.code, error: outcome.message });
    return;
  }
  res.json({ ok: true, data: outcome.data });
}

export function createKeysRouter(maxBatch: number): Router {
  const router = Router();

  // POST /api/keys/between
  router.post('/between', (req: Request, res: Response) => {
    try {
      send(res, keyBetween(req.body));
    } catch (err) {
      console.error('[POST /api/keys/between]', err);
      res.status(500).json({ ok: false, error: 'Failed to generate key' });
    }
  });

  // POST /api/keys/batch
  router.post('/batch', (req: Request, res: Response) => {
    try {
      send(res, keysBetween(req.body, maxBatch));
    } catch (err) {
      console.error('[POST /api/keys/batch]', err);
      res.status(500).json({ ok: false, error: 'Failed to generate keys' });
    }
  });

  return router;
}
