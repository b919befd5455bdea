import express, { type NextFunction, type Request, type Response } from 'express';
import cors    from 'cors';
import helmet  from 'helmet';
import type { AppConfig } from './config';
import { createKeysRouter } from './routes/keys';
import { VERSION } from './lib/version';

export function createApp(config: AppConfig): express.Express {
  const app = express();

  // ── Security ─────────────────────────────────────────────────────────────────
  app.use(helmet());

  // ── CORS ─────────────────────────────────────────────────────────────────────
  app.use(
    cors({
      origin: config.corsOrigin,
      methods: ['GET', 'POST', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'Authorization'],
    })
  );

  // ── Body Parsing ──────────────────────────────────────────────────────────────
  app.use(express.json({ limit: '16kb' }));

  // ── Health Check ──────────────────────────────────────────────────────────────
  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      service: 'lexorder-server',
      version: VERSION,
      timestamp: new Date().toISOString(),
      uptime: Math.floor(process.uptime()),
    });
  });

  // ── API Routes ────────────────────────────────────────────────────────────────
  app.use('/api/keys', createKeysRouter(config.maxBatch));

  // ── 404 Catch-All ─────────────────────────────────────────────────────────────
  app.use((_req, res) => {
    res.status(404).json({ error: 'Not Found' });
  });

  // ── Error Handler ─────────────────────────────────────────────────────────────
  // express.json() reports an unparsable body as `type: 'entity.parse.failed'`
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (typeof err === 'object' && err !== null && 'type' in err && err.type === 'entity.parse.failed') {
      res.status(400).json({ ok: false, code: 'VALIDATION_ERROR', error: 'Malformed JSON body' });
      return;
    }
    console.error('[app]', err);
    res.status(500).json({ ok: false, error: 'Internal Server Error' });
  });

  return app;
}
