import http from 'http';
import { loadEnvFiles, parseConfig } from './config';
import { createApp } from './app';

// ── Environment loading ───────────────────────────────────────────────────────
// process.cwd() = apps/server/ (the directory npm start is invoked from).
// In production env vars are injected directly and the files do not exist.
loadEnvFiles();
const config = parseConfig(process.env);

// ── HTTP Server ───────────────────────────────────────────────────────────────
const httpServer = http.createServer(createApp(config));

// ── Start ─────────────────────────────────────────────────────────────────────
httpServer.listen(config.port, () => {
  console.log(`[Server] lexorder running on port ${config.port}`);
  console.log(`[Server] Environment : ${config.nodeEnv}`);
  console.log(`[Server] CORS origin : ${config.corsOrigin}`);
  console.log(`[Keys]   Max batch   : ${config.maxBatch}`);
});

export default httpServer;
