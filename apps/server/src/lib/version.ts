/** Reported by GET /health. Keep in step with apps/server/package.json. */
export const VERSION = '0.1.0';
