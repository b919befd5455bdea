import { describe, it } from 'node:test';
import assert from 'node:assert';
import { parseConfig } from '../config';

describe('config', () => {
  it('should fall back to defaults', () => {
    assert.deepStrictEqual(parseConfig({}), {
      nodeEnv:    'development',
      port:       8080,
      corsOrigin: 'http://localhost:5173',
      maxBatch:   1000,
    });
  });

  it('should coerce numeric variables', () => {
    const config = parseConfig({ PORT: '3000', MAX_BATCH: '50', NODE_ENV: 'production' });
    assert.strictEqual(config.port, 3000);
    assert.strictEqual(config.maxBatch, 50);
    assert.strictEqual(config.nodeEnv, 'production');
  });

  it('should name the invalid variable', () => {
    assert.throws(() => parseConfig({ MAX_BATCH: '0' }), /MAX_BATCH/);
    assert.throws(() => parseConfig({ PORT: 'abc' }), /PORT/);
  });
});
