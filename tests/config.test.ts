/**
 * Tests for environment configuration defaults
 */

import type { Config } from '../src/config';

describe('config', () => {
  const saved = { ...process.env };

  afterEach(() => {
    process.env = { ...saved };
  });

  async function loadConfig() {
    const loaded: { config?: Config } = {};
    await jest.isolateModulesAsync(async () => {
      loaded.config = (await import('../src/config')).config;
    });
    if (!loaded.config) {
      throw new Error('config module did not load');
    }
    return loaded.config;
  }

  it('should default to production when NODE_ENV is unset', async () => {
    delete process.env.NODE_ENV;

    const config = await loadConfig();

    expect(config.nodeEnv).toBe('production');
  });

  it('should split CORS origins', async () => {
    process.env.CORS_ORIGINS = 'https://a.example, https://b.example';

    const config = await loadConfig();

    expect(config.corsOrigins).toEqual(['https://a.example', 'https://b.example']);
    expect(config.nodeEnv).toBe('test');
  });
});
