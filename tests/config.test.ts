import { ZodError } from 'zod';
import { loadConfig } from '../src/config';

describe('loadConfig', () => {
  it('falls back to defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual({
      baseUrl: 'https://id.loc.gov',
      timeoutMs: 30000,
      pageDelayMs: 1000,
      searchLimit: 20,
      port: undefined,
      allowedOrigins: undefined,
    });
  });

  it('reads overrides and strips a trailing slash from the base URL', () => {
    const config = loadConfig({
      IDLOC_BASE_URL: 'http://localhost:8080/',
      IDLOC_TIMEOUT_MS: '5000',
      IDLOC_PAGE_DELAY_MS: '0',
      IDLOC_SEARCH_LIMIT: '50',
      PORT: '4000',
      ALLOWED_ORIGINS: 'http://localhost:5173, https://example.org',
    });

    expect(config).toEqual({
      baseUrl: 'http://localhost:8080',
      timeoutMs: 5000,
      pageDelayMs: 0,
      searchLimit: 50,
      port: 4000,
      allowedOrigins: ['http://localhost:5173', 'https://example.org'],
    });
  });

  it('treats blank variables as unset', () => {
    expect(loadConfig({ IDLOC_TIMEOUT_MS: '  ' }).timeoutMs).toBe(30000);
  });

  it('rejects a non-numeric timeout', () => {
    expect(() => loadConfig({ IDLOC_TIMEOUT_MS: 'soon' })).toThrow(ZodError);
  });

  it('rejects a base URL that is not a URL', () => {
    expect(() => loadConfig({ IDLOC_BASE_URL: 'id.loc.gov' })).toThrow(ZodError);
  });
});
