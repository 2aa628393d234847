import { loadConfig } from '../../server/config';

const UPSTREAM = 'ws://127.0.0.1:9000/stream';

describe('loadConfig', () => {
  test('applies defaults', () => {
    expect(loadConfig({ STT_UPSTREAM_URL: UPSTREAM })).toEqual({
      host: '0.0.0.0',
      port: 2700,
      sampleRate: 16000,
      upstreamUrl: UPSTREAM,
      heartbeatMs: 15000,
      upstreamTimeoutMs: 10000,
      debug: false,
    });
  });

  test('reads overrides', () => {
    const config = loadConfig({
      STT_HOST: ' 127.0.0.1 ',
      STT_PORT: '8080',
      STT_SAMPLE_RATE: '8000',
      STT_UPSTREAM_URL: UPSTREAM,
      STT_HEARTBEAT_MS: '0',
      STT_UPSTREAM_TIMEOUT_MS: '2500',
      LOG_DEBUG: '1',
    });

    expect(config).toEqual({
      host: '127.0.0.1',
      port: 8080,
      sampleRate: 8000,
      upstreamUrl: UPSTREAM,
      heartbeatMs: 0,
      upstreamTimeoutMs: 2500,
      debug: true,
    });
  });

  test('treats blank values as unset', () => {
    const config = loadConfig({ STT_HOST: '  ', STT_PORT: '', STT_UPSTREAM_URL: UPSTREAM });

    expect(config.host).toBe('0.0.0.0');
    expect(config.port).toBe(2700);
  });

  test('requires the upstream url', () => {
    expect(() => loadConfig({})).toThrow('Missing required environment variable: STT_UPSTREAM_URL');
    expect(() => loadConfig({ STT_UPSTREAM_URL: '   ' })).toThrow('Missing required environment variable: STT_UPSTREAM_URL');
  });

  test.each([
    ['STT_PORT', 'abc', 'STT_PORT must be a positive integer, got "abc"'],
    ['STT_PORT', '0', 'STT_PORT must be a positive integer, got "0"'],
    ['STT_SAMPLE_RATE', '16000.5', 'STT_SAMPLE_RATE must be a positive integer, got "16000.5"'],
    ['STT_HEARTBEAT_MS', '-1', 'STT_HEARTBEAT_MS must be a non-negative integer, got "-1"'],
    ['STT_UPSTREAM_TIMEOUT_MS', '0', 'STT_UPSTREAM_TIMEOUT_MS must be a positive integer, got "0"'],
  ])('rejects %s=%s', (key, value, message) => {
    expect(() => loadConfig({ STT_UPSTREAM_URL: UPSTREAM, [key]: value })).toThrow(message);
  });
});
