export interface ServerConfig {
  host: string;
  port: number;
  sampleRate: number;
  upstreamUrl: string;
  /** Ping interval for connected clients; 0 disables the heartbeat */
  heartbeatMs: number;
  /** How long an upstream session may take to open */
  upstreamTimeoutMs: number;
  debug: boolean;
}

const DEFAULT_HOST = '0.0.0.0';
const DEFAULT_PORT = 2700;
const DEFAULT_SAMPLE_RATE = 16000;
const DEFAULT_HEARTBEAT_MS = 15000;
const DEFAULT_UPSTREAM_TIMEOUT_MS = 10000;

function parseInteger(env: NodeJS.ProcessEnv, key: string, fallback: number, allowZero = false): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0 || (value === 0 && !allowZero)) {
    throw new Error(`${key} must be a ${allowZero ? 'non-negative' : 'positive'} integer, got "${raw}"`);
  }
  return value;
}

function requireEnv(env: NodeJS.ProcessEnv, key: string): string {
  const value = env[key]?.trim();
  if (!value) {
    throw new Error(`Missing required environment variable: ${key}`);
  }
  return value;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  return {
    host: env.STT_HOST?.trim() || DEFAULT_HOST,
    port: parseInteger(env, 'STT_PORT', DEFAULT_PORT),
    sampleRate: parseInteger(env, 'STT_SAMPLE_RATE', DEFAULT_SAMPLE_RATE),
    upstreamUrl: requireEnv(env, 'STT_UPSTREAM_URL'),
    heartbeatMs: parseInteger(env, 'STT_HEARTBEAT_MS', DEFAULT_HEARTBEAT_MS, true),
    upstreamTimeoutMs: parseInteger(env, 'STT_UPSTREAM_TIMEOUT_MS', DEFAULT_UPSTREAM_TIMEOUT_MS),
    debug: env.LOG_DEBUG === '1',
  };
}
