import 'dotenv/config';
import { loadConfig } from './config';
import { createLogger, type Logger } from './logger';
import { SpeechServer } from './speech_server';
import { loadUpstreamModel } from './upstream/upstream_model';

/** Loads config and the model, then starts listening. */
export async function main(env: NodeJS.ProcessEnv = process.env): Promise<{ server: SpeechServer; log: Logger }> {
  const config = loadConfig(env);
  const log = createLogger('main', { debug: config.debug });

  // Loaded once and shared read-only by every connection
  log.info(`Loading recognition model from ${config.upstreamUrl}...`);
  const model = loadUpstreamModel(config.upstreamUrl, {
    logger: createLogger('upstream', { debug: config.debug }),
    connectTimeoutMs: config.upstreamTimeoutMs,
  });
  log.info(`Model loaded: ${model.name}`);

  const server = new SpeechServer(model, {
    host: config.host,
    port: config.port,
    sampleRate: config.sampleRate,
    heartbeatMs: config.heartbeatMs,
    loggers: {
      server: createLogger('stt-server', { debug: config.debug }),
      connection: createLogger('conn', { debug: config.debug }),
      session: createLogger('session', { debug: config.debug }),
    },
  });

  await server.start();
  log.info('Server is running and accepting connections...');
  return { server, log };
}

function handleSignals(server: SpeechServer, log: Logger, exit: (code: number) => void) {
  let shuttingDown = false;

  async function shutdown(signal: string) {
    if (shuttingDown) return;
    shuttingDown = true;
    log.info(`Received ${signal}, shutting down...`);
    try {
      await server.stop();
    } catch (err) {
      log.error('Error during shutdown:', err);
      exit(1);
      return;
    }
    exit(0);
  }

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('unhandledRejection', (reason) => {
    log.error('Unhandled rejection:', reason);
  });
}

/** Process entry: any start-up failure is logged and exits with code 1. */
export async function run(
  env: NodeJS.ProcessEnv = process.env,
  exit: (code: number) => void = (code) => process.exit(code),
): Promise<void> {
  try {
    const { server, log } = await main(env);
    handleSignals(server, log, exit);
  } catch (err) {
    createLogger('main').error('Fatal startup error:', err);
    exit(1);
  }
}

if (require.main === module) {
  void run();
}
