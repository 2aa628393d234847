import { randomUUID } from 'node:crypto';
import type { Logger } from '../logger';
import type { RecognitionModel, RecognizerOptions } from '../recognizer';
import { UpstreamRecognizer, type SocketFactory } from './upstream_recognizer';

export interface UpstreamModelOptions {
  connect?: SocketFactory;
  logger?: Logger;
  maxQueue?: number;
  connectTimeoutMs?: number;
}

/**
 * Read-only handle on an upstream STT endpoint. Shared by every
 * connection; each recognizer opens its own upstream session.
 */
export class UpstreamModel implements RecognitionModel {
  readonly name: string;

  constructor(readonly url: string, private readonly options: UpstreamModelOptions = {}) {
    this.name = `upstream ${new URL(url).host}`;
  }

  createRecognizer({ sampleRate, label }: RecognizerOptions): UpstreamRecognizer {
    return new UpstreamRecognizer(
      this.url,
      { sessionId: randomUUID(), speakerId: label, sampleRate },
      {
        connect: this.options.connect,
        logger: this.options.logger,
        maxQueue: this.options.maxQueue,
        connectTimeoutMs: this.options.connectTimeoutMs,
      },
    );
  }
}

export function loadUpstreamModel(url: string, options: UpstreamModelOptions = {}): UpstreamModel {
  let protocol: string;
  try {
    protocol = new URL(url).protocol;
  } catch (err) {
    throw new Error(`Invalid upstream STT url: ${url}`, { cause: err });
  }
  if (protocol !== 'ws:' && protocol !== 'wss:') {
    throw new Error(`Upstream STT url must use ws:// or wss://, got ${url}`);
  }
  const model = new UpstreamModel(url, options);
  Object.freeze(model);
  return model;
}
