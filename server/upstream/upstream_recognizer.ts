import { once } from 'node:events';
import WebSocket, { type RawData } from 'ws';
import type { SessionEndMessage, SessionStartMessage, UpstreamEvent } from '../../types/events';
import { FrameChunker } from '../audio/frame_chunker';
import { DecodeFailure } from '../errors';
import { createLogger, type Logger } from '../logger';
import type { Recognizer, RecognizerResult } from '../recognizer';
import { toBuffer } from '../transport';

/** The slice of a `ws` client socket the recognizer needs. */
export interface UpstreamSocket {
  on(event: 'open', listener: () => void): this;
  on(event: 'message', listener: (data: RawData) => void): this;
  on(event: 'close', listener: () => void): this;
  on(event: 'error', listener: (err: Error) => void): this;
  send(data: string | Buffer): void;
  close(): void;
}

export interface ConnectOptions {
  handshakeTimeout: number;
}

export type SocketFactory = (url: string, options: ConnectOptions) => UpstreamSocket;

export const connectWebSocket: SocketFactory = (url, { handshakeTimeout }) =>
  new WebSocket(url, { perMessageDeflate: false, handshakeTimeout });

export const DEFAULT_CONNECT_TIMEOUT_MS = 10000;

export interface UpstreamMeta {
  sessionId: string;
  speakerId: string;
  sampleRate: number;
}

export interface UpstreamRecognizerOptions {
  connect?: SocketFactory;
  logger?: Logger;
  /** Max frames held while the socket drains (default: 200, ~4s of 20ms frames) */
  maxQueue?: number;
  /** Give up on a session that has not opened after this long (default: 10000) */
  connectTimeoutMs?: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function parseUpstreamEvent(payload: unknown): UpstreamEvent | undefined {
  if (!isRecord(payload)) return undefined;
  const { type, text } = payload;
  if (type === 'partial' || type === 'final') {
    return typeof text === 'string' ? { type, text } : undefined;
  }
  if (type === 'error') {
    return {
      type,
      message: typeof payload.message === 'string' ? payload.message : 'unknown upstream error',
      code: typeof payload.code === 'string' ? payload.code : undefined,
    };
  }
  if (type === 'metrics') return { ...payload, type };
  return undefined;
}

/**
 * Recognizer backed by a streaming STT service. Audio is re-sliced into
 * 20ms frames and forwarded; partial/final events received in between are
 * reported by the next feed().
 */
export class UpstreamRecognizer implements Recognizer {
  private ws?: UpstreamSocket;
  private connecting?: Promise<void>;
  private queue: Buffer[] = [];
  private readonly maxQueue: number;
  private open = false;
  private closing = false;
  private flushScheduled = false;
  private lost?: Error;
  private failure?: Error;
  private latestPartial = '';
  private finals: string[] = [];
  private boundaryPending = false;
  // set by reset(); events until the next feed belong to the flushed utterance
  private stale = false;
  private readonly connectTimeoutMs: number;
  private readonly chunker: FrameChunker;
  private readonly connectSocket: SocketFactory;
  private readonly log: Logger;

  constructor(private readonly url: string, private readonly meta: UpstreamMeta, options: UpstreamRecognizerOptions = {}) {
    this.connectSocket = options.connect ?? connectWebSocket;
    this.log = options.logger ?? createLogger('upstream');
    this.maxQueue = options.maxQueue ?? 200;
    this.connectTimeoutMs = options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS;
    this.chunker = new FrameChunker({ sampleRate: meta.sampleRate, padTail: true });
    this.chunker.on('data', (frame: Buffer) => this.writeFrame(frame));
  }

  async feed(frame: Buffer): Promise<RecognizerResult> {
    if (this.closing) throw new Error('Upstream recognizer is closed');
    await this.ensureConnected();
    const failure = this.failure ?? this.lost;
    this.failure = undefined;
    if (failure) {
      throw new DecodeFailure(`Upstream STT failed: ${failure.message}`, { cause: failure });
    }
    this.stale = false;
    this.chunker.write(frame);
    return this.takeResult();
  }

  /** Drops results not yet reported; called after each end-of-stream flush. */
  reset() {
    this.finals = [];
    this.boundaryPending = false;
    this.latestPartial = '';
    this.stale = true;
  }

  async close(): Promise<void> {
    if (this.closing) return;
    this.closing = true;
    const ended = once(this.chunker, 'end');
    this.chunker.end();
    await ended;
    const ws = this.ws;
    if (!ws) return;
    if (this.open) {
      this.flush();
      const end: SessionEndMessage = { type: 'session.end' };
      try {
        ws.send(JSON.stringify(end));
      } catch (err) {
        this.log.warn(`session.end failed for ${this.meta.sessionId}:`, err);
      }
    }
    ws.close();
  }

  private ensureConnected(): Promise<void> {
    if (this.open || this.lost) return Promise.resolve();
    this.connecting ??= this.connect().finally(() => {
      this.connecting = undefined;
    });
    return this.connecting;
  }

  private connect(): Promise<void> {
    return new Promise((resolve, reject) => {
      const ws = this.connectSocket(this.url, { handshakeTimeout: this.connectTimeoutMs });
      this.ws = ws;
      let opened = false;
      const timer = setTimeout(() => {
        this.ws = undefined;
        reject(new Error(`Upstream ${this.url} did not open within ${this.connectTimeoutMs}ms`));
        ws.close();
      }, this.connectTimeoutMs);

      ws.on('open', () => {
        clearTimeout(timer);
        if (this.ws !== ws) {
          ws.close();
          return;
        }
        opened = true;
        this.open = true;
        const start: SessionStartMessage = {
          type: 'session.start',
          session_id: this.meta.sessionId,
          speaker_id: this.meta.speakerId,
          sample_rate: this.meta.sampleRate,
          format: 'pcm_s16le',
          transport: 'binary',
          meta: { app: 'stt-session-server' },
        };
        ws.send(JSON.stringify(start));
        this.log.debug(`Upstream session ${this.meta.sessionId} opened for ${this.meta.speakerId}`);
        resolve();
      });
      ws.on('message', (data) => {
        if (this.ws === ws) this.handleMessage(data);
      });
      ws.on('close', () => {
        clearTimeout(timer);
        if (this.ws !== ws) return;
        this.open = false;
        this.queue = [];
        this.flushScheduled = false;
        if (!opened) {
          reject(new Error(`Upstream ${this.url} closed before the session opened`));
        } else if (!this.closing) {
          this.lost = new Error('upstream connection closed');
          this.log.warn(`Upstream session ${this.meta.sessionId} closed unexpectedly`);
        }
      });
      ws.on('error', (err) => {
        clearTimeout(timer);
        if (this.ws !== ws) return;
        if (!opened) {
          reject(err);
          return;
        }
        this.failure = err;
        this.log.error(`Upstream session ${this.meta.sessionId} error:`, err);
      });
    });
  }

  private handleMessage(data: RawData) {
    let payload: unknown;
    try {
      payload = JSON.parse(toBuffer(data).toString('utf8'));
    } catch (err) {
      this.log.debug(`Ignoring malformed upstream message: ${err instanceof Error ? err.message : String(err)}`);
      return;
    }
    const ev = parseUpstreamEvent(payload);
    if (!ev) {
      this.log.debug('Ignoring unrecognized upstream message');
      return;
    }
    if (this.stale && (ev.type === 'partial' || ev.type === 'final')) {
      this.log.debug(`Dropping late ${ev.type} after flush: ${ev.text}`);
      return;
    }
    switch (ev.type) {
      case 'partial':
        this.latestPartial = ev.text;
        break;
      case 'final':
        this.boundaryPending = true;
        if (ev.text) this.finals.push(ev.text);
        this.latestPartial = '';
        break;
      case 'error':
        this.failure = new Error(ev.code ? `${ev.message} (${ev.code})` : ev.message);
        break;
      case 'metrics':
        break;
    }
  }

  private takeResult(): RecognizerResult {
    if (this.boundaryPending) {
      const text = this.finals.join(' ');
      this.finals = [];
      this.boundaryPending = false;
      return { boundary: true, text };
    }
    return { boundary: false, text: this.latestPartial };
  }

  private writeFrame(frame: Buffer) {
    if (!this.ws || !this.open) return;
    // backpressure: drop oldest when too many
    if (this.queue.length >= this.maxQueue) this.queue.shift();
    this.queue.push(frame);
    this.scheduleFlush();
  }

  private scheduleFlush() {
    if (this.flushScheduled) return;
    this.flushScheduled = true;
    setTimeout(() => {
      this.flushScheduled = false;
      this.flush();
    }, 0);
  }

  private flush() {
    const ws = this.ws;
    if (!ws || !this.open) return;
    let frame = this.queue.shift();
    while (frame && this.open) {
      ws.send(frame);
      frame = this.queue.shift();
    }
  }
}
