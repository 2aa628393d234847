import { EventEmitter } from 'node:events';
import WebSocket from 'ws';
import type { Logger } from '../../server/logger';
import type { RecognitionModel, Recognizer, RecognizerOptions, RecognizerResult } from '../../server/recognizer';

export type Responder = (frame: Buffer) => RecognizerResult | Promise<RecognizerResult>;

/**
 * Frames are utf8 directives: "p:<text>" interim, "f:<text>" final,
 * "x:<reason>" recognizer error.
 */
export const directive: Responder = (frame) => {
  const raw = frame.toString('utf8');
  const text = raw.slice(2);
  if (raw.startsWith('f:')) return { boundary: true, text };
  if (raw.startsWith('x:')) throw new Error(text);
  return { boundary: false, text };
};

export function audio(script: string): Buffer {
  return Buffer.from(script, 'utf8');
}

export const EOS = Buffer.alloc(0);

export class ScriptedRecognizer implements Recognizer {
  readonly fed: Buffer[] = [];
  resets = 0;
  closed = 0;

  constructor(readonly options: RecognizerOptions, private readonly respond: Responder) {}

  async feed(frame: Buffer): Promise<RecognizerResult> {
    this.fed.push(frame);
    return this.respond(frame);
  }

  reset() {
    this.resets++;
  }

  close() {
    this.closed++;
  }
}

export class ScriptedModel implements RecognitionModel {
  readonly name = 'scripted';
  readonly recognizers: ScriptedRecognizer[] = [];

  constructor(private readonly makeResponder: () => Responder = () => directive) {}

  createRecognizer(options: RecognizerOptions): ScriptedRecognizer {
    const recognizer = new ScriptedRecognizer(options, this.makeResponder());
    this.recognizers.push(recognizer);
    return recognizer;
  }
}

export function silentLogger(): jest.Mocked<Logger> {
  return {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  };
}

/** Stands in for a server-side `ws` socket. */
export class FakeClientSocket extends EventEmitter {
  readyState: number = WebSocket.OPEN;
  sendError?: Error;
  readonly sent: string[] = [];
  readonly close = jest.fn((code?: number, reason?: string) => {
    this.readyState = WebSocket.CLOSED;
    this.emit('close', code, reason);
  });

  send(data: string, cb: (err?: Error) => void) {
    if (!this.sendError) this.sent.push(data);
    cb(this.sendError);
  }
}
