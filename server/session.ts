import type { TranscriptEvent } from '../types/events';
import { DecodeFailure } from './errors';
import { createLogger, type Logger } from './logger';
import type { RecognitionModel, Recognizer } from './recognizer';

export const DEFAULT_SAMPLE_RATE = 16000;

export type Decision =
  | { kind: 'flushed'; event: TranscriptEvent }
  | { kind: 'updated' }
  | { kind: 'failed'; error: DecodeFailure };

export interface SessionOptions {
  sampleRate?: number;
  label?: string;
  logger?: Logger;
}

export interface SessionSnapshot {
  partial?: string;
  final?: string;
}

/**
 * Recognition state for one connection. Tracks the latest interim and
 * settled text and flushes the best of them on every zero-length frame.
 */
export class Session {
  readonly label: string;
  private readonly recognizer: Recognizer;
  private readonly log: Logger;
  private lastPartial?: string;
  private lastFinal?: string;
  private busy = false;
  private closed = false;

  constructor(model: RecognitionModel, options: SessionOptions = {}) {
    this.label = options.label ?? 'anonymous';
    this.log = options.logger ?? createLogger('session');
    this.recognizer = model.createRecognizer({
      sampleRate: options.sampleRate ?? DEFAULT_SAMPLE_RATE,
      label: this.label,
    });
    this.log.debug(`Recognizer initialized for ${this.label} (model=${model.name})`);
  }

  async accept(frame: Buffer): Promise<Decision> {
    if (this.closed) throw new Error(`Session ${this.label} is closed`);
    if (this.busy) throw new Error(`Session ${this.label} is already processing a frame`);

    if (frame.length === 0) return this.flush();

    this.busy = true;
    try {
      const result = await this.recognizer.feed(frame);
      if (result.boundary) {
        if (result.text) {
          this.log.debug(`Final result: ${result.text}`);
          this.lastFinal = result.text;
        }
      } else if (result.text) {
        this.log.debug(`Partial result: ${result.text}`);
        this.lastPartial = result.text;
      }
      return { kind: 'updated' };
    } catch (err) {
      return { kind: 'failed', error: DecodeFailure.from(err) };
    } finally {
      this.busy = false;
    }
  }

  snapshot(): SessionSnapshot {
    return { partial: this.lastPartial, final: this.lastFinal };
  }

  /** Releases the recognizer. Safe to call more than once. */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.recognizer.close();
  }

  private flush(): Decision {
    let text = '';
    if (this.lastFinal) {
      text = this.lastFinal;
      this.log.debug(`Sending final result for ${this.label}: ${text}`);
    } else if (this.lastPartial) {
      text = this.lastPartial;
      this.log.debug(`Sending last partial as final result for ${this.label}: ${text}`);
    } else {
      this.log.debug(`No results for ${this.label}, sending empty text`);
    }
    this.lastPartial = undefined;
    this.lastFinal = undefined;
    this.recognizer.reset?.();
    return { kind: 'flushed', event: { text } };
  }
}
