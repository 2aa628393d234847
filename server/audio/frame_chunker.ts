import { Transform, TransformCallback } from 'node:stream';

export interface FrameChunkerOptions {
  /** PCM16 mono sample rate (default: 16000) */
  sampleRate?: number;
  /** Frame duration in ms (default: 20) */
  frameMs?: number;
  /** Zero-pad the trailing partial frame on end instead of dropping it (default: false) */
  padTail?: boolean;
}

export function bytesPerFrame(sampleRate: number, frameMs: number): number {
  return Math.round((sampleRate * frameMs) / 1000) * 2;
}

/** Re-slices arbitrary PCM16 chunks into fixed-size frames. */
export class FrameChunker extends Transform {
  readonly frameBytes: number;
  private readonly padTail: boolean;
  private carry: Buffer = Buffer.alloc(0);

  constructor(options: FrameChunkerOptions = {}) {
    super({ readableObjectMode: true });
    this.frameBytes = bytesPerFrame(options.sampleRate ?? 16000, options.frameMs ?? 20);
    this.padTail = options.padTail ?? false;
  }

  _transform(chunk: Buffer, _: BufferEncoding, cb: TransformCallback) {
    // copy: frames may sit in a send queue after the caller reuses its buffer
    this.carry = Buffer.concat([this.carry, chunk]);
    while (this.carry.length >= this.frameBytes) {
      this.push(this.carry.subarray(0, this.frameBytes));
      this.carry = this.carry.subarray(this.frameBytes);
    }
    cb();
  }

  _flush(cb: TransformCallback) {
    if (this.padTail && this.carry.length) {
      const tail = Buffer.alloc(this.frameBytes);
      this.carry.copy(tail);
      this.push(tail);
    }
    this.carry = Buffer.alloc(0);
    cb();
  }
}
