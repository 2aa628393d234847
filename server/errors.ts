/** Inbound message was not a byte sequence (e.g. a text frame). */
export class InvalidFrameType extends Error {
  readonly code = 'invalid_frame_type';

  constructor(readonly received: string) {
    super(`Unexpected message type ${received}, expected binary audio`);
    this.name = 'InvalidFrameType';
  }
}

/** The recognizer rejected or failed on a frame. */
export class DecodeFailure extends Error {
  readonly code = 'decode_failure';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DecodeFailure';
  }

  static from(err: unknown): DecodeFailure {
    if (err instanceof DecodeFailure) return err;
    const message = err instanceof Error ? err.message : String(err);
    return new DecodeFailure(`Recognizer failed: ${message}`, { cause: err });
  }
}
