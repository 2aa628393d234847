export interface RecognizerResult {
  /** True when the engine settled a complete utterance on this call */
  boundary: boolean;
  /** Final text when boundary is true, interim text otherwise */
  text: string;
}

/**
 * Stateful incremental decoder. One instance per connection; feed() must
 * be called strictly sequentially.
 */
export interface Recognizer {
  feed(frame: Buffer): Promise<RecognizerResult>;
  /** Forget anything not yet reported; the next feed starts a new utterance */
  reset?(): void;
  close(): void | Promise<void>;
}

export interface RecognizerOptions {
  sampleRate: number;
  /** Identifies the owning connection in logs and upstream metadata */
  label: string;
}

/** Shared, read-only handle loaded once per process. */
export interface RecognitionModel {
  readonly name: string;
  createRecognizer(options: RecognizerOptions): Recognizer;
}
