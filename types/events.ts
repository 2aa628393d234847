// Outgoing event sent to clients on every end-of-stream sentinel
export interface TranscriptEvent {
  text: string;
}

// Incoming WebSocket events from the upstream STT service
export interface PartialEvent {
  type: 'partial';
  text: string;
  utterance_id?: string;
  revision?: number;
}

export interface FinalEvent {
  type: 'final';
  text: string;
  utterance_id?: string;
  confidence?: number;
}

export interface ErrorEvent {
  type: 'error';
  message: string;
  code?: string;
}

export interface MetricsEvent {
  type: 'metrics';
  [key: string]: unknown;
}

// Outgoing WebSocket messages to the upstream STT service
export interface SessionStartMessage {
  type: 'session.start';
  session_id: string;
  speaker_id: string;
  sample_rate: number;
  format: 'pcm_s16le';
  transport: 'binary';
  meta?: {
    app: string;
    [key: string]: unknown;
  };
}

export interface SessionEndMessage {
  type: 'session.end';
}

export type UpstreamEvent = PartialEvent | FinalEvent | ErrorEvent | MetricsEvent;
