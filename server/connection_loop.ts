import type { TranscriptEvent } from '../types/events';
import { DecodeFailure, InvalidFrameType } from './errors';
import { createLogger, type Logger } from './logger';
import type { Session } from './session';
import type { InboundMessage, Transport } from './transport';

export type MessageOutcome =
  | { ok: true; kind: 'flushed'; event: TranscriptEvent }
  | { ok: true; kind: 'updated' }
  | { ok: false; error: InvalidFrameType | DecodeFailure | Error };

export interface ConnectionSummary {
  frames: number;
  flushes: number;
  failures: number;
  skipped: number;
}

export function toFrame(message: InboundMessage): Buffer | InvalidFrameType {
  if (Buffer.isBuffer(message)) return message;
  if (message instanceof Uint8Array) return Buffer.from(message.buffer, message.byteOffset, message.byteLength);
  if (message instanceof ArrayBuffer) return Buffer.from(message);
  return new InvalidFrameType(typeof message);
}

/** Validates one message and runs it through the session. Never throws. */
export async function processMessage(session: Session, message: InboundMessage): Promise<MessageOutcome> {
  const frame = toFrame(message);
  if (frame instanceof InvalidFrameType) return { ok: false, error: frame };
  try {
    const decision = await session.accept(frame);
    switch (decision.kind) {
      case 'flushed':
        return { ok: true, kind: 'flushed', event: decision.event };
      case 'updated':
        return { ok: true, kind: 'updated' };
      case 'failed':
        return { ok: false, error: decision.error };
    }
  } catch (err) {
    return { ok: false, error: err instanceof Error ? err : new Error(String(err)) };
  }
}

async function deliver(transport: Transport, event: TranscriptEvent): Promise<MessageOutcome> {
  try {
    await transport.send(JSON.stringify({ text: event.text }));
    return { ok: true, kind: 'flushed', event };
  } catch (err) {
    return { ok: false, error: err instanceof Error ? err : new Error(String(err)) };
  }
}

/**
 * Drives one connection until its inbound sequence ends. A bad message is
 * logged and skipped; the session is released however the loop exits.
 */
export async function runConnection(
  transport: Transport,
  session: Session,
  log: Logger = createLogger('conn'),
): Promise<ConnectionSummary> {
  const summary: ConnectionSummary = { frames: 0, flushes: 0, failures: 0, skipped: 0 };
  try {
    for await (const message of transport.messages) {
      let outcome = await processMessage(session, message);
      if (outcome.ok && outcome.kind === 'flushed') {
        log.info(`End of stream from ${transport.peer}, sending ${JSON.stringify(outcome.event.text)}`);
        outcome = await deliver(transport, outcome.event);
      }

      if (outcome.ok) {
        summary.frames++;
        if (outcome.kind === 'flushed') summary.flushes++;
        log.debug(`Processed message chunk from ${transport.peer}`);
        continue;
      }

      if (outcome.error instanceof InvalidFrameType) {
        summary.skipped++;
        log.warn(`${outcome.error.message} from ${transport.peer}, skipping`);
      } else {
        summary.failures++;
        log.error(`Error processing message from ${transport.peer}:`, outcome.error);
      }
    }
  } finally {
    try {
      await session.close();
    } catch (err) {
      log.error(`Failed to release recognizer for ${transport.peer}:`, err);
    }
  }
  return summary;
}
