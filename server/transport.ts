import WebSocket, { type RawData } from 'ws';
import { createLogger, type Logger } from './logger';

export type InboundMessage = Buffer | Uint8Array | ArrayBuffer | string;

export interface Transport {
  readonly peer: string;
  readonly messages: AsyncIterable<InboundMessage>;
  send(message: string): Promise<void>;
}

/** The slice of a `ws` socket the transport needs. */
export interface ClientSocket {
  readonly readyState: number;
  on(event: 'message', listener: (data: RawData, isBinary: boolean) => void): this;
  on(event: 'close', listener: () => void): this;
  on(event: 'error', listener: (err: Error) => void): this;
  send(data: string, cb: (err?: Error) => void): void;
}

export function toBuffer(data: RawData): Buffer {
  if (Array.isArray(data)) return Buffer.concat(data);
  if (Buffer.isBuffer(data)) return data;
  return Buffer.from(data);
}

/**
 * Push-to-pull queue: socket events go in, the connection loop pulls
 * them out in arrival order. Ends when the socket closes.
 */
class InboundQueue implements AsyncIterableIterator<InboundMessage> {
  private buffered: InboundMessage[] = [];
  private waiting?: (result: IteratorResult<InboundMessage>) => void;
  private ended = false;

  push(message: InboundMessage) {
    if (this.ended) return;
    const waiting = this.waiting;
    if (waiting) {
      this.waiting = undefined;
      waiting({ value: message, done: false });
      return;
    }
    this.buffered.push(message);
  }

  end() {
    if (this.ended) return;
    this.ended = true;
    const waiting = this.waiting;
    if (waiting) {
      this.waiting = undefined;
      waiting({ value: undefined, done: true });
    }
  }

  next(): Promise<IteratorResult<InboundMessage>> {
    const message = this.buffered.shift();
    if (message !== undefined) return Promise.resolve({ value: message, done: false });
    if (this.ended) return Promise.resolve({ value: undefined, done: true });
    return new Promise((resolve) => {
      this.waiting = resolve;
    });
  }

  return(): Promise<IteratorResult<InboundMessage>> {
    this.buffered = [];
    this.end();
    return Promise.resolve({ value: undefined, done: true });
  }

  [Symbol.asyncIterator]() {
    return this;
  }
}

export function socketTransport(socket: ClientSocket, peer: string, log: Logger = createLogger('conn')): Transport {
  const queue = new InboundQueue();

  socket.on('message', (data, isBinary) => {
    const buf = toBuffer(data);
    queue.push(isBinary ? buf : buf.toString('utf8'));
  });
  socket.on('close', () => queue.end());
  // ws emits 'close' after 'error', which ends the queue
  socket.on('error', (err) => log.warn(`Socket error from ${peer}: ${err.message}`));

  return {
    peer,
    messages: queue,
    send(message) {
      return new Promise((resolve, reject) => {
        if (socket.readyState !== WebSocket.OPEN) {
          reject(new Error(`Connection to ${peer} is not open`));
          return;
        }
        socket.send(message, (err) => (err ? reject(err) : resolve()));
      });
    },
  };
}
