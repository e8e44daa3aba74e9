import type { Duplex } from 'stream';
import { IOError } from '../utils/errors';
import type { Transport } from './transport';

export interface StreamTransportOptions {
  /** Reject a read that waits longer than this. No limit by default. */
  readTimeoutMs?: number;
}

interface PendingRead {
  length: number;
  resolve: (data: Buffer) => void;
  reject: (error: Error) => void;
  timeoutId?: NodeJS.Timeout;
}

/**
 * Transport over any Node duplex stream (serial port, socket, pipe).
 *
 * Incoming chunks are buffered until a reader asks for them; readers are
 * served strictly in the order they called `read`.
 */
export class StreamTransport implements Transport {
  private buffer: Buffer = Buffer.alloc(0);
  private pendingReads: PendingRead[] = [];
  private failure: IOError | null = null;

  private readonly onData = (chunk: Buffer | string): void => {
    this.buffer = Buffer.concat([this.buffer, typeof chunk === 'string' ? Buffer.from(chunk) : chunk]);
    this.servePendingReads();
  };

  private readonly onError = (error: Error): void => {
    this.fail(new IOError('Stream error', error));
  };

  private readonly onClose = (): void => {
    this.fail(new IOError('Stream closed'));
  };

  constructor(
    protected stream: Duplex,
    private options: StreamTransportOptions = {}
  ) {
    stream.on('data', this.onData);
    stream.on('error', this.onError);
    stream.on('close', this.onClose);
  }

  /** Bytes received but not read yet */
  get buffered(): number {
    return this.buffer.length;
  }

  read(length: number): Promise<Buffer> {
    if (this.pendingReads.length === 0 && this.buffer.length >= length) {
      return Promise.resolve(this.take(length));
    }
    if (this.failure) {
      return Promise.reject(this.failure);
    }

    return new Promise<Buffer>((resolve, reject) => {
      const pending: PendingRead = { length, resolve, reject };
      const { readTimeoutMs } = this.options;

      if (readTimeoutMs !== undefined) {
        pending.timeoutId = setTimeout(() => {
          const index = this.pendingReads.indexOf(pending);
          if (index !== -1) {
            this.pendingReads.splice(index, 1);
            reject(new IOError(`Read of ${length} bytes timed out after ${readTimeoutMs}ms`));
          }
        }, readTimeoutMs);
      }

      this.pendingReads.push(pending);
    });
  }

  write(data: Buffer): Promise<number> {
    if (this.failure) {
      return Promise.reject(this.failure);
    }

    return new Promise((resolve, reject) => {
      this.stream.write(data, (error?: Error | null) => {
        if (error) {
          reject(new IOError('Write failed', error));
          return;
        }
        resolve(data.length);
      });
    });
  }

  async close(): Promise<void> {
    this.detach();
    this.fail(new IOError('Transport closed'));
    this.stream.destroy();
  }

  protected detach(): void {
    this.stream.removeListener('data', this.onData);
    this.stream.removeListener('error', this.onError);
    this.stream.removeListener('close', this.onClose);
  }

  protected fail(error: IOError): void {
    if (this.failure) {
      return;
    }
    this.failure = error;

    for (const pending of this.pendingReads) {
      clearTimeout(pending.timeoutId);
      pending.reject(error);
    }
    this.pendingReads = [];
  }

  private servePendingReads(): void {
    while (this.pendingReads.length > 0 && this.buffer.length >= this.pendingReads[0].length) {
      const pending = this.pendingReads.shift();
      if (!pending) {
        return;
      }
      clearTimeout(pending.timeoutId);
      pending.resolve(this.take(pending.length));
    }
  }

  private take(length: number): Buffer {
    const data = this.buffer.subarray(0, length);
    this.buffer = this.buffer.subarray(length);
    return Buffer.from(data);
  }
}
