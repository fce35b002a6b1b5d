/**
 * Pull-based line reader over a readable stream.
 *
 * Chunks are buffered and split on "\n"; blank lines are dropped. At most
 * one readLine() may be pending at a time. Lines that arrive while nobody
 * is waiting (including after a read timed out) are queued for the next
 * read.
 */

import type { Readable } from 'node:stream';
import { StringDecoder } from 'node:string_decoder';
import { ProtocolError, TimeoutError } from './errors.js';

interface PendingRead {
  resolve: (line: string | null) => void;
  timer: ReturnType<typeof setTimeout>;
}

export class LineReader {
  private stream: Readable;
  private buffer = '';
  // Holds the bytes of a character split across chunks
  private decoder = new StringDecoder('utf8');
  private lines: string[] = [];
  private pending: PendingRead | null = null;
  private ended = false;

  constructor(stream: Readable) {
    this.stream = stream;
    this.stream.on('data', this.onData);
    this.stream.on('end', this.onEnd);
    this.stream.on('close', this.onEnd);
    this.stream.on('error', this.onError);
  }

  /** True once the stream ended and every buffered line was consumed. */
  get exhausted(): boolean {
    return this.ended && this.lines.length === 0;
  }

  /**
   * Resolve with the next line, or null at end of stream.
   * Rejects with TimeoutError when no line arrives within timeoutMs.
   */
  readLine(timeoutMs: number): Promise<string | null> {
    const queued = this.lines.shift();
    if (queued !== undefined) return Promise.resolve(queued);
    if (this.ended) return Promise.resolve(null);
    if (this.pending) {
      return Promise.reject(new ProtocolError('Another read is already pending on this stream'));
    }

    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pending = null;
        reject(new TimeoutError(`No line received within ${timeoutMs}ms`, timeoutMs));
      }, timeoutMs);
      this.pending = { resolve, timer };
    });
  }

  /** Detach from the stream; a pending read resolves with null. */
  close(): void {
    this.stream.off('data', this.onData);
    this.stream.off('end', this.onEnd);
    this.stream.off('close', this.onEnd);
    this.stream.off('error', this.onError);
    this.ended = true;
    this.lines = [];
    this.settle(null);
  }

  private onData = (chunk: Buffer | string): void => {
    this.buffer += typeof chunk === 'string' ? chunk : this.decoder.write(chunk);
    const parts = this.buffer.split('\n');
    // Keep the last (possibly incomplete) segment in the buffer
    this.buffer = parts.pop() ?? '';
    for (const part of parts) {
      this.push(part);
    }
  };

  private onEnd = (): void => {
    if (this.ended) return;
    this.ended = true;
    this.buffer += this.decoder.end();
    if (this.buffer) {
      this.push(this.buffer);
      this.buffer = '';
    }
    if (this.lines.length === 0) this.settle(null);
  };

  private onError = (err: Error): void => {
    console.warn(`[line-reader] Stream error: ${err.message}`);
    this.onEnd();
  };

  private push(raw: string): void {
    const line = raw.trim();
    if (!line) return;
    if (this.pending) {
      this.settle(line);
    } else {
      this.lines.push(line);
    }
  }

  private settle(line: string | null): void {
    const pending = this.pending;
    if (!pending) return;
    this.pending = null;
    clearTimeout(pending.timer);
    pending.resolve(line);
  }
}
