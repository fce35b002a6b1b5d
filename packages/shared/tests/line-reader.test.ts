import { PassThrough } from 'node:stream';
import { describe, expect, it } from 'vitest';
import { ProtocolError, TimeoutError } from '../src/errors.js';
import { LineReader } from '../src/line-reader.js';

describe('LineReader', () => {
  it('splits chunks on newlines and drops blank lines', async () => {
    const stream = new PassThrough();
    const reader = new LineReader(stream);

    stream.write('{"a":1}\n\n  \n{"b"');
    stream.write(':2}\r\n');

    expect(await reader.readLine(100)).toBe('{"a":1}');
    expect(await reader.readLine(100)).toBe('{"b":2}');
  });

  it('decodes a character split across two chunks', async () => {
    const stream = new PassThrough();
    const reader = new LineReader(stream);
    const bytes = Buffer.from('{"d":"café"}\n', 'utf-8');
    const split = bytes.indexOf(0xc3) + 1;

    stream.write(bytes.subarray(0, split));
    stream.write(bytes.subarray(split));

    expect(await reader.readLine(500)).toBe('{"d":"café"}');
  });

  it('waits for a line that has not arrived yet', async () => {
    const stream = new PassThrough();
    const reader = new LineReader(stream);

    const pending = reader.readLine(1_000);
    setTimeout(() => stream.write('late\n'), 10);

    expect(await pending).toBe('late');
  });

  it('times out and queues the late line for the next read', async () => {
    const stream = new PassThrough();
    const reader = new LineReader(stream);

    await expect(reader.readLine(20)).rejects.toBeInstanceOf(TimeoutError);

    stream.write('after-timeout\n');
    expect(await reader.readLine(100)).toBe('after-timeout');
  });

  it('refuses a second concurrent read', async () => {
    const stream = new PassThrough();
    const reader = new LineReader(stream);

    const first = reader.readLine(1_000);
    await expect(reader.readLine(1_000)).rejects.toBeInstanceOf(ProtocolError);

    stream.write('only\n');
    expect(await first).toBe('only');
  });

  it('delivers an unterminated last line, then null at end of stream', async () => {
    const stream = new PassThrough();
    const reader = new LineReader(stream);

    stream.end('tail');

    expect(await reader.readLine(100)).toBe('tail');
    expect(await reader.readLine(100)).toBeNull();
    expect(reader.exhausted).toBe(true);
  });

  it('resolves a pending read with null on close', async () => {
    const stream = new PassThrough();
    const reader = new LineReader(stream);

    const pending = reader.readLine(1_000);
    reader.close();

    expect(await pending).toBeNull();
    expect(await reader.readLine(100)).toBeNull();
  });
});
