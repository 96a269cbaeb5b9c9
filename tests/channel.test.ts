import { describe, it, expect } from 'vitest';
import { createChannel } from '../src/server/pipeline/Channel.js';
import { ChannelClosedError } from '../src/server/types/errors.js';
import { collect } from './helpers.js';

describe('createChannel', () => {
  it('delivers items in FIFO order and ends once the sender closes', async () => {
    const [tx, rx] = createChannel<number>('numbers');
    tx.send(1);
    tx.send(2);
    tx.send(3);
    tx.close();

    expect(await collect(rx)).toEqual([1, 2, 3]);
  });

  it('wakes a waiting receiver when an item arrives', async () => {
    const [tx, rx] = createChannel<string>('late');
    const pending = rx.recv();
    tx.send('hello');

    expect(await pending).toEqual({ done: false, value: 'hello' });
  });

  it('keeps the stream open until every cloned sender has closed', async () => {
    const [tx, rx] = createChannel<string>('fan-in');
    const a = tx.clone();
    const b = tx.clone();
    tx.close();

    a.send('a');
    a.close();
    expect(await rx.recv()).toEqual({ done: false, value: 'a' });

    const next = rx.recv();
    b.send('b');
    b.close();
    expect(await next).toEqual({ done: false, value: 'b' });
    expect(await rx.recv()).toEqual({ done: true, value: undefined });
  });

  it('treats close as idempotent per handle', async () => {
    const [tx, rx] = createChannel<number>('idempotent');
    const other = tx.clone();
    tx.close();
    tx.close();
    other.send(7);
    other.close();

    expect(await collect(rx)).toEqual([7]);
  });

  it('rejects sends on a closed sender', () => {
    const [tx] = createChannel<number>('closed');
    tx.close();

    expect(tx.closed).toBe(true);
    expect(() => tx.send(1)).toThrow(ChannelClosedError);
    expect(() => tx.clone()).toThrow(ChannelClosedError);
  });

  it('rejects sends after the receiver has closed', async () => {
    const [tx, rx] = createChannel<number>('dropped');
    tx.send(1);
    rx.close();

    expect(() => tx.send(2)).toThrow("Channel 'dropped' has no receiver");
    expect(await rx.recv()).toEqual({ done: true, value: undefined });
  });
});
