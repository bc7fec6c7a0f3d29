import { describe, it, expect } from 'vitest';
import { AsyncChannel } from './AsyncChannel.js';

async function drain<T>(iterable: AsyncIterable<T>): Promise<T[]> {
  const values: T[] = [];
  for await (const value of iterable) {
    values.push(value);
  }
  return values;
}

describe('AsyncChannel', () => {
  it('should deliver values pushed before iteration', async () => {
    const channel = new AsyncChannel<number>();
    channel.push(1);
    channel.push(2);
    channel.close();

    expect(await drain(channel)).toEqual([1, 2]);
  });

  it('should wake a waiting consumer', async () => {
    const channel = new AsyncChannel<string>();
    const pending = channel.next();

    channel.push('a');

    expect(await pending).toEqual({ value: 'a', done: false });
  });

  it('should finish waiting consumers on close', async () => {
    const channel = new AsyncChannel<string>();
    const pending = channel.next();

    channel.close();

    expect(await pending).toEqual({ value: undefined, done: true });
  });

  it('should refuse values after close', () => {
    const channel = new AsyncChannel<number>();
    channel.close();

    expect(channel.push(1)).toBe(false);
    expect(channel.isClosed).toBe(true);
  });

  it('should reject once after queued values on failure', async () => {
    const channel = new AsyncChannel<number>();
    channel.push(1);
    channel.fail(new Error('boom'));

    expect(await channel.next()).toEqual({ value: 1, done: false });
    await expect(channel.next()).rejects.toThrow('boom');
    expect(await channel.next()).toEqual({ value: undefined, done: true });
  });

  it('should reject a waiting consumer on failure', async () => {
    const channel = new AsyncChannel<number>();
    const pending = channel.next();

    channel.fail(new Error('source failed'));

    await expect(pending).rejects.toThrow('source failed');
  });

  it('should discard queued values when the consumer returns early', async () => {
    const channel = new AsyncChannel<number>();
    channel.push(1);
    channel.push(2);

    for await (const value of channel) {
      expect(value).toBe(1);
      break;
    }

    expect(channel.isClosed).toBe(true);
    expect(await channel.next()).toEqual({ value: undefined, done: true });
  });

  it('should deliver a long queue in push order', async () => {
    const channel = new AsyncChannel<number>();
    for (let i = 0; i < 100; i++) {
      channel.push(i);
    }
    channel.close();

    const values: number[] = [];
    for await (const value of channel) {
      values.push(value);
    }

    expect(values).toEqual(Array.from({ length: 100 }, (_, i) => i));
  });

  it('should notify close listeners once from either side', async () => {
    const consumerSide = new AsyncChannel<number>();
    const producerSide = new AsyncChannel<number>();
    const calls: string[] = [];
    consumerSide.onClose(() => calls.push('consumer'));
    producerSide.onClose(() => calls.push('producer'));

    await consumerSide.return();
    producerSide.fail(new Error('gone'));
    producerSide.close();

    expect(calls).toEqual(['consumer', 'producer']);
  });

  it('should run a close listener right away on a closed channel', () => {
    const channel = new AsyncChannel<number>();
    channel.close();
    let called = false;

    channel.onClose(() => {
      called = true;
    });

    expect(called).toBe(true);
  });
});
