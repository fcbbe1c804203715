import { describe, it, expect } from '@jest/globals';
import { BackpressureChannel, DroppingChannel } from '../../src/lib/channel.js';

interface Item {
  id: number;
}

function summary(dropped: number): Item {
  return { id: -dropped };
}

describe('DroppingChannel', () => {
  it('should deliver items in order', async () => {
    const channel = new DroppingChannel<Item>(4, summary);
    channel.push({ id: 1 });
    channel.push({ id: 2 });

    await expect(channel.receive()).resolves.toEqual({ id: 1 });
    await expect(channel.receive()).resolves.toEqual({ id: 2 });
  });

  it('should hand items straight to a waiting receiver', async () => {
    const channel = new DroppingChannel<Item>(1, summary);
    const pending = channel.receive();

    channel.push({ id: 7 });

    await expect(pending).resolves.toEqual({ id: 7 });
    expect(channel.size).toBe(0);
  });

  it('should drop the oldest items when full and report how many', () => {
    const channel = new DroppingChannel<Item>(2, summary);
    for (let id = 1; id <= 5; id++) {
      channel.push({ id });
    }

    expect(channel.dropped).toBe(3);
    expect(channel.drain()).toEqual([{ id: -3 }, { id: 4 }, { id: 5 }]);
    expect(channel.dropped).toBe(0);
  });

  it('should refuse items once closed', () => {
    const channel = new DroppingChannel<Item>(2, summary);
    channel.close();

    expect(channel.push({ id: 1 })).toBe(false);
    expect(channel.isClosed).toBe(true);
  });

  it('should end iteration after close once drained', async () => {
    const channel = new DroppingChannel<Item>(4, summary);
    channel.push({ id: 1 });
    channel.push({ id: 2 });
    channel.close();

    const received: number[] = [];
    for await (const item of channel) {
      received.push(item.id);
    }

    expect(received).toEqual([1, 2]);
  });

  it('should release waiting receivers on close', async () => {
    const channel = new DroppingChannel<Item>(1, summary);
    const pending = channel.receive();

    channel.close();

    await expect(pending).resolves.toBeUndefined();
  });
});

describe('BackpressureChannel', () => {
  it('should accept items while there is room', async () => {
    const channel = new BackpressureChannel<Item>(2);

    await channel.send({ id: 1 });
    await channel.send({ id: 2 });

    expect(channel.size).toBe(2);
    expect(channel.waitingSenders).toBe(0);
  });

  it('should make senders wait until the consumer takes an item', async () => {
    const channel = new BackpressureChannel<Item>(1);
    await channel.send({ id: 1 });

    let delivered = false;
    const sending = channel.send({ id: 2 }).then(() => {
      delivered = true;
    });

    await Promise.resolve();
    expect(delivered).toBe(false);
    expect(channel.waitingSenders).toBe(1);

    await expect(channel.receive()).resolves.toEqual({ id: 1 });
    await sending;

    expect(delivered).toBe(true);
    await expect(channel.receive()).resolves.toEqual({ id: 2 });
  });

  it('should keep the items of waiting senders when closed', async () => {
    const channel = new BackpressureChannel<Item>(1);
    await channel.send({ id: 1 });
    const sending = channel.send({ id: 2 });

    channel.close();
    await sending;

    expect(channel.drain()).toEqual([{ id: 1 }, { id: 2 }]);
  });

  it('should reject sends after close', async () => {
    const channel = new BackpressureChannel<Item>(1);
    channel.close();

    await expect(channel.send({ id: 1 })).rejects.toThrow('Cannot send on a closed channel');
  });

  it('should reject a non-positive capacity', () => {
    expect(() => new BackpressureChannel<Item>(0)).toThrow(RangeError);
  });
});
