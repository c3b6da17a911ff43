import { describe, it, expect } from 'vitest';
import { BoundedQueue } from '../../../src/application/BoundedQueue.js';

async function settle(): Promise<void> {
  await new Promise((resolve) => setImmediate(resolve));
}

describe('BoundedQueue', () => {
  describe('constructor', () => {
    it('should throw when capacity is not a positive integer', () => {
      expect(() => new BoundedQueue(0)).toThrow('Queue capacity must be a positive integer, got 0');
      expect(() => new BoundedQueue(1.5)).toThrow('Queue capacity must be a positive integer, got 1.5');
    });
  });

  describe('push() / shift()', () => {
    it('should deliver items in FIFO order', async () => {
      const queue = new BoundedQueue<number>(3);
      await queue.push(1);
      await queue.push(2);
      await queue.push(3);

      expect(await queue.shift()).toEqual({ done: false, value: 1 });
      expect(await queue.shift()).toEqual({ done: false, value: 2 });
      expect(await queue.shift()).toEqual({ done: false, value: 3 });
    });

    it('should suspend push while the queue is full', async () => {
      const queue = new BoundedQueue<string>(1);
      await queue.push('a');

      let accepted: boolean | null = null;
      void queue.push('b').then((result) => {
        accepted = result;
      });
      await settle();
      expect(accepted).toBeNull();
      expect(queue.size).toBe(1);

      expect(await queue.shift()).toEqual({ done: false, value: 'a' });
      await settle();
      expect(accepted).toBe(true);
      expect(await queue.shift()).toEqual({ done: false, value: 'b' });
    });

    it('should hand an item straight to a waiting consumer', async () => {
      const queue = new BoundedQueue<string>(1);
      const pending = queue.shift();

      expect(await queue.push('direct')).toBe(true);
      expect(await pending).toEqual({ done: false, value: 'direct' });
      expect(queue.size).toBe(0);
    });

    it('should keep undefined as a regular item', async () => {
      const queue = new BoundedQueue<undefined>(2);
      await queue.push(undefined);
      queue.close();

      expect(await queue.shift()).toEqual({ done: false, value: undefined });
      expect(await queue.shift()).toEqual({ done: true, value: undefined });
    });
  });

  describe('close()', () => {
    it('should let consumers drain buffered items before reporting done', async () => {
      const queue = new BoundedQueue<number>(2);
      await queue.push(1);
      await queue.push(2);
      queue.close();

      expect(queue.closed).toBe(true);
      expect(await queue.shift()).toEqual({ done: false, value: 1 });
      expect(await queue.shift()).toEqual({ done: false, value: 2 });
      expect(await queue.shift()).toEqual({ done: true, value: undefined });
    });

    it('should reject pushes after close', async () => {
      const queue = new BoundedQueue<number>(1);
      queue.close();

      expect(await queue.push(1)).toBe(false);
      expect(queue.size).toBe(0);
    });

    it('should resolve suspended pushes with false', async () => {
      const queue = new BoundedQueue<number>(1);
      await queue.push(1);
      const blocked = queue.push(2);

      queue.close();

      expect(await blocked).toBe(false);
      expect(await queue.shift()).toEqual({ done: false, value: 1 });
      expect(await queue.shift()).toEqual({ done: true, value: undefined });
    });

    it('should wake waiting consumers with done', async () => {
      const queue = new BoundedQueue<number>(1);
      const first = queue.shift();
      const second = queue.shift();

      queue.close();

      expect(await first).toEqual({ done: true, value: undefined });
      expect(await second).toEqual({ done: true, value: undefined });
    });

    it('should be idempotent', () => {
      const queue = new BoundedQueue<number>(1);
      queue.close();
      expect(() => {
        queue.close();
      }).not.toThrow();
    });
  });

  describe('async iteration', () => {
    it('should yield every item until the queue is closed', async () => {
      const queue = new BoundedQueue<number>(2);

      const producer = (async () => {
        for (let i = 0; i < 5; i++) {
          await queue.push(i);
        }
        queue.close();
      })();

      const received: number[] = [];
      for await (const item of queue) {
        received.push(item);
      }
      await producer;

      expect(received).toEqual([0, 1, 2, 3, 4]);
    });
  });
});
