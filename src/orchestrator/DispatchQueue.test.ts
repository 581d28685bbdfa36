/**
 * DispatchQueue Unit Tests
 *
 * FIFO delivery, parked consumers, and close semantics.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { DispatchQueue } from './DispatchQueue.js';

describe('DispatchQueue', () => {
  let queue: DispatchQueue<string>;

  beforeEach(() => {
    queue = new DispatchQueue<string>();
  });

  describe('FIFO guarantee', () => {
    it('should deliver items in push order', async () => {
      queue.push('first');
      queue.push('second');
      queue.push('third');

      expect(await queue.next()).toBe('first');
      expect(await queue.next()).toBe('second');
      expect(await queue.next()).toBe('third');
    });

    it('should track the number of buffered items', async () => {
      queue.push('a');
      queue.push('b');
      expect(queue.size()).toBe(2);

      await queue.next();
      expect(queue.size()).toBe(1);
    });
  });

  describe('parked consumer', () => {
    it('should resolve a pending next() when an item is pushed', async () => {
      const pending = queue.next();
      queue.push('late');

      expect(await pending).toBe('late');
      expect(queue.size()).toBe(0);
    });

    it('should serve parked consumers in order', async () => {
      const first = queue.next();
      const second = queue.next();
      queue.push('x');
      queue.push('y');

      expect(await first).toBe('x');
      expect(await second).toBe('y');
    });
  });

  describe('close', () => {
    it('should resolve parked consumers with undefined', async () => {
      const pending = queue.next();
      queue.close();

      expect(await pending).toBeUndefined();
      expect(queue.isClosed()).toBe(true);
    });

    it('should drain buffered items before reporting closed', async () => {
      queue.push('left-over');
      queue.close();

      expect(await queue.next()).toBe('left-over');
      expect(await queue.next()).toBeUndefined();
    });

    it('should refuse pushes after close', () => {
      queue.close();

      expect(queue.push('too-late')).toBe(false);
      expect(queue.size()).toBe(0);
    });
  });
});
