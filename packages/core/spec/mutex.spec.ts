import { describe, expect, it } from 'vitest';

import { Mutex } from '#mutex';

/**
 * resolves after the given number of macrotask turns
 * @param turns number of setTimeout(0) hops
 */
async function tick(turns = 1): Promise<void> {
  for (let turn = 0; turn < turns; turn++) {
    await new Promise((resolve) => setTimeout(resolve, 0));
  }
}

describe('cl:Mutex', () => {
  describe('mt:runExclusive', () => {
    it('should run critical sections one at a time in arrival order', async () => {
      const mutex = new Mutex();
      const events: string[] = [];

      const first = mutex.runExclusive(async () => {
        events.push('first:start');
        await tick(2);
        events.push('first:end');

        return 1;
      });
      const second = mutex.runExclusive(async () => {
        events.push('second:start');
        events.push('second:end');

        return 2;
      });

      expect(await Promise.all([first, second])).toEqual([1, 2]);
      expect(events).toEqual([
        'first:start',
        'first:end',
        'second:start',
        'second:end',
      ]);
    });

    it('should release the lock when a section rejects', async () => {
      const mutex = new Mutex();

      const failing = mutex.runExclusive(async () => {
        throw new Error('section failed');
      });
      const following = mutex.runExclusive(() => 'recovered');

      await expect(failing).rejects.toThrow('section failed');
      await expect(following).resolves.toBe('recovered');
      expect(mutex.locked).toBe(false);
    });

    it('should report locked while sections are queued', async () => {
      const mutex = new Mutex();

      const pending = mutex.runExclusive(async () => tick());

      expect(mutex.locked).toBe(true);

      await pending;

      expect(mutex.locked).toBe(false);
    });
  });
});
