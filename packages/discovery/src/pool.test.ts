import { describe, expect, it } from 'vitest';

import { createTaskPool } from './pool.js';

describe('createTaskPool', () => {
  it('runs at most its size of tasks at once', async () => {
    const pool = createTaskPool(2);
    let running = 0;
    let peak = 0;
    const releases: Array<() => void> = [];

    const task = (label: string) =>
      pool(async () => {
        running += 1;
        peak = Math.max(peak, running);
        await new Promise<void>((resolve) => releases.push(resolve));
        running -= 1;
        return label;
      });

    const results = Promise.all([task('a'), task('b'), task('c')]);
    await new Promise((resolve) => setTimeout(resolve, 0));

    expect(running).toBe(2);
    expect(pool.pendingCount).toBe(1);

    while (releases.length > 0 || running > 0) {
      releases.shift()?.();
      await new Promise((resolve) => setTimeout(resolve, 0));
    }

    await expect(results).resolves.toEqual(['a', 'b', 'c']);
    expect(peak).toBe(2);
  });
});
