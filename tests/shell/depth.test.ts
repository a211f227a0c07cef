import { describe, it, expect } from 'vitest';
import { RecursionGuard, DEFAULT_MAX_DEPTH } from '../../src/shell/depth.js';
import { RecursionError } from '../../src/shell/errors.js';

describe('RecursionGuard', () => {
  it('defaults to a limit of 10', () => {
    expect(new RecursionGuard().maxDepth).toBe(DEFAULT_MAX_DEPTH);
    expect(DEFAULT_MAX_DEPTH).toBe(10);
  });

  it('runs one level below the parent', async () => {
    const guard = new RecursionGuard(3);
    expect(await guard.run(0, async (depth) => depth)).toBe(1);
    expect(await guard.run(2, async (depth) => depth)).toBe(3);
  });

  it('rejects past the limit without running', async () => {
    const guard = new RecursionGuard(3);
    let ran = false;
    await expect(
      guard.run(3, async () => {
        ran = true;
      }),
    ).rejects.toBeInstanceOf(RecursionError);
    expect(ran).toBe(false);
    expect(guard.active).toBe(0);
  });

  it('counts executions in flight', async () => {
    const guard = new RecursionGuard();
    let seen = -1;
    await guard.run(0, async () => {
      await guard.run(1, async () => {
        seen = guard.active;
      });
    });
    expect(seen).toBe(2);
    expect(guard.active).toBe(0);
  });

  it('releases the count when the work throws', async () => {
    const guard = new RecursionGuard();
    await expect(
      guard.run(0, async () => {
        throw new Error('fail');
      }),
    ).rejects.toThrow('fail');
    expect(guard.active).toBe(0);
  });
});
