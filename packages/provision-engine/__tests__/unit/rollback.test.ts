import { describe, it, expect, vi } from 'vitest';
import { RollbackGuard } from '../../src/executor/rollback.js';

describe('RollbackGuard', () => {
  it('should run the action when released while armed', async () => {
    const action = vi.fn(async () => {});
    const guard = new RollbackGuard(action, vi.fn());

    expect(guard.armed).toBe(true);
    await guard.release();

    expect(action).toHaveBeenCalledTimes(1);
    expect(guard.fired).toBe(true);
    expect(guard.armed).toBe(false);
  });

  it('should not run the action after disarm', async () => {
    const action = vi.fn(async () => {});
    const guard = new RollbackGuard(action, vi.fn());

    guard.disarm();
    await guard.release();

    expect(action).not.toHaveBeenCalled();
    expect(guard.fired).toBe(false);
  });

  it('should run at most once', async () => {
    const action = vi.fn(async () => {});
    const guard = new RollbackGuard(action, vi.fn());

    await guard.release();
    await guard.release();
    guard.disarm();

    expect(action).toHaveBeenCalledTimes(1);
    expect(guard.fired).toBe(true);
  });

  it('should route action errors to onError', async () => {
    const failure = new Error('lxc-destroy failed');
    const onError = vi.fn();
    const guard = new RollbackGuard(async () => {
      throw failure;
    }, onError);

    await expect(guard.release()).resolves.toBeUndefined();
    expect(onError).toHaveBeenCalledWith(failure);
  });

  it('should fire when a scope exits with an error', async () => {
    const action = vi.fn(async () => {});
    const scope = async () => {
      const guard = new RollbackGuard(action, vi.fn());
      try {
        throw new Error('Installing packages');
      } finally {
        await guard.release();
      }
    };

    await expect(scope()).rejects.toThrow('Installing packages');
    expect(action).toHaveBeenCalledTimes(1);
  });
});
