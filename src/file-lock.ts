import * as fs from 'node:fs/promises';
import { setTimeout as delay } from 'node:timers/promises';
import { StoreTimeoutError } from './errors';

const RETRY_MS = 25;

/** A lock file this old belongs to a process that died holding it. */
export const STALE_LOCK_MS = 30_000;

export type ReleaseLock = () => Promise<void>;

const hasCode = (error: unknown, code: string): boolean => {
  return error instanceof Error && 'code' in error && error.code === code;
};

const isStale = async (lockPath: string): Promise<boolean> => {
  try {
    const stat = await fs.stat(lockPath);
    return Date.now() - stat.mtimeMs > STALE_LOCK_MS;
  } catch (error) {
    if (hasCode(error, 'ENOENT')) return true;
    throw error;
  }
};

/**
 * Creates `lockPath` exclusively, retrying until `timeoutMs` has passed.
 * Throws StoreTimeoutError when another process keeps holding it.
 */
export const acquireLock = async (lockPath: string, timeoutMs: number): Promise<ReleaseLock> => {
  const deadline = Date.now() + timeoutMs;

  for (;;) {
    try {
      const handle = await fs.open(lockPath, 'wx');
      await handle.close();
      return () => fs.rm(lockPath, { force: true });
    } catch (error) {
      if (!hasCode(error, 'EEXIST')) throw error;
    }

    if (await isStale(lockPath)) {
      await fs.rm(lockPath, { force: true });
      continue;
    }
    if (Date.now() >= deadline) {
      throw new StoreTimeoutError(timeoutMs);
    }
    await delay(RETRY_MS);
  }
};
