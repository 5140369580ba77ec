import { readFile, stat, unlink, writeFile } from 'fs/promises';
import { hostname } from 'os';
import { BaselineLockError } from '../utils/errors.js';
import { Logger } from '../utils/logger.js';

export const LOCK_STALE_MS = 60_000;

interface LockInfo {
  pid: number;
  host: string;
  holder: string;
  timestamp: string;
}

const logger = new Logger('FileLock');

async function lockAge(lockPath: string): Promise<number | null> {
  try {
    return Date.now() - (await stat(lockPath)).mtimeMs;
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') return null;
    throw error;
  }
}

async function describeHolder(lockPath: string): Promise<string | undefined> {
  try {
    const info: unknown = JSON.parse(await readFile(lockPath, 'utf-8'));
    if (typeof info === 'object' && info !== null && 'holder' in info && 'pid' in info) {
      return `${String(info.holder)}, pid ${String(info.pid)}`;
    }
  } catch {
    // holder unknown
  }
  return undefined;
}

/**
 * Creates the lock file exclusively. A live lock held by someone else fails
 * closed with BaselineLockError; a lock older than LOCK_STALE_MS is removed once.
 */
export async function acquireLock(lockPath: string, holder: string): Promise<void> {
  const info: LockInfo = { pid: process.pid, host: hostname(), holder, timestamp: new Date().toISOString() };

  for (let attempt = 0; attempt < 2; attempt++) {
    try {
      await writeFile(lockPath, JSON.stringify(info), { flag: 'wx' });
      return;
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code !== 'EEXIST') throw error;

      const age = await lockAge(lockPath);
      if (age !== null && age <= LOCK_STALE_MS) {
        throw new BaselineLockError(lockPath, await describeHolder(lockPath));
      }
      if (age !== null) {
        logger.warn(`Removing stale lock ${lockPath} (${Math.round(age / 1000)}s old)`);
        await unlink(lockPath).catch((unlinkError: NodeJS.ErrnoException) => {
          if (unlinkError.code !== 'ENOENT') throw unlinkError;
        });
      }
    }
  }

  throw new BaselineLockError(lockPath);
}

export async function releaseLock(lockPath: string): Promise<void> {
  try {
    await unlink(lockPath);
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code !== 'ENOENT') throw error;
  }
}

export async function withLock<T>(lockPath: string, holder: string, fn: () => Promise<T>): Promise<T> {
  await acquireLock(lockPath, holder);
  try {
    return await fn();
  } finally {
    await releaseLock(lockPath);
  }
}
