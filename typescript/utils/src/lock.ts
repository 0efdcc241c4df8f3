import fs from 'fs';
import path from 'path';

import { pollAsync } from './async.js';
import { hasErrorCode } from './errors.js';
import { rootLogger } from './logging.js';

export interface FileLockOptions {
  // A lock older than this is assumed to belong to a crashed invocation
  staleMs?: number;
  retryDelayMs?: number;
  maxAttempts?: number;
}

const DEFAULT_LOCK_OPTIONS: Required<FileLockOptions> = {
  staleMs: 30_000,
  retryDelayMs: 100,
  maxAttempts: 300,
};

export function lockPathFor(filepath: string): string {
  return `${filepath}.lock`;
}

function tryAcquire(lockPath: string, staleMs: number): boolean {
  try {
    const fd = fs.openSync(lockPath, 'wx');
    fs.writeSync(fd, String(process.pid));
    fs.closeSync(fd);
    return true;
  } catch (error) {
    if (!hasErrorCode(error, 'EEXIST')) throw error;
  }

  let stats: fs.Stats;
  try {
    stats = fs.statSync(lockPath);
  } catch (error) {
    // released between our open and stat
    if (hasErrorCode(error, 'ENOENT')) return false;
    throw error;
  }
  const ageMs = Date.now() - stats.mtimeMs;
  if (ageMs > staleMs) {
    rootLogger.warn({ lockPath, ageMs }, 'Removing stale lock file');
    removeStaleLock(lockPath, stats);
  }
  return false;
}

// The lock is moved aside before it is deleted, so a lock that another
// process re-created after our stat is put back instead of removed.
function removeStaleLock(lockPath: string, stale: fs.Stats) {
  const claimedPath = `${lockPath}.${process.pid}.${Date.now()}.stale`;
  try {
    fs.renameSync(lockPath, claimedPath);
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT')) return;
    throw error;
  }

  const claimed = fs.statSync(claimedPath);
  if (claimed.ino !== stale.ino || claimed.mtimeMs !== stale.mtimeMs) {
    try {
      fs.linkSync(claimedPath, lockPath);
    } catch (error) {
      if (!hasErrorCode(error, 'EEXIST')) throw error;
      rootLogger.warn({ lockPath }, 'Lock was taken again while restoring it');
    }
  }
  fs.unlinkSync(claimedPath);
}

function release(lockPath: string) {
  try {
    fs.unlinkSync(lockPath);
  } catch (error) {
    if (!hasErrorCode(error, 'ENOENT')) throw error;
  }
}

/**
 * Runs fn while holding an advisory lock on filepath. Only cooperating
 * processes that go through this helper are serialized.
 */
export async function withFileLock<T>(
  filepath: string,
  fn: () => T | Promise<T>,
  options: FileLockOptions = {},
): Promise<T> {
  const { staleMs, retryDelayMs, maxAttempts } = {
    ...DEFAULT_LOCK_OPTIONS,
    ...options,
  };
  const lockPath = lockPathFor(filepath);
  fs.mkdirSync(path.dirname(lockPath), { recursive: true });

  await pollAsync(
    async () => {
      if (!tryAcquire(lockPath, staleMs)) {
        throw new Error(`Timed out waiting for lock ${lockPath}`);
      }
    },
    retryDelayMs,
    maxAttempts,
  );

  try {
    return await fn();
  } finally {
    release(lockPath);
  }
}
