/**
 * Advisory Partition Lock
 *
 * Single-writer contract per partition. A lock is a file created with
 * exclusive-create (`wx`) holding the owner's pid and acquisition time.
 * Locks older than `staleLockMs` are assumed abandoned and broken.
 *
 * Advisory only: a writer that ignores the lock file is not stopped.
 */

import { open, readFile, unlink, mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import { z } from 'zod';
import { PartitionLockError, isErrnoException, type LockHolder } from '../core/errors.js';
import { createLogger } from '../core/utils/logger.js';

const log = createLogger({ module: 'partition-lock' });

export const DEFAULT_STALE_LOCK_MS = 30 * 60 * 1000;

export interface PartitionLock {
  readonly partition: string;
  release(): Promise<void>;
}

const lockHolderSchema = z.object({
  pid: z.number().int(),
  acquired_at: z.string(),
});

async function readHolder(lockPath: string): Promise<LockHolder | null> {
  try {
    const parsed = lockHolderSchema.safeParse(JSON.parse(await readFile(lockPath, 'utf-8')));
    return parsed.success ? parsed.data : null;
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') return null;
    if (error instanceof SyntaxError) return null;
    throw error;
  }
}

export interface AcquireLockOptions {
  readonly staleLockMs?: number;
  readonly now?: () => Date;
}

/**
 * Acquire the advisory lock at `lockPath`.
 *
 * @throws PartitionLockError if another live writer holds it
 */
export async function acquireFileLock(
  partition: string,
  lockPath: string,
  options: AcquireLockOptions = {}
): Promise<PartitionLock> {
  const staleLockMs = options.staleLockMs ?? DEFAULT_STALE_LOCK_MS;
  const now = options.now ?? (() => new Date());
  await mkdir(dirname(lockPath), { recursive: true });

  for (let attempt = 0; attempt < 2; attempt++) {
    try {
      const handle = await open(lockPath, 'wx');
      try {
        const holder: LockHolder = { pid: process.pid, acquired_at: now().toISOString() };
        await handle.writeFile(JSON.stringify(holder), 'utf-8');
      } finally {
        await handle.close();
      }
      log.debug('Acquired partition lock', { partition, lockPath });
      return {
        partition,
        release: async () => {
          await unlink(lockPath).catch((error: unknown) => {
            if (isErrnoException(error) && error.code === 'ENOENT') return;
            throw error;
          });
          log.debug('Released partition lock', { partition });
        },
      };
    } catch (error) {
      if (!isErrnoException(error) || error.code !== 'EEXIST') throw error;

      const holder = await readHolder(lockPath);
      const acquiredAt = holder ? Date.parse(holder.acquired_at) : Number.NaN;
      const isStale = Number.isNaN(acquiredAt) || now().getTime() - acquiredAt > staleLockMs;

      if (attempt === 0 && isStale) {
        log.warn('Breaking stale partition lock', {
          partition,
          holderPid: holder?.pid ?? null,
          acquiredAt: holder?.acquired_at ?? null,
        });
        await unlink(lockPath).catch((unlinkError: unknown) => {
          if (isErrnoException(unlinkError) && unlinkError.code === 'ENOENT') return;
          throw unlinkError;
        });
        continue;
      }
      throw new PartitionLockError(partition, holder);
    }
  }

  throw new PartitionLockError(partition, await readHolder(lockPath));
}
