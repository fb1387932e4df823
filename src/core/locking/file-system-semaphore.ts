import { promises as fs } from 'fs';
import type { FileHandle } from 'fs/promises';
import { dirname, resolve } from 'path';
import { setTimeout as sleep } from 'timers/promises';
import { FILE_PATTERNS, LOCK_POLL } from '../../constants/index.js';
import {
  FileSystemError,
  OperationCancelledError,
  getErrorCode,
  isAbortError,
  throwIfCancelled
} from '../../utils/errors.js';
import { ensureDir } from '../../utils/fs.js';
import { logger as rootLogger } from '../../utils/logger.js';

export interface LockReleaser {
  release(): Promise<void>;
}

interface LockOwner {
  pid: number;
  acquiredAt: string;
}

const logger = rootLogger.child('lock');

/**
 * Mutual exclusion across processes through an exclusively created lock file.
 *
 * Waiters inside one process queue in FIFO order before touching the file, so
 * the file is only ever contended between processes. A lock file whose owner
 * process no longer exists, or that never got an owner written and has not
 * been touched for a while, is stale. Stale files are only removed while
 * holding a second exclusive file (`<lock>.stale`), after checking again that
 * the lock is still stale.
 */
export class FileSystemSemaphore {
  private static readonly instances = new Map<string, FileSystemSemaphore>();

  readonly lockPath: string;
  private held = false;
  private readonly waiters: Array<() => void> = [];

  constructor(lockPath: string) {
    this.lockPath = resolve(lockPath);
  }

  /**
   * Process-wide instance for `lockPath`
   */
  static forPath(lockPath: string): FileSystemSemaphore {
    const key = resolve(lockPath);
    let semaphore = FileSystemSemaphore.instances.get(key);
    if (!semaphore) {
      semaphore = new FileSystemSemaphore(key);
      FileSystemSemaphore.instances.set(key, semaphore);
    }
    return semaphore;
  }

  async acquire(signal?: AbortSignal): Promise<LockReleaser> {
    await this.acquireLocal(signal);

    let handle: FileHandle;
    try {
      handle = await this.acquireFile(signal);
    } catch (error) {
      this.releaseLocal();
      throw error;
    }

    let released = false;
    return {
      release: async () => {
        if (released) {
          return;
        }
        released = true;
        try {
          await handle.close();
          await this.unlinkFile(this.lockPath);
        } finally {
          this.releaseLocal();
        }
      }
    };
  }

  /**
   * Run `action` while holding the lock; the lock is released on every exit path
   */
  async use<T>(action: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    const releaser = await this.acquire(signal);
    try {
      return await action();
    } finally {
      await releaser.release();
    }
  }

  private acquireLocal(signal?: AbortSignal): Promise<void> {
    throwIfCancelled(signal);
    if (!this.held) {
      this.held = true;
      return Promise.resolve();
    }

    return new Promise<void>((resolvePromise, rejectPromise) => {
      const onAbort = (): void => {
        const index = this.waiters.indexOf(grant);
        if (index >= 0) {
          this.waiters.splice(index, 1);
        }
        rejectPromise(new OperationCancelledError());
      };
      const grant = (): void => {
        signal?.removeEventListener('abort', onAbort);
        resolvePromise();
      };

      this.waiters.push(grant);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  // Ownership passes straight to the next waiter; `held` only drops when the queue is empty
  private releaseLocal(): void {
    const next = this.waiters.shift();
    if (next) {
      next();
    } else {
      this.held = false;
    }
  }

  private async acquireFile(signal?: AbortSignal): Promise<FileHandle> {
    await ensureDir(dirname(this.lockPath));
    let delay: number = LOCK_POLL.INITIAL_DELAY_MS;

    for (;;) {
      throwIfCancelled(signal);

      let handle: FileHandle | null = null;
      try {
        handle = await fs.open(this.lockPath, 'wx');
      } catch (error) {
        if (getErrorCode(error) !== 'EEXIST') {
          throw new FileSystemError(`Failed to create lock file: ${this.lockPath}`, { lockPath: this.lockPath, error });
        }
      }

      if (handle) {
        await this.writeOwner(handle);
        return handle;
      }

      if (await this.removeStaleLock()) {
        continue;
      }

      try {
        await sleep(delay, undefined, { signal });
      } catch (error) {
        if (isAbortError(error)) {
          throw new OperationCancelledError();
        }
        throw error;
      }
      delay = Math.min(delay * 2, LOCK_POLL.MAX_DELAY_MS);
    }
  }

  private async writeOwner(handle: FileHandle): Promise<void> {
    const owner: LockOwner = { pid: process.pid, acquiredAt: new Date().toISOString() };
    try {
      await handle.writeFile(`${JSON.stringify(owner)}\n`, 'utf8');
    } catch (error) {
      await handle.close();
      await this.unlinkFile(this.lockPath);
      throw new FileSystemError(`Failed to write lock file: ${this.lockPath}`, { lockPath: this.lockPath, error });
    }
  }

  /**
   * True when the caller should try to create the lock file again right away
   */
  private async removeStaleLock(): Promise<boolean> {
    if (!(await this.isStale())) {
      return false;
    }

    const guardPath = `${this.lockPath}${FILE_PATTERNS.STALE_GUARD_SUFFIX}`;
    let guard: FileHandle;
    try {
      guard = await fs.open(guardPath, 'wx');
    } catch (error) {
      if (getErrorCode(error) !== 'EEXIST') {
        throw new FileSystemError(`Failed to create lock guard: ${guardPath}`, { lockPath: this.lockPath, error });
      }
      await this.removeAbandonedFile(guardPath);
      return false;
    }

    try {
      // Another waiter may have replaced the stale file since it was inspected
      const owner = await this.readOwner();
      if (!(await this.isStale(owner))) {
        return true;
      }
      logger.warn(owner ? `Removing stale lock left by process ${owner.pid}` : 'Removing abandoned lock without an owner', {
        lockPath: this.lockPath,
        acquiredAt: owner?.acquiredAt
      });
      await this.unlinkFile(this.lockPath);
      return true;
    } finally {
      await guard.close();
      await this.unlinkFile(guardPath);
    }
  }

  private async isStale(owner?: LockOwner | null): Promise<boolean> {
    const current = owner === undefined ? await this.readOwner() : owner;
    if (current) {
      return current.pid !== process.pid && !isProcessAlive(current.pid);
    }
    return this.isAbandoned(this.lockPath);
  }

  // Missing files are not abandoned: there is nothing left to remove
  private async isAbandoned(filePath: string): Promise<boolean> {
    try {
      const stats = await fs.stat(filePath);
      return Date.now() - stats.mtimeMs > LOCK_POLL.ABANDONED_AFTER_MS;
    } catch (error) {
      if (getErrorCode(error) === 'ENOENT') {
        return false;
      }
      throw new FileSystemError(`Failed to inspect lock file: ${filePath}`, { lockPath: this.lockPath, error });
    }
  }

  private async removeAbandonedFile(filePath: string): Promise<void> {
    if (await this.isAbandoned(filePath)) {
      logger.warn(`Removing abandoned lock guard: ${filePath}`);
      await this.unlinkFile(filePath);
    }
  }

  // Null while the owner is still writing, or when the file vanished in between
  private async readOwner(): Promise<LockOwner | null> {
    let content: string;
    try {
      content = await fs.readFile(this.lockPath, 'utf8');
    } catch {
      return null;
    }

    try {
      const parsed: unknown = JSON.parse(content);
      if (
        typeof parsed === 'object' && parsed !== null &&
        'pid' in parsed && typeof parsed.pid === 'number' &&
        'acquiredAt' in parsed && typeof parsed.acquiredAt === 'string'
      ) {
        return { pid: parsed.pid, acquiredAt: parsed.acquiredAt };
      }
    } catch {
      return null;
    }
    return null;
  }

  private async unlinkFile(filePath: string): Promise<void> {
    try {
      await fs.unlink(filePath);
    } catch (error) {
      if (getErrorCode(error) !== 'ENOENT') {
        throw new FileSystemError(`Failed to remove lock file: ${filePath}`, { lockPath: this.lockPath, error });
      }
    }
  }
}

function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM: the process exists but belongs to someone else
    return getErrorCode(error) === 'EPERM';
  }
}
