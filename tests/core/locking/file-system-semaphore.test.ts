import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import fs from 'node:fs';
import path from 'node:path';
import { setTimeout as sleep } from 'node:timers/promises';

import { FileSystemSemaphore } from '../../../src/core/locking/file-system-semaphore.js';
import { OperationCancelledError } from '../../../src/utils/errors.js';
import { createTempDir, removeDir, writeFile } from '../../test-helpers.js';

describe('FileSystemSemaphore', () => {
  let testDir: string;
  let lockPath: string;

  beforeEach(() => {
    testDir = createTempDir('lock');
    lockPath = path.join(testDir, 'cache', '.lock');
  });

  afterEach(() => {
    removeDir(testDir);
  });

  it('returns one instance per lock path', () => {
    assert.equal(FileSystemSemaphore.forPath(lockPath), FileSystemSemaphore.forPath(path.join(testDir, 'cache', '..', 'cache', '.lock')));
  });

  it('runs holders one at a time in arrival order', async () => {
    const semaphore = new FileSystemSemaphore(lockPath);
    const events: string[] = [];
    const hold = (name: string) => semaphore.use(async () => {
      events.push(`enter ${name}`);
      await sleep(20);
      events.push(`exit ${name}`);
    });

    await Promise.all([hold('first'), hold('second'), hold('third')]);

    assert.deepEqual(events, ['enter first', 'exit first', 'enter second', 'exit second', 'enter third', 'exit third']);
  });

  it('records its owner in the lock file while held', async () => {
    const semaphore = new FileSystemSemaphore(lockPath);
    const releaser = await semaphore.acquire();

    const owner: unknown = JSON.parse(fs.readFileSync(lockPath, 'utf-8'));
    assert.ok(owner && typeof owner === 'object' && 'pid' in owner);
    assert.equal(owner.pid, process.pid);

    await releaser.release();
    await releaser.release();
    assert.equal(fs.existsSync(lockPath), false);
  });

  it('releases the lock when the action throws', async () => {
    const semaphore = new FileSystemSemaphore(lockPath);

    await assert.rejects(semaphore.use(async () => {
      throw new Error('boom');
    }), /boom/);

    assert.equal(fs.existsSync(lockPath), false);
    const releaser = await semaphore.acquire();
    await releaser.release();
  });

  it('excludes other holders of the same lock file', async () => {
    const first = new FileSystemSemaphore(lockPath);
    const second = new FileSystemSemaphore(lockPath);
    const firstLock = await first.acquire();

    let secondAcquired = false;
    const pending = second.acquire().then(releaser => {
      secondAcquired = true;
      return releaser;
    });

    await sleep(100);
    assert.equal(secondAcquired, false);

    await firstLock.release();
    const secondLock = await pending;
    assert.equal(secondAcquired, true);
    await secondLock.release();
  });

  it('gives up waiting when cancelled', async () => {
    const semaphore = new FileSystemSemaphore(lockPath);
    const held = await semaphore.acquire();
    const controller = new AbortController();

    const waiting = semaphore.acquire(controller.signal);
    controller.abort();
    await assert.rejects(waiting, OperationCancelledError);

    await held.release();
    const next = await semaphore.acquire();
    await next.release();
  });

  it('gives up polling a contended lock file when cancelled', async () => {
    const holder = new FileSystemSemaphore(lockPath);
    const held = await holder.acquire();
    const controller = new AbortController();

    const waiting = new FileSystemSemaphore(lockPath).acquire(controller.signal);
    await sleep(50);
    controller.abort();
    await assert.rejects(waiting, OperationCancelledError);

    await held.release();
  });

  it('rejects immediately with an aborted signal', async () => {
    const controller = new AbortController();
    controller.abort();
    await assert.rejects(new FileSystemSemaphore(lockPath).acquire(controller.signal), OperationCancelledError);
    assert.equal(fs.existsSync(lockPath), false);
  });

  it('removes a lock left behind by a process that no longer exists', async () => {
    writeFile(lockPath, JSON.stringify({ pid: 2147483646, acquiredAt: '2020-01-01T00:00:00.000Z' }));

    const releaser = await new FileSystemSemaphore(lockPath).acquire();
    const owner: unknown = JSON.parse(fs.readFileSync(lockPath, 'utf-8'));
    assert.ok(owner && typeof owner === 'object' && 'pid' in owner);
    assert.equal(owner.pid, process.pid);
    await releaser.release();
  });

  it('lets a single waiter take over a stale lock', async () => {
    for (let round = 0; round < 5; round++) {
      writeFile(lockPath, JSON.stringify({ pid: 2147483646, acquiredAt: '2020-01-01T00:00:00.000Z' }));
      let holders = 0;
      let mostHolders = 0;

      await Promise.all([1, 2, 3, 4].map(() => new FileSystemSemaphore(lockPath).use(async () => {
        holders++;
        mostHolders = Math.max(mostHolders, holders);
        await sleep(20);
        holders--;
      })));

      assert.equal(mostHolders, 1);
      assert.equal(fs.existsSync(lockPath), false);
      assert.equal(fs.existsSync(`${lockPath}.stale`), false);
    }
  });

  it('removes an ownerless lock file once it has been abandoned', async () => {
    writeFile(lockPath, '{"pid":');
    const longAgo = new Date(Date.now() - 60_000);
    fs.utimesSync(lockPath, longAgo, longAgo);

    const releaser = await new FileSystemSemaphore(lockPath).acquire();
    const owner: unknown = JSON.parse(fs.readFileSync(lockPath, 'utf-8'));
    assert.ok(owner && typeof owner === 'object' && 'pid' in owner);
    assert.equal(owner.pid, process.pid);
    await releaser.release();
  });

  it('keeps waiting on an ownerless lock file that is still fresh', async () => {
    writeFile(lockPath, '{"pid":');
    const controller = new AbortController();

    const waiting = new FileSystemSemaphore(lockPath).acquire(controller.signal);
    await sleep(100);
    controller.abort();

    await assert.rejects(waiting, OperationCancelledError);
    assert.equal(fs.readFileSync(lockPath, 'utf-8'), '{"pid":');
  });

  it('clears a stale guard left behind by a crashed waiter', async () => {
    const guardPath = `${lockPath}.stale`;
    writeFile(lockPath, JSON.stringify({ pid: 2147483646, acquiredAt: '2020-01-01T00:00:00.000Z' }));
    writeFile(guardPath, '');
    const longAgo = new Date(Date.now() - 60_000);
    fs.utimesSync(guardPath, longAgo, longAgo);

    const releaser = await new FileSystemSemaphore(lockPath).acquire();
    assert.equal(fs.existsSync(guardPath), false);
    await releaser.release();
  });
});
