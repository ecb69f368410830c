import { existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { dirname, join } from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { LockError } from '../errors.js';
import { acquireRunLock } from './lock.js';

// Far above any pid the kernel hands out
const DEAD_PID = 2 ** 30;

describe('acquireRunLock', () => {
  let dir: string;
  let lockPath: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'digest-lock-'));
    lockPath = join(dir, 'nested', 'ingest.lock');
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('writes the owner pid and removes the file on release', () => {
    const release = acquireRunLock(lockPath);

    expect(readFileSync(lockPath, 'utf-8')).toBe(`${process.pid}\n`);
    release();
    expect(existsSync(lockPath)).toBe(false);
    release();
  });

  it('refuses a lock held by a live process', () => {
    const release = acquireRunLock(lockPath, process.ppid);

    expect(() => acquireRunLock(lockPath)).toThrow(LockError);
    expect(readFileSync(lockPath, 'utf-8')).toBe(`${process.ppid}\n`);
    release();
  });

  it('replaces a lock left by a process that is gone', () => {
    acquireRunLock(lockPath, DEAD_PID);

    const release = acquireRunLock(lockPath);

    expect(readFileSync(lockPath, 'utf-8')).toBe(`${process.pid}\n`);
    release();
  });

  it('replaces an unreadable lock file', () => {
    mkdirSync(dirname(lockPath), { recursive: true });
    writeFileSync(lockPath, 'garbage');

    const release = acquireRunLock(lockPath);
    expect(readFileSync(lockPath, 'utf-8')).toBe(`${process.pid}\n`);
    release();
  });

  it('leaves a lock that was taken over by another run', () => {
    const release = acquireRunLock(lockPath);
    writeFileSync(lockPath, `${process.ppid}\n`);

    release();
    expect(existsSync(lockPath)).toBe(true);
  });
});
