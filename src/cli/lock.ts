import { closeSync, mkdirSync, openSync, readFileSync, unlinkSync, writeSync } from 'fs';
import { dirname } from 'path';
import { LockError } from '../errors.js';

function isAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM: the process exists but belongs to someone else
    return error instanceof Error && 'code' in error && error.code === 'EPERM';
  }
}

function readOwner(path: string): number | null {
  try {
    const pid = Number.parseInt(readFileSync(path, 'utf-8').trim(), 10);
    return Number.isInteger(pid) && pid > 0 ? pid : null;
  } catch {
    return null;
  }
}

function isExists(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'EEXIST';
}

function tryCreate(path: string, pid: number): boolean {
  let fd: number;
  try {
    fd = openSync(path, 'wx');
  } catch (error) {
    if (isExists(error)) {
      return false;
    }
    throw new LockError(`Cannot create lock file ${path}: ${error instanceof Error ? error.message : error}`, {
      cause: error,
    });
  }
  try {
    writeSync(fd, `${pid}\n`);
  } finally {
    closeSync(fd);
  }
  return true;
}

/**
 * Take the run lock at `path`, replacing a lock left by a process that no
 * longer exists. Returns a function that releases it.
 */
export function acquireRunLock(path: string, pid: number = process.pid): () => void {
  mkdirSync(dirname(path), { recursive: true });

  if (!tryCreate(path, pid)) {
    const owner = readOwner(path);
    if (owner !== null && owner !== pid && isAlive(owner)) {
      throw new LockError(`Another run (pid ${owner}) holds ${path}`);
    }
    unlinkSync(path);
    if (!tryCreate(path, pid)) {
      throw new LockError(`Lock ${path} was taken by another run`);
    }
  }

  let released = false;
  return () => {
    if (released) {
      return;
    }
    released = true;
    if (readOwner(path) === pid) {
      unlinkSync(path);
    }
  };
}
