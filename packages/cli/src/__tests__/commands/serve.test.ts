/**
 * Tests for the serve command's port and lock handling
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';

import {
  acquireServeLock,
  getServeLockPath,
  releaseServeLock,
  resolveServePort,
} from '../../commands/serve.js';

describe('serve command', () => {
  let lockDir: string;

  beforeEach(() => {
    lockDir = fs.mkdtempSync(path.join(os.tmpdir(), 'chatcast-serve-test-'));
  });

  afterEach(() => {
    fs.rmSync(lockDir, { recursive: true, force: true });
  });

  describe('resolveServePort', () => {
    it('should prefer the flag over the configured port', () => {
      expect(resolveServePort('8080', 7676)).toBe(8080);
      expect(resolveServePort(undefined, 7676)).toBe(7676);
    });

    it('should reject ports outside 1-65535', () => {
      expect(resolveServePort('0', 7676)).toBeNull();
      expect(resolveServePort('70000', 7676)).toBeNull();
      expect(resolveServePort('web', 7676)).toBeNull();
    });
  });

  describe('serve lock', () => {
    it('should name the lock after the port', () => {
      expect(getServeLockPath(7676, lockDir)).toBe(path.join(lockDir, 'chatcast-serve-7676.lock'));
    });

    it('should acquire a free lock and write the current pid', () => {
      const lock = acquireServeLock(7676, lockDir);

      expect(lock.acquired).toBe(true);
      expect(fs.readFileSync(lock.lockPath, 'utf-8')).toBe(`${process.pid}\n`);
    });

    it('should refuse a lock held by a running process', () => {
      acquireServeLock(7676, lockDir);

      const second = acquireServeLock(7676, lockDir);

      expect(second.acquired).toBe(false);
      expect(second.existingPid).toBe(process.pid);
      expect(second.message).toBe(`already running with PID ${process.pid}`);
    });

    it('should take over a lock with an unreadable pid', () => {
      fs.writeFileSync(getServeLockPath(7676, lockDir), 'garbage\n');

      const lock = acquireServeLock(7676, lockDir);

      expect(lock.acquired).toBe(true);
      expect(lock.stalePidCleaned).toBeUndefined();
    });

    it('should release only a lock owned by this process', () => {
      const lockPath = getServeLockPath(7676, lockDir);
      fs.writeFileSync(lockPath, `${process.pid + 100000}\n`);

      releaseServeLock(lockPath);
      expect(fs.existsSync(lockPath)).toBe(true);

      fs.writeFileSync(lockPath, `${process.pid}\n`);
      releaseServeLock(lockPath);
      expect(fs.existsSync(lockPath)).toBe(false);
    });
  });
});
