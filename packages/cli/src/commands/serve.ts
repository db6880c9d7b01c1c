/**
 * Serve command for the Chatcast CLI
 * Starts the HTTP API server for a presentation front end
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { Command } from 'commander';

import { errnoCode, extractErrorMessage, loadConfig } from '@chatcast/core';
import { startServer } from '@chatcast/server';

import * as ui from '../utils/ui.js';

export interface IServeOptions {
  port?: string;
}

interface IServeLockResult {
  acquired: boolean;
  lockPath: string;
  existingPid?: number;
  stalePidCleaned?: number;
  message?: string;
}

export function getServeLockPath(port: number, lockDir = os.tmpdir()): string {
  return path.join(lockDir, `chatcast-serve-${port}.lock`);
}

function isProcessRunning(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch {
    return false;
  }
}

function readPid(lockPath: string): number | null {
  try {
    if (!fs.existsSync(lockPath)) return null;
    const raw = fs.readFileSync(lockPath, 'utf-8').trim();
    const pid = parseInt(raw, 10);
    return Number.isFinite(pid) ? pid : null;
  } catch {
    return null;
  }
}

/**
 * One API server per port: the lock file holds the owning PID and a lock
 * whose PID is gone is taken over.
 */
export function acquireServeLock(port: number, lockDir?: string): IServeLockResult {
  const lockPath = getServeLockPath(port, lockDir);
  let stalePidCleaned: number | undefined;

  // Two attempts: second after stale lock cleanup.
  for (let attempt = 0; attempt < 2; attempt++) {
    try {
      const fd = fs.openSync(lockPath, 'wx');
      fs.writeFileSync(fd, `${process.pid}\n`);
      fs.closeSync(fd);
      return { acquired: true, lockPath, stalePidCleaned };
    } catch (err) {
      if (errnoCode(err) !== 'EEXIST') {
        return { acquired: false, lockPath, message: extractErrorMessage(err) };
      }

      const existingPid = readPid(lockPath);
      if (existingPid && isProcessRunning(existingPid)) {
        return {
          acquired: false,
          lockPath,
          existingPid,
          message: `already running with PID ${existingPid}`,
        };
      }

      try {
        fs.unlinkSync(lockPath);
        if (existingPid) {
          stalePidCleaned = existingPid;
        }
      } catch (unlinkError) {
        return {
          acquired: false,
          lockPath,
          existingPid: existingPid ?? undefined,
          message: `stale lock exists but could not be removed: ${extractErrorMessage(unlinkError)}`,
        };
      }
    }
  }

  return { acquired: false, lockPath, message: 'failed to acquire serve lock' };
}

export function releaseServeLock(lockPath: string): void {
  try {
    if (!fs.existsSync(lockPath)) return;

    const lockPid = readPid(lockPath);
    // Only remove lock if it belongs to this process or lock pid is unreadable.
    if (lockPid !== null && lockPid !== process.pid) return;

    fs.unlinkSync(lockPath);
  } catch {
    // Best-effort cleanup only.
  }
}

/** Port from the flag, else from config. Null when out of range. */
export function resolveServePort(flag: string | undefined, configuredPort: number): number | null {
  const port = flag === undefined ? configuredPort : parseInt(flag, 10);
  if (isNaN(port) || port < 1 || port > 65535) return null;
  return port;
}

export function serveCommand(program: Command): void {
  program
    .command('serve')
    .description('Start the Chatcast HTTP API server')
    .option('-p, --port <number>', 'Port to run the server on (default: server.port from config)')
    .action((options: IServeOptions) => {
      const projectDir = process.cwd();
      const config = loadConfig(projectDir);
      const port = resolveServePort(options.port, config.server.port);
      if (port === null) {
        ui.error(`Invalid port: ${options.port}. Port must be between 1 and 65535.`);
        process.exit(1);
      }

      const lock = acquireServeLock(port);
      if (!lock.acquired) {
        const pidPart = lock.existingPid ? ` (PID ${lock.existingPid})` : '';
        const detail = lock.message ? `: ${lock.message}` : '';
        ui.error(`Another Chatcast server is already running on port ${port}${pidPart}${detail}`);
        ui.dim('Stop the existing process first, or use --port with a different value.');
        process.exit(1);
      }

      if (lock.stalePidCleaned) {
        ui.warn(`Cleaned stale lock from PID ${lock.stalePidCleaned} (${lock.lockPath})`);
      }
      process.on('exit', () => {
        releaseServeLock(lock.lockPath);
      });

      startServer(projectDir, port);
    });
}
