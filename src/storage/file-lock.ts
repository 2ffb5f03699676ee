/**
 * Exclusive lock file guarding writers of a JSON store.
 *
 * The lock is a sibling `<file>.lock` created with O_EXCL and holding the
 * owner's pid. A lock whose owner is no longer running is treated as stale
 * and removed.
 */

import * as fs from 'fs';
import chalk from 'chalk';
import { describeError, errorCode, StorageUnavailable } from '../model/errors.js';

const RETRY_INTERVAL_MS = 25;

export interface LockStatus {
    exists: boolean;
    isStale: boolean;
    ownerPid?: number;
    lockPath: string;
}

/** Signal 0 probes for existence; EPERM means the process exists under another user. */
export function isProcessRunning(pid: number): boolean {
    try {
        process.kill(pid, 0);
        return true;
    } catch (error) {
        return errorCode(error) === 'EPERM';
    }
}

function sleepSync(ms: number): void {
    Atomics.wait(new Int32Array(new SharedArrayBuffer(4)), 0, 0, ms);
}

export class FileLock {
    readonly lockPath: string;
    private readonly timeoutMs: number;
    private held = false;

    constructor(filePath: string, timeoutMs: number) {
        this.lockPath = `${filePath}.lock`;
        this.timeoutMs = timeoutMs;
    }

    check(): LockStatus {
        let content: string;
        try {
            content = fs.readFileSync(this.lockPath, 'utf8');
        } catch (error) {
            if (errorCode(error) === 'ENOENT') {
                return { exists: false, isStale: false, lockPath: this.lockPath };
            }
            throw new StorageUnavailable('json-file', `cannot read lock ${this.lockPath}: ${describeError(error)}`, { cause: error });
        }

        const ownerPid = parseInt(content.trim(), 10);
        if (isNaN(ownerPid)) {
            // Owner may still be writing its pid.
            return { exists: true, isStale: false, lockPath: this.lockPath };
        }
        return { exists: true, isStale: !isProcessRunning(ownerPid), ownerPid, lockPath: this.lockPath };
    }

    acquire(): void {
        if (this.held) {
            throw new StorageUnavailable('json-file', `lock ${this.lockPath} is already held by this store`);
        }

        const deadline = Date.now() + this.timeoutMs;
        for (;;) {
            if (this.tryCreate()) {
                this.held = true;
                return;
            }

            const status = this.check();
            if (status.isStale) {
                console.warn(chalk.yellow(`🔓 Removing stale lock ${this.lockPath} (owner pid ${status.ownerPid} is gone)`));
                this.removeLockFile();
                continue;
            }

            if (Date.now() >= deadline) {
                const owner = status.ownerPid !== undefined ? ` by pid ${status.ownerPid}` : '';
                throw new StorageUnavailable('json-file', `timed out after ${this.timeoutMs}ms waiting for lock ${this.lockPath} held${owner}`);
            }
            sleepSync(RETRY_INTERVAL_MS);
        }
    }

    release(): void {
        if (!this.held) {
            return;
        }
        this.held = false;
        this.removeLockFile();
    }

    withLock<T>(work: () => T): T {
        this.acquire();
        try {
            return work();
        } finally {
            this.release();
        }
    }

    private tryCreate(): boolean {
        let fd: number;
        try {
            fd = fs.openSync(this.lockPath, 'wx');
        } catch (error) {
            if (errorCode(error) === 'EEXIST') {
                return false;
            }
            throw new StorageUnavailable('json-file', `cannot create lock ${this.lockPath}: ${describeError(error)}`, { cause: error });
        }
        try {
            fs.writeSync(fd, String(process.pid));
        } finally {
            fs.closeSync(fd);
        }
        return true;
    }

    private removeLockFile(): void {
        try {
            fs.unlinkSync(this.lockPath);
        } catch (error) {
            if (errorCode(error) !== 'ENOENT') {
                throw new StorageUnavailable('json-file', `cannot remove lock ${this.lockPath}: ${describeError(error)}`, { cause: error });
            }
        }
    }
}
