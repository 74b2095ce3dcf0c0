import path from "node:path";
import { mkdir } from "node:fs/promises";
import lockfile from "proper-lockfile";
import { log } from "./logger.js";
import { LockContentionError } from "./errors.js";

export class AsyncMutex {
  private chain: Promise<void> = Promise.resolve();

  runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    const run = this.chain.then(fn, fn);
    this.chain = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }
}

export interface CooperativeLockOptions {
  locksDir: string;
  owner: string;
  name: string;
  staleMs: number;
  retries: number;
}

/**
 * Advisory lock for one logical owner's long-running operation.
 *
 * Callers inside the process queue on a promise chain; other processes are
 * excluded by a proper-lockfile lock under `locks/`. A holder that dies leaves
 * a lock that goes stale after `staleMs`.
 */
export class CooperativeLock {
  private readonly mutex = new AsyncMutex();
  readonly lockPath: string;

  constructor(private readonly options: CooperativeLockOptions) {
    this.lockPath = path.join(options.locksDir, `${options.owner}-${options.name}.lock`);
  }

  runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    return this.mutex.runExclusive(async () => {
      await mkdir(this.options.locksDir, { recursive: true });
      const release = await lockfile
        .lock(this.lockPath, {
          realpath: false,
          stale: Math.max(this.options.staleMs, 5_000),
          retries: {
            retries: this.options.retries,
            factor: 2,
            minTimeout: 100,
            maxTimeout: 2_000,
            randomize: true,
          },
          onCompromised: (err) => {
            log.error(`lock ${this.options.name} compromised`, err);
          },
        })
        .catch((err: unknown) => {
          throw new LockContentionError(
            `${this.options.name} is already running for owner "${this.options.owner}"`,
            { cause: err },
          );
        });

      log.debug(`lock acquired: ${this.lockPath}`);
      try {
        return await fn();
      } finally {
        await release();
        log.debug(`lock released: ${this.lockPath}`);
      }
    });
  }

  async isHeld(): Promise<boolean> {
    return lockfile.check(this.lockPath, {
      realpath: false,
      stale: Math.max(this.options.staleMs, 5_000),
    });
  }
}
