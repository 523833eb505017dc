import type { LockHandler } from "../types.ts";
import { log } from "./logging.ts";

interface HeldLock {
  acquiredAt: number;
  expiresAt: number;
}

/**
 * Named mutexes held within this process.
 * Acquisition never waits: a lock held by someone else fails immediately.
 * A lock belongs to its callable until that settles, even past its lease.
 * Overrunning the lease is logged, since a shared implementation would lose the lock there.
 */
export class InMemoryLockHandler implements LockHandler {
  constructor(
    private readonly now: () => number = () => Date.now(),
  ) {}
  #held = new Map<string, HeldLock>();

  private tryAcquire(lockKey: string, leaseMs: number): HeldLock | null {
    const now = this.now();
    const existing = this.#held.get(lockKey);
    if (existing) {
      if (existing.expiresAt <= now) {
        log.warn(`Lock ${lockKey} is past its lease but its holder is still running`);
      }
      return null;
    }
    const lock = { acquiredAt: now, expiresAt: now + leaseMs };
    this.#held.set(lockKey, lock);
    return lock;
  }

  private release(lockKey: string, lock: HeldLock) {
    const now = this.now();
    if (now > lock.expiresAt) {
      log.warn(`Lock ${lockKey} was held for ${now - lock.acquiredAt}ms, longer than its ${lock.expiresAt - lock.acquiredAt}ms lease`);
    }
    this.#held.delete(lockKey);
  }

  isHeld(resourceName: string, lockName: string): boolean {
    return this.#held.has(`${resourceName}/${lockName}`);
  }

  async executeWithLocks(
    callable: () => Promise<void>,
    resourceName: string,
    timeoutMs: number,
    ...lockNames: string[]
  ): Promise<boolean> {
    const acquired = new Array<[string, HeldLock]>();
    try {
      for (const lockName of lockNames) {
        const lockKey = `${resourceName}/${lockName}`;
        const lock = this.tryAcquire(lockKey, timeoutMs);
        if (!lock) {
          log.error(`Couldn't acquire lock ${lockKey}`);
          return false;
        }
        acquired.push([lockKey, lock]);
      }

      await callable();
      return true;

    } finally {
      for (const [lockKey, lock] of acquired) {
        this.release(lockKey, lock);
      }
    }
  }
}
