/**
 * Per-user submission leases.
 *
 * A lease is an atomic check-and-set on a keyed store: acquiring returns a
 * token when the key was free, null when someone else holds it. Releasing
 * only succeeds with the token that acquired it. Keys are independent, so
 * different users never wait on each other.
 */

import { acquireLock, releaseLock } from './redis';

export interface LeaseStore {
  acquire(key: string, ttlSeconds: number): Promise<string | null>;
  release(key: string, token: string): Promise<boolean>;
}

export function submissionLeaseKey(userId: string): string {
  return `submission:${userId}`;
}

export class RedisLeaseStore implements LeaseStore {
  acquire(key: string, ttlSeconds: number): Promise<string | null> {
    return acquireLock(key, ttlSeconds);
  }

  release(key: string, token: string): Promise<boolean> {
    return releaseLock(key, token);
  }
}

interface HeldLease {
  token: string;
  expiresAt: number;
}

/**
 * Single-process lease store. Check-and-set happens synchronously, so two
 * tasks on the same event loop cannot both acquire a key.
 */
export class InMemoryLeaseStore implements LeaseStore {
  private readonly leases = new Map<string, HeldLease>();
  private counter = 0;

  constructor(private readonly now: () => number = Date.now) {}

  async acquire(key: string, ttlSeconds: number): Promise<string | null> {
    const held = this.leases.get(key);
    if (held && held.expiresAt > this.now()) {
      return null;
    }

    this.counter += 1;
    const token = `${key}#${this.counter}`;
    this.leases.set(key, { token, expiresAt: this.now() + ttlSeconds * 1000 });
    return token;
  }

  async release(key: string, token: string): Promise<boolean> {
    const held = this.leases.get(key);
    if (!held || held.token !== token) {
      return false;
    }
    this.leases.delete(key);
    return true;
  }

  isHeld(key: string): boolean {
    const held = this.leases.get(key);
    return held !== undefined && held.expiresAt > this.now();
  }
}
