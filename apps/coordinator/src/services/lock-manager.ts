import { v4 as uuidv4 } from 'uuid';
import { keys } from '../db';
import { StoreClient } from '../db/store-client';
import { LockBusyError } from '../errors/coordinator.error';
import { calculateBackOff } from '../utils/backoff';
import { sleep } from '../utils/timeout';

const TAG = '[lock]';

export interface LockManagerOptions {
    ttlMs: number;
    retryDelayMs: number;
}

/**
 * Named, TTL-bound mutual exclusion on top of the shared store.
 *
 * A lock is a `locks:{resource}` key holding a random owner token. Locks are
 * safety valves, not queues: a busy lock gets exactly one short retry.
 */
export class LockManager {
    constructor(
        private readonly store: StoreClient,
        private readonly opts: LockManagerOptions,
    ) { }

    /** Returns the owner token, or null if someone else holds the lock. */
    async acquire(resource: string, ttlMs: number = this.opts.ttlMs): Promise<string | null> {
        const token = uuidv4();
        const session = await this.store.getSession();
        // SET NX PX - atomic set-if-absent with expiry
        const acquired = await session.set(keys.lock(resource), token, { ttlMs, onlyIfAbsent: true });
        return acquired ? token : null;
    }

    /**
     * Deletes the lock only while it still holds `token`, so an expired lock
     * that someone else re-acquired is left alone. Never throws: a lock we
     * fail to release expires on its own.
     */
    async release(resource: string, token: string): Promise<boolean> {
        try {
            const session = await this.store.getSession();
            const released = await session.compareAndDelete(keys.lock(resource), token);
            if (!released) {
                console.warn(`${TAG} ${resource} was no longer ours to release (expired or taken over)`);
            }
            return released;
        } catch (err) {
            console.error(`${TAG} failed to release ${resource}, leaving it to expire:`, err);
            return false;
        }
    }

    /** Acquire, retrying once after a short sleep; throws LockBusyError if still held. */
    async acquireOrFail(resource: string, ttlMs: number = this.opts.ttlMs): Promise<string> {
        const token = await this.acquire(resource, ttlMs);
        if (token) return token;

        const delay = calculateBackOff(1, this.opts.retryDelayMs);
        console.log(`${TAG} ${resource} busy, retrying once in ${delay}ms`);
        await sleep(delay);

        const retried = await this.acquire(resource, ttlMs);
        if (retried) return retried;

        console.warn(`${TAG} ${resource} still busy after retry`);
        throw new LockBusyError(resource);
    }

    async withLock<T>(resource: string, fn: () => Promise<T>, ttlMs: number = this.opts.ttlMs): Promise<T> {
        const token = await this.acquireOrFail(resource, ttlMs);
        try {
            return await fn();
        } finally {
            await this.release(resource, token);
        }
    }
}
