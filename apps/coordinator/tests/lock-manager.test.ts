import { MemorySession } from '../src/db/memory.session';
import { LockBusyError } from '../src/errors/coordinator.error';
import { LockManager } from '../src/services/lock-manager';
import { createTestStore } from './helpers/store';

describe('LockManager', () => {
    let now: number;
    let session: MemorySession;
    let locks: LockManager;

    beforeEach(() => {
        now = 5_000;
        session = new MemorySession(() => now);
        locks = new LockManager(createTestStore(session), { ttlMs: 1000, retryDelayMs: 10 });
    });

    it('gives the lock to exactly one of two concurrent callers', async () => {
        const [a, b] = await Promise.all([locks.acquire('create:w1'), locks.acquire('create:w1')]);

        expect([a, b].filter(token => token !== null)).toHaveLength(1);
        expect(await session.get('locks:create:w1')).toBe(a ?? b);
    });

    it('sets the lock with its ttl', async () => {
        await locks.acquire('create:w1', 300);
        expect(await session.pttl('locks:create:w1')).toBe(300);
    });

    it('releases only its own token', async () => {
        const token = await locks.acquire('delete:w1');
        expect(token).not.toBeNull();

        expect(await locks.release('delete:w1', 'someone-else')).toBe(false);
        expect(await session.get('locks:delete:w1')).toBe(token);

        expect(await locks.release('delete:w1', token ?? '')).toBe(true);
        expect(await session.get('locks:delete:w1')).toBeNull();
    });

    it('leaves a lock re-acquired after expiry to its new owner', async () => {
        const first = await locks.acquire('update:w1', 100);
        now += 100;

        const second = await locks.acquire('update:w1');
        expect(second).not.toBeNull();

        expect(await locks.release('update:w1', first ?? '')).toBe(false);
        expect(await session.get('locks:update:w1')).toBe(second);
    });

    it('does not throw when the store fails during release', async () => {
        jest.spyOn(session, 'compareAndDelete').mockRejectedValueOnce(new Error('connection reset'));
        expect(await locks.release('update:w1', 'token')).toBe(false);
    });

    it('retries once, then gives up with LockBusyError', async () => {
        await locks.acquire('create:w1');
        const set = jest.spyOn(session, 'set');

        await expect(locks.acquireOrFail('create:w1')).rejects.toBeInstanceOf(LockBusyError);
        expect(set).toHaveBeenCalledTimes(2);
    });

    it('succeeds on the retry when the holder lets go', async () => {
        const held = await locks.acquire('create:w1');
        const set = jest.spyOn(session, 'set').mockImplementationOnce(async () => {
            await locks.release('create:w1', held ?? '');
            return false;
        });

        const token = await locks.acquireOrFail('create:w1');
        expect(token).not.toBe(held);
        expect(set).toHaveBeenCalledTimes(2);
    });

    it('holds the lock for the duration of withLock and releases it after', async () => {
        let heldDuring: string | null = null;
        const result = await locks.withLock('create:w1', async () => {
            heldDuring = await session.get('locks:create:w1');
            return 'done';
        });

        expect(result).toBe('done');
        expect(heldDuring).not.toBeNull();
        expect(await session.get('locks:create:w1')).toBeNull();
    });

    it('releases the lock when the guarded function throws', async () => {
        await expect(locks.withLock('create:w1', async () => {
            throw new Error('boom');
        })).rejects.toThrow('boom');

        expect(await session.get('locks:create:w1')).toBeNull();
    });

    it('does not run the guarded function when the lock stays busy', async () => {
        await locks.acquire('create:w1');
        const fn = jest.fn();

        await expect(locks.withLock('create:w1', fn)).rejects.toThrow('Could not acquire lock for create:w1');
        expect(fn).not.toHaveBeenCalled();
    });
});
