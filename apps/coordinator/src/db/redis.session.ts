import { ChainableCommander, Redis } from 'ioredis';
import { SetOptions, StoreSession, Subscription, WriteBatch } from './session';

const TAG = '[store]';

// Only delete if we still own the value
const COMPARE_AND_DELETE = `
    if redis.call("get", KEYS[1]) == ARGV[1] then
        return redis.call("del", KEYS[1])
    else
        return 0
    end
`;

const SCAN_COUNT = 200;

async function commit(tx: ChainableCommander, what: string): Promise<void> {
    const results = await tx.exec();
    const failed = results?.find(([err]) => err !== null);
    if (!results || failed) {
        throw failed?.[0] ?? new Error(`Transaction ${what} was aborted`);
    }
}

export class RedisSession implements StoreSession {
    readonly kind = 'redis';

    constructor(private readonly redis: Redis) { }

    async ping(): Promise<void> {
        await this.redis.ping();
    }

    get(key: string): Promise<string | null> {
        return this.redis.get(key);
    }

    async set(key: string, value: string, opts: SetOptions = {}): Promise<boolean> {
        let result: string | null;
        if (opts.ttlMs !== undefined && opts.onlyIfAbsent) {
            // SET NX PX - atomic acquire-with-expiry
            result = await this.redis.set(key, value, 'PX', opts.ttlMs, 'NX');
        } else if (opts.ttlMs !== undefined) {
            result = await this.redis.set(key, value, 'PX', opts.ttlMs);
        } else if (opts.onlyIfAbsent) {
            result = await this.redis.set(key, value, 'NX');
        } else {
            result = await this.redis.set(key, value);
        }
        return result === 'OK';
    }

    del(key: string): Promise<number> {
        return this.redis.del(key);
    }

    pttl(key: string): Promise<number> {
        return this.redis.pttl(key);
    }

    async pexpire(key: string, ttlMs: number): Promise<boolean> {
        return (await this.redis.pexpire(key, ttlMs)) === 1;
    }

    async hset(key: string, fields: Record<string, string>): Promise<void> {
        if (Object.keys(fields).length === 0) return;
        await this.redis.hset(key, fields);
    }

    hgetall(key: string): Promise<Record<string, string>> {
        return this.redis.hgetall(key);
    }

    async replaceHash(key: string, fields: Record<string, string>): Promise<void> {
        const tx = this.redis.multi().del(key);
        if (Object.keys(fields).length > 0) tx.hset(key, fields);

        await commit(tx, `replacing ${key}`);
    }

    async scan(pattern: string): Promise<string[]> {
        const keys = new Set<string>();
        let cursor = '0';
        do {
            const [next, batch] = await this.redis.scan(cursor, 'MATCH', pattern, 'COUNT', SCAN_COUNT);
            batch.forEach(key => keys.add(key));
            cursor = next;
        } while (cursor !== '0');
        // SCAN can return a key more than once
        return Array.from(keys);
    }

    lpush(key: string, ...values: string[]): Promise<number> {
        return this.redis.lpush(key, ...values);
    }

    rpop(key: string): Promise<string | null> {
        return this.redis.rpop(key);
    }

    lrange(key: string, start: number, stop: number): Promise<string[]> {
        return this.redis.lrange(key, start, stop);
    }

    async writeBatch(batch: WriteBatch): Promise<void> {
        const tx = this.redis.multi();
        for (const { key, fields, ttlMs } of batch.hashes ?? []) {
            if (Object.keys(fields).length === 0) continue;
            tx.hset(key, fields);
            if (ttlMs !== undefined) tx.pexpire(key, ttlMs);
        }
        for (const { key, values } of batch.pushes ?? []) {
            if (values.length > 0) tx.lpush(key, ...values);
        }
        await commit(tx, 'writing batch');
    }

    async compareAndDelete(key: string, expected: string): Promise<boolean> {
        const result = await this.redis.eval(COMPARE_AND_DELETE, 1, key, expected);
        return result === 1;
    }

    publish(channel: string, message: string): Promise<number> {
        return this.redis.publish(channel, message);
    }

    // A connection in subscriber mode cannot run other commands, so each
    // subscription gets its own duplicate.
    async subscribe(channel: string, listener: (message: string) => void): Promise<Subscription> {
        const subscriber = this.redis.duplicate();
        subscriber.on('message', (from: string, message: string) => {
            if (from === channel) listener(message);
        });
        subscriber.on('error', err => console.warn(`${TAG} subscriber error on ${channel}:`, err));

        try {
            await subscriber.subscribe(channel);
        } catch (err) {
            subscriber.disconnect();
            throw err;
        }

        return {
            unsubscribe: async () => {
                try {
                    await subscriber.unsubscribe(channel);
                    await subscriber.quit();
                } catch (err) {
                    console.warn(`${TAG} unsubscribe from ${channel} failed:`, err);
                    subscriber.disconnect();
                }
            },
        };
    }

    async close(): Promise<void> {
        try {
            await this.redis.quit();
        } catch (err) {
            console.warn(`${TAG} quit failed, disconnecting:`, err);
            this.redis.disconnect();
        }
    }
}
