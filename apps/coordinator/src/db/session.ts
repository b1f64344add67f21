/**
 * The subset of key-value store primitives the coordinator relies on.
 * Implemented by RedisSession (ioredis) and MemorySession (in-process stand-in).
 */
export interface StoreSession {
    readonly kind: 'redis' | 'memory';

    ping(): Promise<void>;

    get(key: string): Promise<string | null>;
    /** Returns false when `onlyIfAbsent` is set and the key already exists. */
    set(key: string, value: string, opts?: SetOptions): Promise<boolean>;
    del(key: string): Promise<number>;
    /** Remaining lifetime in ms; -1 when the key has no expiry, -2 when it does not exist. */
    pttl(key: string): Promise<number>;
    pexpire(key: string, ttlMs: number): Promise<boolean>;

    hset(key: string, fields: Record<string, string>): Promise<void>;
    hgetall(key: string): Promise<Record<string, string>>;
    /** Deletes the hash and writes `fields` in one atomic step. */
    replaceHash(key: string, fields: Record<string, string>): Promise<void>;

    /** All keys matching a glob pattern (`*`, `?`). No snapshot isolation. */
    scan(pattern: string): Promise<string[]>;

    lpush(key: string, ...values: string[]): Promise<number>;
    rpop(key: string): Promise<string | null>;
    lrange(key: string, start: number, stop: number): Promise<string[]>;

    /** Applies every write in the batch as one atomic step: all of them or none. */
    writeBatch(batch: WriteBatch): Promise<void>;

    /** Deletes `key` only if it still holds `expected`, atomically. */
    compareAndDelete(key: string, expected: string): Promise<boolean>;

    publish(channel: string, message: string): Promise<number>;
    subscribe(channel: string, listener: (message: string) => void): Promise<Subscription>;

    close(): Promise<void>;
}

export interface SetOptions {
    ttlMs?: number;
    onlyIfAbsent?: boolean;
}

export interface HashWrite {
    key: string;
    fields: Record<string, string>;
    /** Expiry set together with the fields. */
    ttlMs?: number;
}

export interface ListPush {
    key: string;
    values: string[];
}

export interface WriteBatch {
    hashes?: HashWrite[];
    pushes?: ListPush[];
}

export interface Subscription {
    unsubscribe(): Promise<void>;
}
