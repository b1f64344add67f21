import { EventEmitter } from 'events';
import { SetOptions, StoreSession, Subscription, WriteBatch } from './session';

type Value =
    | { type: 'string'; value: string }
    | { type: 'hash'; fields: Map<string, string> }
    | { type: 'list'; items: string[] };

interface Entry {
    value: Value;
    expiresAt: number | null;
}

export class WrongTypeError extends Error {
    constructor(key: string) {
        super(`WRONGTYPE Operation against key ${key} holding the wrong kind of value`);
        this.name = 'WrongTypeError';
    }
}

export function globToRegExp(pattern: string): RegExp {
    let source = '';
    for (const ch of pattern) {
        if (ch === '*') source += '.*';
        else if (ch === '?') source += '.';
        else source += ch.replace(/[.+^${}()|[\]\\]/g, '\\$&');
    }
    return new RegExp(`^${source}$`);
}

/**
 * In-process stand-in for the shared store, used when Redis is unreachable
 * outside production and by the test suite. Expiry is evaluated lazily on access.
 */
export class MemorySession implements StoreSession {
    readonly kind: StoreSession['kind'] = 'memory';

    private readonly entries = new Map<string, Entry>();
    private readonly channels = new EventEmitter();

    constructor(private readonly now: () => number = Date.now) {
        this.channels.setMaxListeners(0);
    }

    async ping(): Promise<void> { }

    async get(key: string): Promise<string | null> {
        const entry = this.live(key);
        if (!entry) return null;
        if (entry.value.type !== 'string') throw new WrongTypeError(key);
        return entry.value.value;
    }

    async set(key: string, value: string, opts: SetOptions = {}): Promise<boolean> {
        if (opts.onlyIfAbsent && this.live(key)) return false;
        this.entries.set(key, {
            value: { type: 'string', value },
            expiresAt: opts.ttlMs !== undefined ? this.now() + opts.ttlMs : null,
        });
        return true;
    }

    async del(key: string): Promise<number> {
        const existed = this.live(key) !== null;
        this.entries.delete(key);
        return existed ? 1 : 0;
    }

    async pttl(key: string): Promise<number> {
        const entry = this.live(key);
        if (!entry) return -2;
        if (entry.expiresAt === null) return -1;
        return entry.expiresAt - this.now();
    }

    async pexpire(key: string, ttlMs: number): Promise<boolean> {
        const entry = this.live(key);
        if (!entry) return false;
        entry.expiresAt = this.now() + ttlMs;
        return true;
    }

    async hset(key: string, fields: Record<string, string>): Promise<void> {
        this.writeHash(key, fields);
    }

    async hgetall(key: string): Promise<Record<string, string>> {
        const entry = this.live(key);
        if (!entry) return {};
        if (entry.value.type !== 'hash') throw new WrongTypeError(key);
        return Object.fromEntries(entry.value.fields);
    }

    async replaceHash(key: string, fields: Record<string, string>): Promise<void> {
        this.entries.delete(key);
        await this.hset(key, fields);
    }

    async scan(pattern: string): Promise<string[]> {
        const matcher = globToRegExp(pattern);
        return Array.from(this.entries.keys()).filter(key => this.live(key) && matcher.test(key));
    }

    async lpush(key: string, ...values: string[]): Promise<number> {
        return this.pushList(key, values);
    }

    async rpop(key: string): Promise<string | null> {
        const entry = this.live(key);
        if (!entry) return null;
        if (entry.value.type !== 'list') throw new WrongTypeError(key);

        const item = entry.value.items.pop() ?? null;
        if (entry.value.items.length === 0) this.entries.delete(key);
        return item;
    }

    async lrange(key: string, start: number, stop: number): Promise<string[]> {
        const entry = this.live(key);
        if (!entry) return [];
        if (entry.value.type !== 'list') throw new WrongTypeError(key);

        const { items } = entry.value;
        const from = start < 0 ? Math.max(items.length + start, 0) : start;
        const to = stop < 0 ? items.length + stop : stop;
        return items.slice(from, to + 1);
    }

    async writeBatch(batch: WriteBatch): Promise<void> {
        const hashes = batch.hashes ?? [];
        const pushes = batch.pushes ?? [];

        // type conflicts reject the batch before anything is written
        for (const { key } of hashes) this.expectType(key, 'hash');
        for (const { key } of pushes) this.expectType(key, 'list');

        for (const { key, fields, ttlMs } of hashes) {
            this.writeHash(key, fields);
            const entry = this.live(key);
            if (entry && ttlMs !== undefined) entry.expiresAt = this.now() + ttlMs;
        }
        for (const { key, values } of pushes) this.pushList(key, values);
    }

    async compareAndDelete(key: string, expected: string): Promise<boolean> {
        const entry = this.live(key);
        if (!entry || entry.value.type !== 'string' || entry.value.value !== expected) {
            return false;
        }
        this.entries.delete(key);
        return true;
    }

    async publish(channel: string, message: string): Promise<number> {
        const receivers = this.channels.listenerCount(channel);
        this.channels.emit(channel, message);
        return receivers;
    }

    async subscribe(channel: string, listener: (message: string) => void): Promise<Subscription> {
        this.channels.on(channel, listener);
        return {
            unsubscribe: async () => {
                this.channels.off(channel, listener);
            },
        };
    }

    async close(): Promise<void> {
        this.channels.removeAllListeners();
    }

    private expectType(key: string, type: 'hash' | 'list'): void {
        const entry = this.live(key);
        if (entry && entry.value.type !== type) throw new WrongTypeError(key);
    }

    private writeHash(key: string, fields: Record<string, string>): void {
        if (Object.keys(fields).length === 0) return;

        const entry = this.live(key);
        let hash: Map<string, string>;
        if (!entry) {
            hash = new Map();
            this.entries.set(key, { value: { type: 'hash', fields: hash }, expiresAt: null });
        } else if (entry.value.type === 'hash') {
            hash = entry.value.fields;
        } else {
            throw new WrongTypeError(key);
        }

        for (const [field, value] of Object.entries(fields)) {
            hash.set(field, value);
        }
    }

    private pushList(key: string, values: string[]): number {
        const entry = this.live(key);
        let items: string[];
        if (!entry) {
            items = [];
            this.entries.set(key, { value: { type: 'list', items }, expiresAt: null });
        } else if (entry.value.type === 'list') {
            items = entry.value.items;
        } else {
            throw new WrongTypeError(key);
        }

        for (const value of values) items.unshift(value);
        return items.length;
    }

    private live(key: string): Entry | null {
        const entry = this.entries.get(key);
        if (!entry) return null;
        if (entry.expiresAt !== null && entry.expiresAt <= this.now()) {
            this.entries.delete(key);
            return null;
        }
        return entry;
    }
}
