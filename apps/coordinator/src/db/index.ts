/**
 * Connection construction and the key layout shared with every other tool
 * that reads this store. Key and field names here are a wire contract.
 */
import Redis from 'ioredis';

export interface RedisConnectionOptions {
    url: string;
    connectTimeoutMs: number;
    commandTimeoutMs: number;
}

/**
 * Redis client tuned to fail fast:
 * - lazyConnect: the StoreClient decides when to connect and what to do on failure
 * - retryStrategy null: no background reconnect loop, reconnection happens on next getSession()
 * - maxRetriesPerRequest 1: commands against a dead connection reject instead of queueing
 */
export function createRedis(opts: RedisConnectionOptions): Redis {
    return new Redis(opts.url, {
        lazyConnect: true,
        connectTimeout: opts.connectTimeoutMs,
        commandTimeout: opts.commandTimeoutMs,
        maxRetriesPerRequest: 1,
        enableOfflineQueue: false,
        retryStrategy: () => null,
    });
}

export const keys = {
    workspace: (id: string) => `workspaces:${id}:keys`,
    workspacePattern: 'workspaces:*:keys',
    job: (id: string) => `jobs:${id}`,
    jobEvents: (id: string) => `jobs:${id}:events`,
    jobLeads: (id: string) => `jobs:${id}:leads`,
    jobQueue: 'jobs:queue',
    lead: (id: string) => `leads:${id}`,
    leadPattern: 'leads:*',
    lock: (resource: string) => `locks:${resource}`,
    operation: (id: string) => `operations:${id}`,
};

/** Extracts `{id}` from `workspaces:{id}:keys`. */
export function workspaceIdFromKey(key: string): string | null {
    const match = /^workspaces:(.+):keys$/.exec(key);
    return match ? match[1] : null;
}

/** Extracts `{id}` from `leads:{id}`. */
export function leadIdFromKey(key: string): string {
    return key.slice('leads:'.length);
}
