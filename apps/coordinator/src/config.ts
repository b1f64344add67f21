import { v7 as uuid } from 'uuid';
import { ValidationError } from './errors/coordinator.error';

export type StorePosture = 'production' | 'development';
export type CoordinatorRole = 'all' | 'api' | 'worker';

export interface CoordinatorConfig {
    port: number;
    redisUrl: string;
    posture: StorePosture;
    role: CoordinatorRole;
    workerId: string;
    apiToken?: string;
    store: {
        connectTimeoutMs: number;
        commandTimeoutMs: number;
    };
    lock: {
        ttlMs: number;
        retryDelayMs: number;
    };
    operationTtlMs: number;
    stream: {
        maxEvents: number;
        timeoutMs: number;
        pollIntervalMs: number;
    };
    pollBatchSize: number;
}

const ROLES: readonly CoordinatorRole[] = ['all', 'api', 'worker'];

function int(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
    const raw = env[name];
    if (!raw) return fallback;
    // digits only
    if (!/^\d+$/.test(raw)) {
        throw new ValidationError(`${name} must be a non-negative integer, got "${raw}"`);
    }
    return parseInt(raw, 10);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): CoordinatorConfig {
    const role = env.COORDINATOR_ROLE || 'all';
    if (!ROLES.some(r => r === role)) {
        throw new ValidationError(`COORDINATOR_ROLE must be one of ${ROLES.join(', ')}, got "${role}"`);
    }

    return {
        port: int(env, 'PORT', 50051),
        redisUrl: env.REDIS_URL || env.VALKEY_URL || 'redis://localhost:6379',
        posture: env.NODE_ENV === 'production' ? 'production' : 'development',
        role: ROLES.find(r => r === role) ?? 'all',
        workerId: `worker-${uuid().slice(0, 8)}`,
        apiToken: env.API_TOKEN || undefined,
        store: {
            connectTimeoutMs: int(env, 'STORE_CONNECT_TIMEOUT_MS', 2000),
            commandTimeoutMs: int(env, 'STORE_COMMAND_TIMEOUT_MS', 1000),
        },
        lock: {
            ttlMs: int(env, 'LOCK_TTL_MS', 10_000),
            retryDelayMs: int(env, 'LOCK_RETRY_DELAY_MS', 100),
        },
        operationTtlMs: int(env, 'OPERATION_TTL_MS', 30_000),
        stream: {
            maxEvents: int(env, 'STREAM_MAX_EVENTS', 120),
            timeoutMs: int(env, 'STREAM_TIMEOUT_MS', 60_000),
            pollIntervalMs: int(env, 'STREAM_POLL_INTERVAL_MS', 500),
        },
        pollBatchSize: int(env, 'POLL_BATCH_SIZE', 10),
    };
}
