import { Stages } from '@leadforge/sdk';
import { Coordinator, CoordinatorSettings, createCoordinator } from '../../src/coordinator';
import { MemorySession } from '../../src/db/memory.session';
import { StoreClient } from '../../src/db/store-client';

export const TEST_SETTINGS: CoordinatorSettings = {
    posture: 'development',
    redisUrl: 'redis://localhost:6379',
    store: { connectTimeoutMs: 500, commandTimeoutMs: 500 },
    lock: { ttlMs: 1000, retryDelayMs: 20 },
    operationTtlMs: 1000,
    stream: { maxEvents: 20, timeoutMs: 1000, pollIntervalMs: 50 },
};

export function createTestStore(session: MemorySession = new MemorySession()): StoreClient {
    return new StoreClient({
        posture: 'development',
        redisUrl: TEST_SETTINGS.redisUrl,
        connectTimeoutMs: 500,
        commandTimeoutMs: 500,
        connect: async () => session,
    });
}

export function createTestCoordinator(
    opts: { stages?: Readonly<Stages>; session?: MemorySession } = {},
): { coordinator: Coordinator; session: MemorySession } {
    const session = opts.session ?? new MemorySession();
    const coordinator = createCoordinator(TEST_SETTINGS, {
        stages: opts.stages,
        connect: async () => session,
    });
    return { coordinator, session };
}
