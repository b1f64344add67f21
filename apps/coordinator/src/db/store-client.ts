import { StorePosture } from '../config';
import { StoreUnavailableError } from '../errors/coordinator.error';
import { TimeoutError, withTimeout } from '../utils/timeout';
import { createRedis } from './index';
import { MemorySession } from './memory.session';
import { RedisSession } from './redis.session';
import { StoreSession } from './session';

const TAG = '[store]';

export interface StoreClientOptions {
    posture: StorePosture;
    redisUrl: string;
    connectTimeoutMs: number;
    commandTimeoutMs: number;
    /** Overrides how a fresh session is opened; defaults to an ioredis connection. */
    connect?: () => Promise<StoreSession>;
}

/**
 * Hands out the process's single live session to the shared store.
 *
 * Constructed once at startup and injected into every component. A cached
 * session is pinged before reuse and replaced when the ping fails. Outside
 * production an unreachable store degrades to a MemorySession, which then
 * sticks for the lifetime of the client so reads and writes never split
 * across two stores.
 */
export class StoreClient {
    private session: StoreSession | null = null;
    private connecting: Promise<StoreSession> | null = null;

    constructor(private readonly opts: StoreClientOptions) { }

    async getSession(): Promise<StoreSession> {
        const pinged = this.session;
        if (pinged) {
            if (pinged.kind === 'memory') return pinged;
            try {
                await withTimeout(pinged.ping(), this.opts.commandTimeoutMs, 'store ping');
                return pinged;
            } catch (err) {
                // another caller may already have replaced it
                if (this.session === pinged) {
                    console.warn(`${TAG} cached session failed ping, reconnecting:`, err);
                    this.session = null;
                    pinged.close().catch(closeErr => console.warn(`${TAG} closing stale session failed:`, closeErr));
                } else if (this.session) {
                    return this.session;
                }
            }
        }
        // concurrent callers share one connection attempt
        if (!this.connecting) {
            this.connecting = this.open().finally(() => {
                this.connecting = null;
            });
        }
        return this.connecting;
    }

    get usingFallback(): boolean {
        return this.session?.kind === 'memory';
    }

    async close(): Promise<void> {
        const session = this.session;
        this.session = null;
        if (session) await session.close();
    }

    private async open(): Promise<StoreSession> {
        const pending = this.connect();
        try {
            const session = await withTimeout(pending, this.opts.connectTimeoutMs, 'store connect');
            console.log(`${TAG} connected (${session.kind})`);
            this.session = session;
            return session;
        } catch (err) {
            if (err instanceof TimeoutError) abandon(pending);
            if (this.opts.posture === 'production') {
                console.error(`${TAG} store unreachable in production:`, err);
                throw new StoreUnavailableError(err);
            }
            console.warn(`${TAG} store unreachable, falling back to in-memory session:`, err);
            const fallback = new MemorySession();
            this.session = fallback;
            return fallback;
        }
    }

    private async connect(): Promise<StoreSession> {
        if (this.opts.connect) return this.opts.connect();

        const redis = createRedis({
            url: this.opts.redisUrl,
            connectTimeoutMs: this.opts.connectTimeoutMs,
            commandTimeoutMs: this.opts.commandTimeoutMs,
        });
        // errors surface through connect()/ping(); keep ioredis from logging unhandled ones
        redis.on('error', err => console.warn(`${TAG} redis error:`, err.message));
        try {
            await redis.connect();
            await redis.ping();
        } catch (err) {
            redis.disconnect();
            throw err;
        }
        return new RedisSession(redis);
    }
}

// A connect that settles after its deadline has no owner; close what it opened.
function abandon(pending: Promise<StoreSession>): void {
    pending.then(
        late => {
            console.warn(`${TAG} closing ${late.kind} session that connected after the timeout`);
            return late.close();
        },
        err => console.warn(`${TAG} abandoned connect failed:`, err),
    ).catch(err => console.warn(`${TAG} closing late session failed:`, err));
}
