import { keys } from '../db';
import { isTerminal, JobEntity, JobSnapshot, jobStatus, parseJobStatus, statusRank } from '../db/job.entity';
import { StoreClient } from '../db/store-client';
import { JobTransitionError, NotFoundError } from '../errors/coordinator.error';
import { JobRepository } from '../repositories/job.repository';
import { Inbox } from '../utils/inbox';

const TAG = '[jobs]';

export interface StreamLimits {
    /** Most snapshots one stream emits, the initial one included. */
    maxEvents: number;
    timeoutMs: number;
    /** How long the channel may stay quiet before the job record is re-read. */
    pollIntervalMs: number;
}

export interface StreamOptions extends Partial<StreamLimits> {
    /** Ends the stream early, e.g. when the consumer went away. */
    signal?: AbortSignal;
}

export interface TransitionOptions {
    progress?: number;
    error?: string;
}

/**
 * Job lifecycle: the `jobs:{id}` hash is the source of truth, the
 * `jobs:{id}:events` channel is a best-effort push of the same snapshot.
 */
export class JobTracker {
    constructor(
        private readonly store: StoreClient,
        private readonly jobs: JobRepository,
        private readonly streamDefaults: StreamLimits,
    ) { }

    async create(jobId: string, workspaceId: string, leadCount: number): Promise<JobSnapshot> {
        const job = await this.jobs.create(jobId, workspaceId, leadCount);
        const snapshot = toSnapshot(job);
        await this.publish(snapshot);
        return snapshot;
    }

    async get(jobId: string): Promise<JobEntity> {
        const job = await this.jobs.findById(jobId);
        if (!job) throw new NotFoundError('job', jobId);
        return job;
    }

    /**
     * Moves a job forward. Status writes that go backwards, or that follow a
     * terminal status, are rejected with JobTransitionError.
     */
    async transition(jobId: string, status: jobStatus, opts: TransitionOptions = {}): Promise<JobSnapshot> {
        const current = await this.get(jobId);
        if (isTerminal(current.status) || statusRank(status) < statusRank(current.status)) {
            console.warn(`${TAG} rejected ${jobId} ${current.status} -> ${status}`);
            throw new JobTransitionError(jobId, current.status, status);
        }

        await this.jobs.update(jobId, { status, progress: opts.progress, error: opts.error });

        const snapshot: JobSnapshot = {
            job_id: jobId,
            status,
            progress: opts.progress ?? current.progress,
        };
        const error = opts.error ?? current.error;
        if (error) snapshot.error = error;

        console.log(`${TAG} ${jobId} ${current.status} -> ${status} (${snapshot.progress})`);
        await this.publish(snapshot);
        return snapshot;
    }

    /**
     * Emits the persisted state first, then every forward change until the job
     * is terminal or the event/time budget runs out. Ends without error when
     * the budget is exhausted or `signal` aborts. Never emits a snapshot
     * behind the previous one.
     */
    async *stream(jobId: string, opts: StreamOptions = {}): AsyncGenerator<JobSnapshot> {
        const maxEvents = opts.maxEvents ?? this.streamDefaults.maxEvents;
        const timeoutMs = opts.timeoutMs ?? this.streamDefaults.timeoutMs;
        const pollIntervalMs = opts.pollIntervalMs ?? this.streamDefaults.pollIntervalMs;
        const { signal } = opts;

        // subscribe before reading so nothing published in between is lost
        const inbox = new Inbox<string>();
        const session = await this.store.getSession();
        const subscription = await session.subscribe(keys.jobEvents(jobId), message => inbox.push(message));
        const onAbort = () => inbox.close();
        signal?.addEventListener('abort', onAbort, { once: true });

        try {
            let last = toSnapshot(await this.get(jobId));
            yield last;
            let emitted = 1;

            const deadline = Date.now() + timeoutMs;
            while (!isTerminal(last.status) && emitted < maxEvents && !signal?.aborted) {
                const remaining = deadline - Date.now();
                if (remaining <= 0) break;

                const raw = await inbox.next(Math.min(pollIntervalMs, remaining));
                if (signal?.aborted) break;
                const next = raw === null ? await this.reread(jobId) : parseSnapshot(raw, jobId);
                if (!next || !advances(last, next)) continue;

                last = next;
                yield next;
                emitted++;
            }
        } finally {
            signal?.removeEventListener('abort', onAbort);
            await subscription.unsubscribe();
        }
    }

    private async reread(jobId: string): Promise<JobSnapshot | null> {
        const job = await this.jobs.findById(jobId);
        return job ? toSnapshot(job) : null;
    }

    private async publish(snapshot: JobSnapshot): Promise<void> {
        try {
            const session = await this.store.getSession();
            await session.publish(keys.jobEvents(snapshot.job_id), JSON.stringify(snapshot));
        } catch (err) {
            console.warn(`${TAG} publish for ${snapshot.job_id} failed, observers will fall back to polling:`, err);
        }
    }
}

export function toSnapshot(job: JobSnapshot): JobSnapshot {
    const snapshot: JobSnapshot = { job_id: job.job_id, status: job.status, progress: job.progress };
    if (job.error) snapshot.error = job.error;
    return snapshot;
}

function advances(prev: JobSnapshot, next: JobSnapshot): boolean {
    const delta = statusRank(next.status) - statusRank(prev.status);
    if (delta !== 0) return delta > 0;
    return next.status === prev.status && next.progress > prev.progress;
}

function parseSnapshot(raw: string, jobId: string): JobSnapshot | null {
    let data: unknown;
    try {
        data = JSON.parse(raw);
    } catch (err) {
        console.warn(`${TAG} ignoring malformed event for ${jobId}:`, err);
        return null;
    }
    if (typeof data !== 'object' || data === null) return null;

    const status = parseJobStatus('status' in data ? data.status : undefined);
    if (!status) return null;

    const snapshot: JobSnapshot = {
        job_id: jobId,
        status,
        progress: 'progress' in data && typeof data.progress === 'number' ? data.progress : 0,
    };
    if ('error' in data && typeof data.error === 'string' && data.error) {
        snapshot.error = data.error;
    }
    return snapshot;
}
