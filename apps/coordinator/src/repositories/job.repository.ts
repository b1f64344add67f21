import { keys } from '../db';
import { JobEntity, jobStatus, parseJobStatus } from '../db/job.entity';
import { StoreClient } from '../db/store-client';

export interface JobUpdate {
    status: jobStatus;
    progress?: number;
    error?: string;
}

// Job writes are not lock-guarded: exactly one worker owns a job at a time.
export class JobRepository {
    constructor(private readonly store: StoreClient) { }

    async create(jobId: string, workspaceId: string, leadCount: number): Promise<JobEntity> {
        const now = new Date().toISOString();
        const job: JobEntity = {
            job_id: jobId,
            workspace_id: workspaceId,
            status: jobStatus.QUEUED,
            progress: 0,
            lead_count: leadCount,
            created_at: now,
            updated_at: now,
        };

        const session = await this.store.getSession();
        await session.hset(keys.job(jobId), {
            status: job.status,
            progress: String(job.progress),
            error: '',
            workspace_id: workspaceId,
            lead_count: String(leadCount),
            created_at: now,
            updated_at: now,
        });
        return job;
    }

    async findById(jobId: string): Promise<JobEntity | null> {
        const session = await this.store.getSession();
        const data = await session.hgetall(keys.job(jobId));

        const status = parseJobStatus(data.status);
        if (!status) return null;

        return {
            job_id: jobId,
            workspace_id: data.workspace_id ?? '',
            status,
            progress: toProgress(data.progress),
            error: data.error || undefined,
            lead_count: parseInt(data.lead_count || '0', 10),
            created_at: data.created_at ?? '',
            updated_at: data.updated_at ?? '',
        };
    }

    async update(jobId: string, update: JobUpdate): Promise<void> {
        const fields: Record<string, string> = {
            status: update.status,
            updated_at: new Date().toISOString(),
        };
        if (update.progress !== undefined) fields.progress = String(update.progress);
        if (update.error !== undefined) fields.error = update.error;

        const session = await this.store.getSession();
        await session.hset(keys.job(jobId), fields);
    }
}

function toProgress(raw: string | undefined): number {
    const value = parseFloat(raw ?? '');
    if (!Number.isFinite(value)) return 0;
    return Math.min(Math.max(value, 0), 1);
}
