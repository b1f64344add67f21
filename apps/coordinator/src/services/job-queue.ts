import { deserialize, Lead, serialize } from '@leadforge/sdk';
import { v7 as uuid } from 'uuid';
import { keys } from '../db';
import { StoreClient } from '../db/store-client';
import { NotFoundError, ValidationError } from '../errors/coordinator.error';
import { WorkspaceRepository } from '../repositories/workspace.repository';
import { JobTracker } from './job-tracker';

const TAG = '[queue]';

export interface QueuedJob {
    jobId: string;
    workspaceId: string;
    leads: Lead[];
    enqueuedAt: Date;
}

/**
 * FIFO of jobs on `jobs:queue`. Delivery is at-most-once: a worker that
 * crashes after popping a job leaves it stuck in its last status.
 */
export class JobQueue {
    constructor(
        private readonly store: StoreClient,
        private readonly tracker: JobTracker,
        private readonly workspaces: WorkspaceRepository,
    ) { }

    async enqueue(leads: Lead[], workspaceId: string): Promise<string> {
        if (leads.length === 0) {
            throw new ValidationError('No leads provided');
        }
        leads.forEach((lead, i) => {
            if (Object.keys(lead).length === 0) {
                throw new ValidationError(`Lead ${i} has no fields`);
            }
        });
        if (!(await this.workspaces.exists(workspaceId))) {
            throw new NotFoundError('workspace', workspaceId);
        }

        const jobId = uuid();
        const envelope: QueuedJob = { jobId, workspaceId, leads, enqueuedAt: new Date() };
        const payload = serialize(envelope);

        await this.tracker.create(jobId, workspaceId, leads.length);
        const session = await this.store.getSession();
        await session.lpush(keys.jobQueue, payload);

        console.log(`${TAG} enqueued ${jobId} (${leads.length} leads, workspace ${workspaceId})`);
        return jobId;
    }

    async dequeue(batchSize: number): Promise<QueuedJob[]> {
        const session = await this.store.getSession();
        const jobs: QueuedJob[] = [];

        while (jobs.length < batchSize) {
            const raw = await session.rpop(keys.jobQueue);
            if (raw === null) break;

            let job: QueuedJob | undefined;
            try {
                job = deserialize<QueuedJob>(raw);
            } catch (err) {
                console.error(`${TAG} dropping unreadable queue entry:`, err);
                continue;
            }
            if (!job?.jobId) {
                console.error(`${TAG} dropping queue entry without a job id`);
                continue;
            }
            jobs.push(job);
        }
        return jobs;
    }
}
