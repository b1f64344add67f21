import { Coordinator } from '../../src/coordinator';
import { jobStatus, statusRank } from '../../src/db/job.entity';
import { runJob } from '../../src/job-runner';
import { Poller } from '../../src/services/poller';
import { collect, waitUntil } from '../helpers/poll';
import { createTestCoordinator } from '../helpers/store';

describe('lead enrichment pipeline', () => {
    let coordinator: Coordinator;
    let poller: Poller;

    beforeEach(async () => {
        ({ coordinator } = createTestCoordinator());
        poller = new Poller(coordinator.queue, {
            workerId: 'test-worker',
            minIntervalMs: 10,
            maxIntervalMs: 50,
            onJobReceived: job => runJob(coordinator.orchestrator, job),
        });
        await coordinator.workspaces.create('w1', { provider: 'openai', openai_key: 'test-secret' });
    });

    afterEach(async () => {
        await poller.stop();
    });

    it('takes a job from enqueue to two written leads', async () => {
        const jobId = await coordinator.queue.enqueue([{ company: 'Acme Corp' }, { company: 'Beta LLC' }], 'w1');
        const events = collect(coordinator.jobs.stream(jobId, { timeoutMs: 5000 }));

        poller.start();
        const seen = await events;

        // forward-only, ending complete
        for (let i = 1; i < seen.length; i++) {
            expect(statusRank(seen[i].status)).toBeGreaterThanOrEqual(statusRank(seen[i - 1].status));
            expect(seen[i].progress).toBeGreaterThanOrEqual(seen[i - 1].progress);
        }
        expect(seen[seen.length - 1]).toEqual({ job_id: jobId, status: jobStatus.COMPLETE, progress: 1 });

        const leads = await coordinator.leads.listByJob(jobId);
        expect(leads.map(l => l.fields.company)).toEqual(['Acme Corp', 'Beta LLC']);
        expect(leads.every(l => l.fields.job_id === jobId && l.fields.workspace_id === 'w1')).toBe(true);

        const page = await coordinator.leads.list(1, 10);
        expect(page.total).toBe(2);
    });

    it('runs queued jobs one after another in a single worker', async () => {
        const first = await coordinator.queue.enqueue([{ company: 'Acme Corp' }], 'w1');
        const second = await coordinator.queue.enqueue([{ name: 'Gamma' }], 'w1');

        poller.start();
        await waitUntil(async () => {
            const [a, b] = await Promise.all([coordinator.jobs.get(first), coordinator.jobs.get(second)]);
            return a.status === jobStatus.COMPLETE && b.status === jobStatus.COMPLETE;
        });

        const [lead] = await coordinator.leads.listByJob(second);
        expect(lead.fields.company).toBe('Gamma');
        expect((await coordinator.leads.list()).total).toBe(2);
    });

    it('leaves a failed job with an error and no leads', async () => {
        ({ coordinator } = createTestCoordinator({
            stages: {
                mine: lead => ({ company: lead.company }),
                validate: () => ({ risks: [] }),
                synthesize: () => {
                    throw new Error('model quota exceeded');
                },
            },
        }));
        poller = new Poller(coordinator.queue, {
            workerId: 'test-worker',
            minIntervalMs: 10,
            onJobReceived: job => runJob(coordinator.orchestrator, job),
        });
        await coordinator.workspaces.create('w1', { provider: 'gemini' });
        const jobId = await coordinator.queue.enqueue([{ company: 'Acme Corp' }], 'w1');

        poller.start();
        const seen = await collect(coordinator.jobs.stream(jobId, { timeoutMs: 5000 }));

        expect(seen[seen.length - 1]).toEqual({
            job_id: jobId,
            status: jobStatus.FAILED,
            progress: 0.7,
            error: 'synthesize stage failed: model quota exceeded',
        });
        expect(await coordinator.leads.listByJob(jobId)).toEqual([]);
    });
});
