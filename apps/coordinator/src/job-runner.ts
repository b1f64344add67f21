import { PipelineOrchestrator } from './services/pipeline-orchestrator';
import { QueuedJob } from './services/job-queue';

const TAG = '[worker]';

export async function runJob(orchestrator: PipelineOrchestrator, job: QueuedJob): Promise<void> {
    console.log(`${TAG} processing job ${job.jobId} (workspace ${job.workspaceId})`);

    try {
        const leads = await orchestrator.run(job);
        console.log(`${TAG} finished job ${job.jobId}: ${leads.length} leads`);
    } catch (err) {
        // the orchestrator already marked the job failed
        console.error(`${TAG} job ${job.jobId} failed:`, err);
        throw err;
    }
}
