import { Lead, StageContext, StageName, StageOutput, Stages, StageWorkspace } from '@leadforge/sdk';
import { LeadEntity } from '../db/lead.entity';
import { jobStatus } from '../db/job.entity';
import { errorMessage, NotFoundError, StageFailedError } from '../errors/coordinator.error';
import { LeadRepository } from '../repositories/lead.repository';
import { WorkspaceRepository } from '../repositories/workspace.repository';
import { JobTracker } from './job-tracker';
import { QueuedJob } from './job-queue';

const TAG = '[pipeline]';

// Progress recorded when each status is entered.
export const CHECKPOINTS = {
    [jobStatus.MINING]: 0.1,
    [jobStatus.VALIDATING]: 0.4,
    [jobStatus.SYNTHESIZING]: 0.7,
    [jobStatus.COMPLETE]: 1.0,
} as const;

/**
 * Runs mine → validate → synthesize over a job's leads, stage by stage, so
 * the job status only ever moves forward. Leads are written only after every
 * stage succeeded for every lead; a failed job leaves no lead records.
 *
 * Callers guarantee a job id is handed to one orchestrator at a time.
 */
export class PipelineOrchestrator {
    constructor(
        private readonly stages: Readonly<Stages>,
        private readonly tracker: JobTracker,
        private readonly leads: LeadRepository,
        private readonly workspaces: WorkspaceRepository,
    ) { }

    async run(job: QueuedJob): Promise<LeadEntity[]> {
        const { jobId, workspaceId } = job;
        console.log(`${TAG} job ${jobId} started (${job.leads.length} leads)`);

        try {
            const ctx: StageContext = { jobId, workspace: await this.loadWorkspace(workspaceId) };

            await this.tracker.transition(jobId, jobStatus.MINING, { progress: CHECKPOINTS[jobStatus.MINING] });
            const mined = await this.each('mine', job.leads, lead => this.stages.mine(lead, ctx));

            await this.tracker.transition(jobId, jobStatus.VALIDATING, { progress: CHECKPOINTS[jobStatus.VALIDATING] });
            const validated = await this.each('validate', job.leads, lead => this.stages.validate(lead, ctx));

            await this.tracker.transition(jobId, jobStatus.SYNTHESIZING, { progress: CHECKPOINTS[jobStatus.SYNTHESIZING] });
            const synthesized = await this.each('synthesize', job.leads, (lead, i) =>
                this.stages.synthesize(lead, mined[i], validated[i], ctx),
            );

            const saved = await this.leads.saveAll(jobId, workspaceId, synthesized.map((output, i) => ({
                output,
                leadId: job.leads[i].id,
            })));

            await this.tracker.transition(jobId, jobStatus.COMPLETE, { progress: CHECKPOINTS[jobStatus.COMPLETE] });
            console.log(`${TAG} job ${jobId} complete (${saved.length} leads written)`);
            return saved;
        } catch (err) {
            console.error(`${TAG} job ${jobId} failed:`, errorMessage(err));
            await this.tracker
                .transition(jobId, jobStatus.FAILED, { error: errorMessage(err) || 'unknown error' })
                .catch(markErr => console.error(`${TAG} could not mark job ${jobId} failed:`, markErr));
            throw err;
        }
    }

    private async each(
        stage: StageName,
        leads: Lead[],
        fn: (lead: Lead, index: number) => Promise<StageOutput> | StageOutput,
    ): Promise<StageOutput[]> {
        const outputs: StageOutput[] = [];
        for (const [i, lead] of leads.entries()) {
            try {
                outputs.push(await fn(lead, i));
            } catch (err) {
                if (err instanceof StageFailedError) throw err;
                throw new StageFailedError(stage, errorMessage(err));
            }
        }
        return outputs;
    }

    // The workspace is context for the stages, not a precondition: a job keeps
    // running if its workspace was deleted after it was enqueued.
    private async loadWorkspace(workspaceId: string): Promise<StageWorkspace | null> {
        try {
            const { id, provider, ...credentials } = await this.workspaces.get(workspaceId);
            return { id, provider, credentials };
        } catch (err) {
            if (err instanceof NotFoundError) {
                console.warn(`${TAG} workspace ${workspaceId} no longer exists, running without it`);
                return null;
            }
            throw err;
        }
    }
}
