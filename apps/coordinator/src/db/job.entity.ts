/**
 * Lifecycle states for enrichment jobs.
 * Jobs progress: QUEUED → MINING → VALIDATING → SYNTHESIZING → COMPLETE/FAILED
 */
export enum jobStatus {
    QUEUED = 'queued',
    MINING = 'mining',
    VALIDATING = 'validating',
    SYNTHESIZING = 'synthesizing',
    COMPLETE = 'complete',
    FAILED = 'failed',
}

const RANK: Record<jobStatus, number> = {
    [jobStatus.QUEUED]: 0,
    [jobStatus.MINING]: 1,
    [jobStatus.VALIDATING]: 2,
    [jobStatus.SYNTHESIZING]: 3,
    [jobStatus.COMPLETE]: 4,
    [jobStatus.FAILED]: 4,
};

export function statusRank(status: jobStatus): number {
    return RANK[status];
}

export function isTerminal(status: jobStatus): boolean {
    return status === jobStatus.COMPLETE || status === jobStatus.FAILED;
}

export function parseJobStatus(value: unknown): jobStatus | null {
    return Object.values(jobStatus).find(s => s === value) ?? null;
}

/** Stored under `jobs:{id}`; also the JSON payload published on `jobs:{id}:events`. */
export interface JobSnapshot {
    job_id: string;
    status: jobStatus;
    progress: number;
    error?: string;
}

export interface JobEntity extends JobSnapshot {
    workspace_id: string;
    lead_count: number;
    created_at: string;
    updated_at: string;
}
