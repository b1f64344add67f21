export { LockManager } from './lock-manager';
export type { LockManagerOptions } from './lock-manager';
export { JobTracker, toSnapshot } from './job-tracker';
export type { StreamLimits, StreamOptions, TransitionOptions } from './job-tracker';
export { JobQueue } from './job-queue';
export type { QueuedJob } from './job-queue';
export { PipelineOrchestrator, CHECKPOINTS } from './pipeline-orchestrator';
export { Poller } from './poller';
export type { PollerConfig } from './poller';
