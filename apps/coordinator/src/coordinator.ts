import { Stages } from '@leadforge/sdk';
import { CoordinatorConfig } from './config';
import { StoreSession } from './db/session';
import { StoreClient } from './db/store-client';
import { JobRepository } from './repositories/job.repository';
import { LeadRepository } from './repositories/lead.repository';
import { OperationRepository } from './repositories/operation.repository';
import { WorkspaceRepository } from './repositories/workspace.repository';
import { JobQueue, JobTracker, LockManager, PipelineOrchestrator } from './services';
import { defaultStages } from './stages';

export type CoordinatorSettings = Pick<CoordinatorConfig, 'posture' | 'redisUrl' | 'store' | 'lock' | 'operationTtlMs' | 'stream'>;

export interface CoordinatorDeps {
    stages?: Readonly<Stages>;
    /** Opens the store session; defaults to an ioredis connection to `redisUrl`. */
    connect?: () => Promise<StoreSession>;
}

export interface Coordinator {
    store: StoreClient;
    locks: LockManager;
    operations: OperationRepository;
    workspaces: WorkspaceRepository;
    jobs: JobTracker;
    leads: LeadRepository;
    queue: JobQueue;
    orchestrator: PipelineOrchestrator;
}

/** Wires every component around one StoreClient. Nothing here is process-global. */
export function createCoordinator(settings: CoordinatorSettings, deps: CoordinatorDeps = {}): Coordinator {
    const store = new StoreClient({
        posture: settings.posture,
        redisUrl: settings.redisUrl,
        connectTimeoutMs: settings.store.connectTimeoutMs,
        commandTimeoutMs: settings.store.commandTimeoutMs,
        connect: deps.connect,
    });

    const locks = new LockManager(store, settings.lock);
    const operations = new OperationRepository(store, settings.operationTtlMs);
    const workspaces = new WorkspaceRepository(store, locks, operations);
    const jobs = new JobTracker(store, new JobRepository(store), settings.stream);
    const leads = new LeadRepository(store);
    const queue = new JobQueue(store, jobs, workspaces);
    const orchestrator = new PipelineOrchestrator(deps.stages ?? defaultStages, jobs, leads, workspaces);

    return { store, locks, operations, workspaces, jobs, leads, queue, orchestrator };
}
