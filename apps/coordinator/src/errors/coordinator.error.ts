export type CoordinatorErrorCode =
    | 'STORE_UNAVAILABLE'
    | 'LOCK_BUSY'
    | 'WRITE_NOT_DURABLE'
    | 'NOT_FOUND'
    | 'STAGE_FAILED'
    | 'VALIDATION'
    | 'JOB_TRANSITION';

export abstract class CoordinatorError extends Error {
    abstract readonly code: CoordinatorErrorCode;
}

/** The shared store could not be reached (fatal in production). */
export class StoreUnavailableError extends CoordinatorError {
    readonly code = 'STORE_UNAVAILABLE';

    constructor(public readonly reason: unknown) {
        super(`Store unavailable: ${reason instanceof Error ? reason.message : String(reason)}`);
        this.name = 'StoreUnavailableError';
    }
}

/** Lock still held by someone else after the single retry. */
export class LockBusyError extends CoordinatorError {
    readonly code = 'LOCK_BUSY';

    constructor(public readonly resource: string) {
        super(`Could not acquire lock for ${resource}`);
        this.name = 'LockBusyError';
    }
}

/** The write was accepted but reading it back came up empty. */
export class WriteNotDurableError extends CoordinatorError {
    readonly code = 'WRITE_NOT_DURABLE';

    constructor(public readonly key: string) {
        super(`Record ${key} not found after write`);
        this.name = 'WriteNotDurableError';
    }
}

export class NotFoundError extends CoordinatorError {
    readonly code = 'NOT_FOUND';

    constructor(
        public readonly entity: 'workspace' | 'job',
        public readonly id: string,
    ) {
        super(`${entity === 'workspace' ? 'Workspace' : 'Job'} ${id} not found`);
        this.name = 'NotFoundError';
    }
}

export class StageFailedError extends CoordinatorError {
    readonly code = 'STAGE_FAILED';

    constructor(
        public readonly stage: string,
        message: string,
    ) {
        super(`${stage} stage failed: ${message}`);
        this.name = 'StageFailedError';
    }
}

export class ValidationError extends CoordinatorError {
    readonly code = 'VALIDATION';

    constructor(message: string) {
        super(message);
        this.name = 'ValidationError';
    }
}

/** A job status write that would move the job backwards or out of a terminal state. */
export class JobTransitionError extends CoordinatorError {
    readonly code = 'JOB_TRANSITION';

    constructor(
        public readonly jobId: string,
        public readonly from: string,
        public readonly to: string,
    ) {
        super(`Job ${jobId} cannot move from ${from} to ${to}`);
        this.name = 'JobTransitionError';
    }
}

export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
