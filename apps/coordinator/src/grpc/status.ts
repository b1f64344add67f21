import * as grpc from '@grpc/grpc-js';
import { CoordinatorError, CoordinatorErrorCode } from '../errors/coordinator.error';

const STATUS_BY_CODE: Record<CoordinatorErrorCode, grpc.status> = {
    NOT_FOUND: grpc.status.NOT_FOUND,
    LOCK_BUSY: grpc.status.ABORTED,
    VALIDATION: grpc.status.INVALID_ARGUMENT,
    STORE_UNAVAILABLE: grpc.status.UNAVAILABLE,
    WRITE_NOT_DURABLE: grpc.status.DATA_LOSS,
    JOB_TRANSITION: grpc.status.FAILED_PRECONDITION,
    STAGE_FAILED: grpc.status.INTERNAL,
};

export class UnauthenticatedError extends Error {
    constructor() {
        super('invalid API token');
        this.name = 'UnauthenticatedError';
    }
}

export interface ServiceErrorStatus {
    code: grpc.status;
    details: string;
}

export function toServiceError(err: unknown): ServiceErrorStatus {
    if (err instanceof CoordinatorError) {
        return { code: STATUS_BY_CODE[err.code], details: err.message };
    }
    if (err instanceof UnauthenticatedError) {
        return { code: grpc.status.UNAUTHENTICATED, details: err.message };
    }
    return {
        code: grpc.status.INTERNAL,
        details: err instanceof Error ? err.message : 'Unknown error',
    };
}

/** Opaque pre-check: when a token is configured, callers must send it as `x-api-token`. */
export function authorize(metadata: grpc.Metadata, apiToken: string | undefined): void {
    if (!apiToken) return;
    const [sent] = metadata.get('x-api-token');
    if (sent === undefined || sent.toString() !== apiToken) {
        throw new UnauthenticatedError();
    }
}
