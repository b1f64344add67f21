import * as grpc from '@grpc/grpc-js';
import {
    JobTransitionError,
    LockBusyError,
    NotFoundError,
    StageFailedError,
    StoreUnavailableError,
    ValidationError,
    WriteNotDurableError,
} from '../src/errors/coordinator.error';
import { authorize, toServiceError, UnauthenticatedError } from '../src/grpc/status';

describe('toServiceError', () => {
    it.each([
        [new NotFoundError('job', 'j1'), grpc.status.NOT_FOUND, 'Job j1 not found'],
        [new LockBusyError('create:w1'), grpc.status.ABORTED, 'Could not acquire lock for create:w1'],
        [new ValidationError('No leads provided'), grpc.status.INVALID_ARGUMENT, 'No leads provided'],
        [new StoreUnavailableError(new Error('ECONNREFUSED')), grpc.status.UNAVAILABLE, 'Store unavailable: ECONNREFUSED'],
        [new WriteNotDurableError('workspaces:w1:keys'), grpc.status.DATA_LOSS, 'Record workspaces:w1:keys not found after write'],
        [new JobTransitionError('j1', 'complete', 'mining'), grpc.status.FAILED_PRECONDITION, 'Job j1 cannot move from complete to mining'],
        [new StageFailedError('mine', 'timeout'), grpc.status.INTERNAL, 'mine stage failed: timeout'],
        [new UnauthenticatedError(), grpc.status.UNAUTHENTICATED, 'invalid API token'],
        [new Error('boom'), grpc.status.INTERNAL, 'boom'],
    ])('maps %s', (err, code, details) => {
        expect(toServiceError(err)).toEqual({ code, details });
    });

    it('does not leak non-error values', () => {
        expect(toServiceError('secret')).toEqual({ code: grpc.status.INTERNAL, details: 'Unknown error' });
    });
});

describe('authorize', () => {
    it('lets everything through when no token is configured', () => {
        expect(() => authorize(new grpc.Metadata(), undefined)).not.toThrow();
    });

    it('requires the configured token', () => {
        const metadata = new grpc.Metadata();
        expect(() => authorize(metadata, 'test-secret')).toThrow(UnauthenticatedError);

        metadata.set('x-api-token', 'wrong');
        expect(() => authorize(metadata, 'test-secret')).toThrow('invalid API token');

        metadata.set('x-api-token', 'test-secret');
        expect(() => authorize(metadata, 'test-secret')).not.toThrow();
    });
});
