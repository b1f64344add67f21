import { ServerUnaryCall, ServerWritableStream, sendUnaryData } from '@grpc/grpc-js';
import { StoreClient } from '../db/store-client';

interface HealthCheckRequest {
    service: string;
}

interface HealthCheckResponse {
    status: 'SERVING' | 'NOT_SERVING';
}

/**
 * Standard gRPC health check service implementation.
 * Serving means the shared store answers a ping (the in-memory fallback always does).
 */
export class HealthService {
    constructor(private readonly store: StoreClient) { }

    async check(
        call: ServerUnaryCall<HealthCheckRequest, HealthCheckResponse>,
        callback: sendUnaryData<HealthCheckResponse>,
    ) {
        callback(null, { status: await this.probe() });
    }

    async watch(call: ServerWritableStream<HealthCheckRequest, HealthCheckResponse>) {
        call.write({ status: await this.probe() });
        call.end();
    }

    private async probe(): Promise<HealthCheckResponse['status']> {
        try {
            const session = await this.store.getSession();
            await session.ping();
            return 'SERVING';
        } catch (error) {
            console.error('[health] check failed:', error);
            return 'NOT_SERVING';
        }
    }
}
