import { deserialize, serialize } from '@leadforge/sdk';
import { v4 as uuidv4 } from 'uuid';
import { keys } from '../db';
import { OperationEntity, OperationKind, operationStatus } from '../db/operation.entity';
import { StoreClient } from '../db/store-client';

const TAG = '[operations]';

export interface NewOperation {
    kind: OperationKind;
    targetId: string;
    payload: unknown;
}

// Audit trail only: nothing replays these. Each record is written by the one
// call that owns it and expires on the store's own clock.
export class OperationRepository {
    constructor(
        private readonly store: StoreClient,
        private readonly ttlMs: number,
    ) { }

    async record(op: NewOperation): Promise<string> {
        const operationId = uuidv4();
        const key = keys.operation(operationId);
        const session = await this.store.getSession();

        // fields and expiry land together; a record never exists without its TTL
        await session.writeBatch({
            hashes: [{
                key,
                ttlMs: this.ttlMs,
                fields: {
                    operation_id: operationId,
                    kind: op.kind,
                    target_id: op.targetId,
                    payload: serialize(op.payload),
                    status: operationStatus.PENDING,
                    error: '',
                    created_at: new Date().toISOString(),
                },
            }],
        });

        return operationId;
    }

    /**
     * Terminal update. Returns false without writing if the record already
     * expired, so a slow caller never resurrects it without a TTL.
     */
    async mark(operationId: string, status: operationStatus.COMPLETED | operationStatus.FAILED, error?: string): Promise<boolean> {
        const key = keys.operation(operationId);
        const session = await this.store.getSession();

        if (await session.pttl(key) < 0) {
            console.warn(`${TAG} ${operationId} expired before it could be marked ${status}`);
            return false;
        }

        await session.hset(key, {
            status,
            error: error ?? '',
            completed_at: new Date().toISOString(),
        });
        return true;
    }

    async find(operationId: string): Promise<OperationEntity | null> {
        const session = await this.store.getSession();
        const data = await session.hgetall(keys.operation(operationId));
        if (!data.operation_id) return null;

        return {
            operation_id: data.operation_id,
            kind: toKind(data.kind),
            target_id: data.target_id ?? '',
            payload: deserialize(data.payload),
            status: toStatus(data.status),
            error: data.error || undefined,
            created_at: data.created_at ?? '',
            completed_at: data.completed_at || undefined,
        };
    }
}

const KINDS: readonly OperationKind[] = ['create', 'read', 'update', 'delete'];

function toKind(value: string | undefined): OperationKind {
    return KINDS.find(k => k === value) ?? 'read';
}

function toStatus(value: string | undefined): operationStatus {
    return Object.values(operationStatus).find(s => s === value) ?? operationStatus.PENDING;
}
