export type OperationKind = 'create' | 'read' | 'update' | 'delete';

export enum operationStatus {
    PENDING = 'pending',
    COMPLETED = 'completed',
    FAILED = 'failed',
}

/**
 * Audit record of one attempted workspace mutation, stored under
 * `operations:{id}` and expired by the store itself.
 */
export interface OperationEntity {
    operation_id: string;
    kind: OperationKind;
    target_id: string;
    payload: unknown;
    status: operationStatus;
    error?: string;
    created_at: string;
    completed_at?: string;
}
