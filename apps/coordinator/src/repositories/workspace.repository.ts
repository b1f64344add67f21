import { v4 as uuidv4 } from 'uuid';
import { keys, workspaceIdFromKey } from '../db';
import { StoreClient } from '../db/store-client';
import { CREDENTIAL_FIELDS, isProvider, Workspace, WorkspaceFields } from '../db/workspace.entity';
import { OperationKind, operationStatus } from '../db/operation.entity';
import { errorMessage, NotFoundError, ValidationError, WriteNotDurableError } from '../errors/coordinator.error';
import { LockManager } from '../services/lock-manager';
import { OperationRepository } from './operation.repository';

const TAG = '[workspaces]';
const ID_PATTERN = /^[A-Za-z0-9_.-]{1,128}$/;

/**
 * Tenant configuration records. Every write is lock-guarded and logged to the
 * operation log; reads are unlocked.
 */
export class WorkspaceRepository {
    constructor(
        private readonly store: StoreClient,
        private readonly locks: LockManager,
        private readonly operations: OperationRepository,
    ) { }

    /**
     * Idempotent: a second create with an existing id returns the stored
     * record untouched rather than failing, since retries racing on a
     * caller-chosen id are expected.
     */
    async create(workspaceId: string | undefined, fields: WorkspaceFields): Promise<Workspace> {
        const id = workspaceId || uuidv4();
        validateId(id);
        const mapping = toHash(fields);

        return this.guarded('create', id, mapping, async () => {
            const session = await this.store.getSession();
            const key = keys.workspace(id);

            const existing = await session.hgetall(key);
            if (Object.keys(existing).length > 0) {
                console.log(`${TAG} ${id} already exists, returning stored record`);
                return fromHash(id, existing);
            }

            await session.hset(key, mapping);
            const stored = await this.verify(key);
            console.log(`${TAG} created ${id}`);
            return fromHash(id, stored);
        });
    }

    async get(workspaceId: string): Promise<Workspace> {
        const session = await this.store.getSession();
        const data = await session.hgetall(keys.workspace(workspaceId));
        if (Object.keys(data).length === 0) {
            throw new NotFoundError('workspace', workspaceId);
        }
        return fromHash(workspaceId, data);
    }

    async exists(workspaceId: string): Promise<boolean> {
        const session = await this.store.getSession();
        const data = await session.hgetall(keys.workspace(workspaceId));
        return Object.keys(data).length > 0;
    }

    // No snapshot: creates and deletes racing with the scan may or may not show up.
    async list(): Promise<Workspace[]> {
        const session = await this.store.getSession();
        const found = await session.scan(keys.workspacePattern);

        const items: Workspace[] = [];
        for (const key of found) {
            const id = workspaceIdFromKey(key);
            if (!id) continue;
            const data = await session.hgetall(key);
            // deleted between scan and read
            if (Object.keys(data).length === 0) continue;
            items.push(fromHash(id, data));
        }
        return items.sort((a, b) => a.id.localeCompare(b.id));
    }

    /** Full-record replace; fields not supplied are removed. */
    async replace(workspaceId: string, fields: WorkspaceFields): Promise<Workspace> {
        const mapping = toHash(fields);

        // also holds delete:{id}, so a delete cannot land between the
        // existence check and the rewrite
        return this.guarded('update', workspaceId, mapping, () => this.locks.withLock(`delete:${workspaceId}`, async () => {
            const session = await this.store.getSession();
            const key = keys.workspace(workspaceId);

            if (Object.keys(await session.hgetall(key)).length === 0) {
                throw new NotFoundError('workspace', workspaceId);
            }

            await session.replaceHash(key, mapping);
            const stored = await this.verify(key);
            console.log(`${TAG} replaced ${workspaceId}`);
            return fromHash(workspaceId, stored);
        }));
    }

    async delete(workspaceId: string): Promise<boolean> {
        return this.guarded('delete', workspaceId, {}, async () => {
            const session = await this.store.getSession();
            const key = keys.workspace(workspaceId);

            if (Object.keys(await session.hgetall(key)).length === 0) {
                throw new NotFoundError('workspace', workspaceId);
            }

            await session.del(key);
            console.log(`${TAG} deleted ${workspaceId}`);
            return true;
        });
    }

    // Records the operation, holds `{kind}:{id}` for the duration of fn and
    // marks the operation with its outcome.
    private async guarded<T>(
        kind: OperationKind,
        workspaceId: string,
        payload: Record<string, string>,
        fn: () => Promise<T>,
    ): Promise<T> {
        const operationId = await this.operations.record({ kind, targetId: workspaceId, payload: redact(payload) });

        let result: T;
        try {
            result = await this.locks.withLock(`${kind}:${workspaceId}`, fn);
        } catch (err) {
            console.error(`${TAG} ${kind} ${workspaceId} failed:`, errorMessage(err));
            await this.markQuietly(operationId, operationStatus.FAILED, errorMessage(err));
            throw err;
        }

        await this.markQuietly(operationId, operationStatus.COMPLETED);
        return result;
    }

    // Logged, never thrown.
    private async markQuietly(
        operationId: string,
        status: operationStatus.COMPLETED | operationStatus.FAILED,
        error?: string,
    ): Promise<void> {
        try {
            await this.operations.mark(operationId, status, error);
        } catch (err) {
            console.error(`${TAG} could not mark operation ${operationId} ${status}:`, err);
        }
    }

    private async verify(key: string): Promise<Record<string, string>> {
        const session = await this.store.getSession();
        const stored = await session.hgetall(key);
        if (Object.keys(stored).length === 0) {
            throw new WriteNotDurableError(key);
        }
        return stored;
    }
}

function validateId(id: string): void {
    if (!ID_PATTERN.test(id)) {
        throw new ValidationError('Workspace id must be 1-128 characters of letters, digits, ".", "_" or "-"');
    }
}

function toHash(fields: WorkspaceFields): Record<string, string> {
    if (!isProvider(fields.provider)) {
        throw new ValidationError(`Unknown provider "${fields.provider}"`);
    }

    const mapping: Record<string, string> = { provider: fields.provider };
    for (const field of CREDENTIAL_FIELDS) {
        const value = fields[field];
        if (value) mapping[field] = value;
    }
    return mapping;
}

function fromHash(id: string, data: Record<string, string>): Workspace {
    const provider = data.provider;
    if (!isProvider(provider)) {
        throw new ValidationError(`Workspace ${id} has invalid provider "${provider}"`);
    }

    const workspace: Workspace = { id, provider };
    for (const field of CREDENTIAL_FIELDS) {
        if (data[field]) workspace[field] = data[field];
    }
    return workspace;
}

// Credentials never go into the operation log.
function redact(mapping: Record<string, string>): Record<string, string> {
    return Object.fromEntries(
        Object.entries(mapping).map(([field, value]) => [field, field === 'provider' ? value : '***']),
    );
}
