import { Coordinator } from '../src/coordinator';
import { MemorySession } from '../src/db/memory.session';
import { OperationEntity, operationStatus } from '../src/db/operation.entity';
import { WorkspaceFields } from '../src/db/workspace.entity';
import { LockBusyError, NotFoundError, ValidationError, WriteNotDurableError } from '../src/errors/coordinator.error';
import { sleep } from './helpers/poll';
import { createTestCoordinator } from './helpers/store';

describe('WorkspaceRepository', () => {
    let coordinator: Coordinator;
    let session: MemorySession;

    beforeEach(() => {
        ({ coordinator, session } = createTestCoordinator());
    });

    async function operationLog(): Promise<OperationEntity[]> {
        const found: OperationEntity[] = [];
        for (const key of await session.scan('operations:*')) {
            const op = await coordinator.operations.find(key.slice('operations:'.length));
            if (op) found.push(op);
        }
        return found;
    }

    describe('create', () => {
        it('stores exactly the supplied fields', async () => {
            const created = await coordinator.workspaces.create('w1', { provider: 'openai', openai_key: 'test-secret' });

            expect(created).toEqual({ id: 'w1', provider: 'openai', openai_key: 'test-secret' });
            expect(await coordinator.workspaces.get('w1')).toEqual(created);
            expect(await session.hgetall('workspaces:w1:keys')).toEqual({ provider: 'openai', openai_key: 'test-secret' });
        });

        it('generates an id when none is given', async () => {
            const created = await coordinator.workspaces.create(undefined, { provider: 'gemini' });

            expect(created.id).toMatch(/^[0-9a-f-]{36}$/);
            expect(await coordinator.workspaces.exists(created.id)).toBe(true);
        });

        it('returns the stored record when the id already exists', async () => {
            await coordinator.workspaces.create('w1', { provider: 'openai', openai_key: 'test-secret' });
            const again = await coordinator.workspaces.create('w1', { provider: 'gemini', gemini_key: 'other-secret' });

            expect(again).toEqual({ id: 'w1', provider: 'openai', openai_key: 'test-secret' });
        });

        it('lets concurrent creates of the same id both succeed with one record', async () => {
            const [a, b] = await Promise.all([
                coordinator.workspaces.create('w1', { provider: 'openai' }),
                coordinator.workspaces.create('w1', { provider: 'openai' }),
            ]);

            expect(a).toEqual({ id: 'w1', provider: 'openai' });
            expect(b).toEqual(a);
            expect(await session.scan('workspaces:*:keys')).toEqual(['workspaces:w1:keys']);
        });

        it('fails with WriteNotDurableError when the record cannot be read back', async () => {
            jest.spyOn(session, 'hgetall')
                .mockResolvedValueOnce({})
                .mockResolvedValueOnce({});

            await expect(coordinator.workspaces.create('w1', { provider: 'openai' }))
                .rejects.toBeInstanceOf(WriteNotDurableError);

            const [op] = await operationLog();
            expect(op).toMatchObject({
                kind: 'create',
                status: operationStatus.FAILED,
                error: 'Record workspaces:w1:keys not found after write',
            });
        });

        it('rejects malformed ids', async () => {
            await expect(coordinator.workspaces.create('has space', { provider: 'openai' }))
                .rejects.toBeInstanceOf(ValidationError);
            await expect(coordinator.workspaces.create('x'.repeat(129), { provider: 'openai' }))
                .rejects.toBeInstanceOf(ValidationError);
        });

        it('rejects unknown providers before touching the store', async () => {
            const fields: WorkspaceFields = JSON.parse('{"provider":"anthropic"}');

            await expect(coordinator.workspaces.create('w1', fields)).rejects.toThrow('Unknown provider "anthropic"');
            expect(await session.scan('*')).toEqual([]);
        });

        it('fails with LockBusyError while another writer holds the lock', async () => {
            await session.set('locks:create:w1', 'other-owner', { ttlMs: 60_000 });

            await expect(coordinator.workspaces.create('w1', { provider: 'openai' })).rejects.toBeInstanceOf(LockBusyError);
            expect(await coordinator.workspaces.exists('w1')).toBe(false);
        });
    });

    describe('get', () => {
        it('throws NotFoundError for a missing workspace', async () => {
            await expect(coordinator.workspaces.get('missing')).rejects.toBeInstanceOf(NotFoundError);
            await expect(coordinator.workspaces.get('missing')).rejects.toThrow('Workspace missing not found');
        });
    });

    describe('list', () => {
        it('returns every workspace sorted by id', async () => {
            await coordinator.workspaces.create('b', { provider: 'gemini' });
            await coordinator.workspaces.create('a', { provider: 'openai', tavily_key: 'test-secret' });

            expect(await coordinator.workspaces.list()).toEqual([
                { id: 'a', provider: 'openai', tavily_key: 'test-secret' },
                { id: 'b', provider: 'gemini' },
            ]);
        });

        it('is empty when nothing exists', async () => {
            expect(await coordinator.workspaces.list()).toEqual([]);
        });
    });

    describe('replace', () => {
        it('drops fields that are not supplied again', async () => {
            await coordinator.workspaces.create('w1', { provider: 'openai', openai_key: 'test-secret', tavily_key: 'test-secret' });

            const replaced = await coordinator.workspaces.replace('w1', { provider: 'gemini', gemini_key: 'test-secret' });

            expect(replaced).toEqual({ id: 'w1', provider: 'gemini', gemini_key: 'test-secret' });
            expect(await coordinator.workspaces.get('w1')).toEqual(replaced);
        });

        it('throws NotFoundError for a missing workspace', async () => {
            await expect(coordinator.workspaces.replace('missing', { provider: 'openai' }))
                .rejects.toBeInstanceOf(NotFoundError);
            expect(await coordinator.workspaces.exists('missing')).toBe(false);
        });

        it('fails with WriteNotDurableError when the replaced record cannot be read back', async () => {
            await coordinator.workspaces.create('w1', { provider: 'openai' });
            const read = session.hgetall.bind(session);
            jest.spyOn(session, 'hgetall')
                .mockImplementationOnce(read)
                .mockResolvedValueOnce({});

            await expect(coordinator.workspaces.replace('w1', { provider: 'gemini' }))
                .rejects.toThrow('Record workspaces:w1:keys not found after write');

            const update = (await operationLog()).find(op => op.kind === 'update');
            expect(update).toMatchObject({ status: operationStatus.FAILED, target_id: 'w1' });
        });

        it('keeps a concurrent delete out until the rewrite is done', async () => {
            await coordinator.workspaces.create('w1', { provider: 'openai' });
            const write = session.replaceHash.bind(session);
            let deleting: Promise<boolean> | undefined;
            jest.spyOn(session, 'replaceHash').mockImplementationOnce(async (key, fields) => {
                deleting = coordinator.workspaces.delete('w1');
                await sleep(5);
                await write(key, fields);
            });

            expect(await coordinator.workspaces.replace('w1', { provider: 'gemini' }))
                .toEqual({ id: 'w1', provider: 'gemini' });
            // the delete retried after the replace released its locks
            expect(await deleting).toBe(true);
            expect(await coordinator.workspaces.exists('w1')).toBe(false);
        });
    });

    describe('delete', () => {
        it('removes the record, then reports NotFound on a second delete', async () => {
            await coordinator.workspaces.create('w1', { provider: 'openai' });

            expect(await coordinator.workspaces.delete('w1')).toBe(true);
            await expect(coordinator.workspaces.get('w1')).rejects.toBeInstanceOf(NotFoundError);
            await expect(coordinator.workspaces.delete('w1')).rejects.toBeInstanceOf(NotFoundError);
        });
    });

    describe('operation log', () => {
        it('records a completed operation with credentials redacted', async () => {
            await coordinator.workspaces.create('w1', { provider: 'openai', openai_key: 'test-secret' });

            const [op, ...rest] = await operationLog();
            expect(rest).toEqual([]);
            expect(op).toMatchObject({
                kind: 'create',
                target_id: 'w1',
                status: operationStatus.COMPLETED,
                payload: { provider: 'openai', openai_key: '***' },
            });
        });

        it('records failures with their error', async () => {
            await expect(coordinator.workspaces.delete('w9')).rejects.toBeInstanceOf(NotFoundError);

            const [op] = await operationLog();
            expect(op).toMatchObject({
                kind: 'delete',
                target_id: 'w9',
                status: operationStatus.FAILED,
                error: 'Workspace w9 not found',
            });
        });

        it('still returns the result when marking the operation fails', async () => {
            jest.spyOn(coordinator.operations, 'mark').mockRejectedValueOnce(new Error('connection reset'));

            expect(await coordinator.workspaces.create('w1', { provider: 'openai' })).toEqual({ id: 'w1', provider: 'openai' });
        });
    });
});
