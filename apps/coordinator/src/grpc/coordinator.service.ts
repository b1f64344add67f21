import { ServerUnaryCall, ServerWritableStream, sendUnaryData } from '@grpc/grpc-js';
import { Lead } from '@leadforge/sdk';
import { Coordinator } from '../coordinator';
import { JobSnapshot } from '../db/job.entity';
import { LeadEntity } from '../db/lead.entity';
import { isProvider, Workspace, WorkspaceFields } from '../db/workspace.entity';
import { ValidationError } from '../errors/coordinator.error';
import { toSnapshot } from '../services/job-tracker';
import { authorize, toServiceError } from './status';

const TAG = '[coordinator]';

interface WorkspaceFieldsMessage {
    provider: string;
    openai_key: string;
    gemini_key: string;
    tavily_key: string;
}

interface WorkspaceMessage {
    id: string;
    fields: WorkspaceFieldsMessage;
}

interface WorkspaceRef {
    workspace_id: string;
}

interface CreateWorkspaceRequest {
    workspace_id: string;
    fields: WorkspaceFieldsMessage | null;
}

type ReplaceWorkspaceRequest = CreateWorkspaceRequest;

interface ListWorkspacesResponse {
    items: WorkspaceMessage[];
}

interface DeleteWorkspaceResponse {
    deleted: boolean;
}

interface EnqueueJobRequest {
    workspace_id: string;
    leads: { fields: Record<string, string> }[];
}

interface EnqueueJobResponse {
    job_id: string;
}

interface JobRef {
    job_id: string;
}

interface JobStatusMessage {
    job_id: string;
    status: string;
    progress: number;
    error: string;
}

interface ListLeadsRequest {
    job_id: string;
    page: number;
    size: number;
}

interface ListLeadsResponse {
    items: LeadEntity[];
    page: number;
    size: number;
    total: number;
}

/**
 * gRPC surface over the coordination core. Handlers translate messages,
 * run the auth pre-check and map CoordinatorError codes to gRPC status codes.
 */
export class CoordinatorServiceImpl {
    constructor(
        private readonly coordinator: Coordinator,
        private readonly apiToken?: string,
    ) { }

    async createWorkspace(
        call: ServerUnaryCall<CreateWorkspaceRequest, WorkspaceMessage>,
        callback: sendUnaryData<WorkspaceMessage>,
    ) {
        await this.unary('createWorkspace', call, callback, async ({ workspace_id, fields }) =>
            toWorkspaceMessage(await this.coordinator.workspaces.create(workspace_id || undefined, toFields(fields))),
        );
    }

    async getWorkspace(
        call: ServerUnaryCall<WorkspaceRef, WorkspaceMessage>,
        callback: sendUnaryData<WorkspaceMessage>,
    ) {
        await this.unary('getWorkspace', call, callback, async ({ workspace_id }) =>
            toWorkspaceMessage(await this.coordinator.workspaces.get(workspace_id)),
        );
    }

    async listWorkspaces(
        call: ServerUnaryCall<Record<string, never>, ListWorkspacesResponse>,
        callback: sendUnaryData<ListWorkspacesResponse>,
    ) {
        await this.unary('listWorkspaces', call, callback, async () => {
            const items = await this.coordinator.workspaces.list();
            return { items: items.map(toWorkspaceMessage) };
        });
    }

    async replaceWorkspace(
        call: ServerUnaryCall<ReplaceWorkspaceRequest, WorkspaceMessage>,
        callback: sendUnaryData<WorkspaceMessage>,
    ) {
        await this.unary('replaceWorkspace', call, callback, async ({ workspace_id, fields }) =>
            toWorkspaceMessage(await this.coordinator.workspaces.replace(workspace_id, toFields(fields))),
        );
    }

    async deleteWorkspace(
        call: ServerUnaryCall<WorkspaceRef, DeleteWorkspaceResponse>,
        callback: sendUnaryData<DeleteWorkspaceResponse>,
    ) {
        await this.unary('deleteWorkspace', call, callback, async ({ workspace_id }) => ({
            deleted: await this.coordinator.workspaces.delete(workspace_id),
        }));
    }

    async enqueueJob(
        call: ServerUnaryCall<EnqueueJobRequest, EnqueueJobResponse>,
        callback: sendUnaryData<EnqueueJobResponse>,
    ) {
        await this.unary('enqueueJob', call, callback, async ({ workspace_id, leads }) => {
            const input: Lead[] = leads.map(lead => ({ ...lead.fields }));
            return { job_id: await this.coordinator.queue.enqueue(input, workspace_id) };
        });
    }

    async getJobStatus(
        call: ServerUnaryCall<JobRef, JobStatusMessage>,
        callback: sendUnaryData<JobStatusMessage>,
    ) {
        await this.unary('getJobStatus', call, callback, async ({ job_id }) =>
            toJobMessage(toSnapshot(await this.coordinator.jobs.get(job_id))),
        );
    }

    /** Server-streaming: current state first, then every forward change until terminal. */
    async streamJobStatus(call: ServerWritableStream<JobRef, JobStatusMessage>) {
        // a client that goes away stops the stream without waiting for the next event
        const controller = new AbortController();
        const onCancel = () => controller.abort();
        call.on('cancelled', onCancel);
        try {
            authorize(call.metadata, this.apiToken);
            const snapshots = this.coordinator.jobs.stream(call.request.job_id, { signal: controller.signal });
            for await (const snapshot of snapshots) {
                if (call.cancelled) break;
                call.write(toJobMessage(snapshot));
            }
            if (!call.cancelled) call.end();
        } catch (error) {
            console.error(`${TAG} streamJobStatus error:`, error);
            call.emit('error', toServiceError(error));
        } finally {
            call.off('cancelled', onCancel);
        }
    }

    async listLeads(
        call: ServerUnaryCall<ListLeadsRequest, ListLeadsResponse>,
        callback: sendUnaryData<ListLeadsResponse>,
    ) {
        await this.unary('listLeads', call, callback, async ({ job_id, page, size }) => {
            if (job_id) {
                const items = await this.coordinator.leads.listByJob(job_id);
                return { items, page: 1, size: items.length, total: items.length };
            }
            return this.coordinator.leads.list(page || 1, size || 50);
        });
    }

    private async unary<Req, Res>(
        method: string,
        call: ServerUnaryCall<Req, Res>,
        callback: sendUnaryData<Res>,
        handle: (request: Req) => Promise<Res>,
    ): Promise<void> {
        try {
            authorize(call.metadata, this.apiToken);
            callback(null, await handle(call.request));
        } catch (error) {
            console.error(`${TAG} ${method} error:`, error instanceof Error ? error.message : error);
            callback(toServiceError(error));
        }
    }
}

function toFields(message: WorkspaceFieldsMessage | null): WorkspaceFields {
    if (!message || !message.provider) {
        throw new ValidationError('provider is required');
    }
    if (!isProvider(message.provider)) {
        throw new ValidationError(`Unknown provider "${message.provider}"`);
    }

    const fields: WorkspaceFields = { provider: message.provider };
    if (message.openai_key) fields.openai_key = message.openai_key;
    if (message.gemini_key) fields.gemini_key = message.gemini_key;
    if (message.tavily_key) fields.tavily_key = message.tavily_key;
    return fields;
}

function toWorkspaceMessage(workspace: Workspace): WorkspaceMessage {
    return {
        id: workspace.id,
        fields: {
            provider: workspace.provider,
            openai_key: workspace.openai_key ?? '',
            gemini_key: workspace.gemini_key ?? '',
            tavily_key: workspace.tavily_key ?? '',
        },
    };
}

function toJobMessage(snapshot: JobSnapshot): JobStatusMessage {
    return {
        job_id: snapshot.job_id,
        status: snapshot.status,
        progress: snapshot.progress,
        error: snapshot.error ?? '',
    };
}
