import { StageOutput } from '@leadforge/sdk';
import { v4 as uuidv4 } from 'uuid';
import { keys, leadIdFromKey } from '../db';
import { LeadEntity } from '../db/lead.entity';
import { StoreClient } from '../db/store-client';

export interface LeadPage {
    items: LeadEntity[];
    page: number;
    size: number;
    total: number;
}

export interface NewLead {
    output: StageOutput;
    /** Caller-supplied id; a fresh one is generated when empty. */
    leadId?: string;
}

export class LeadRepository {
    constructor(private readonly store: StoreClient) { }

    /**
     * Writes a job's synthesized leads and links them to the job in one
     * atomic batch: either every lead is stored or none is.
     */
    async saveAll(jobId: string, workspaceId: string, outputs: NewLead[]): Promise<LeadEntity[]> {
        const leads = outputs.map(({ output, leadId }) => {
            const fields = encodeFields(output);
            fields.job_id = jobId;
            fields.workspace_id = workspaceId;
            return { id: leadId || uuidv4(), fields };
        });
        if (leads.length === 0) return [];

        const session = await this.store.getSession();
        await session.writeBatch({
            hashes: leads.map(lead => ({ key: keys.lead(lead.id), fields: lead.fields })),
            pushes: [{ key: keys.jobLeads(jobId), values: leads.map(lead => lead.id) }],
        });

        return leads;
    }

    async findById(leadId: string): Promise<LeadEntity | null> {
        const session = await this.store.getSession();
        const fields = await session.hgetall(keys.lead(leadId));
        return Object.keys(fields).length > 0 ? { id: leadId, fields } : null;
    }

    async listByJob(jobId: string): Promise<LeadEntity[]> {
        const session = await this.store.getSession();
        // lpush prepends; reverse to get write order
        const ids = (await session.lrange(keys.jobLeads(jobId), 0, -1)).reverse();

        const leads: LeadEntity[] = [];
        for (const id of ids) {
            const lead = await this.findById(id);
            if (lead) leads.push(lead);
        }
        return leads;
    }

    async list(page: number = 1, size: number = 50): Promise<LeadPage> {
        const session = await this.store.getSession();
        const all = (await session.scan(keys.leadPattern)).sort();
        const start = (Math.max(page, 1) - 1) * size;

        const items: LeadEntity[] = [];
        for (const key of all.slice(start, start + size)) {
            const lead = await this.findById(leadIdFromKey(key));
            if (lead) items.push(lead);
        }
        return { items, page, size, total: all.length };
    }
}

export function encodeFields(output: StageOutput): Record<string, string> {
    const fields: Record<string, string> = {};
    for (const [name, value] of Object.entries(output)) {
        fields[name] = typeof value === 'string' ? value : JSON.stringify(value);
    }
    return fields;
}
