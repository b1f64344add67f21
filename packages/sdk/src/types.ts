// A lead as submitted by callers: flat string fields, e.g. { company: 'Acme Corp' }.
export type Lead = Record<string, string>;

export type LeadValue = string | number | boolean | string[];

// Output of any stage. Non-string values are JSON-encoded when persisted.
export type StageOutput = Record<string, LeadValue>;

export type Provider = 'openai' | 'gemini';

export interface StageWorkspace {
    id: string;
    provider: Provider;
    credentials: Partial<Record<'openai_key' | 'gemini_key' | 'tavily_key', string>>;
}

export interface StageContext {
    jobId: string;
    workspace: StageWorkspace | null;
}

export type StageName = 'mine' | 'validate' | 'synthesize';

export interface Stages {
    mine(lead: Lead, ctx: StageContext): Promise<StageOutput> | StageOutput;
    validate(lead: Lead, ctx: StageContext): Promise<StageOutput> | StageOutput;
    synthesize(
        lead: Lead,
        mined: StageOutput,
        validated: StageOutput,
        ctx: StageContext,
    ): Promise<StageOutput> | StageOutput;
}
