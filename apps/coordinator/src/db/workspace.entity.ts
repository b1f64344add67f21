import { Provider } from '@leadforge/sdk';

export const PROVIDERS: readonly Provider[] = ['openai', 'gemini'];

export const CREDENTIAL_FIELDS = ['openai_key', 'gemini_key', 'tavily_key'] as const;
export type CredentialField = typeof CREDENTIAL_FIELDS[number];

/**
 * Stored under `workspaces:{id}:keys`. Only credentials the caller supplied
 * are written, so a create followed by a get returns exactly the input.
 */
export type WorkspaceFields = { provider: Provider } & Partial<Record<CredentialField, string>>;

export interface Workspace extends WorkspaceFields {
    id: string;
}

export function isProvider(value: unknown): value is Provider {
    return PROVIDERS.some(p => p === value);
}
