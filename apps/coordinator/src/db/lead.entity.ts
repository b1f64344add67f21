/**
 * A synthesized lead stored under `leads:{id}`. Field values are kept as the
 * store holds them: strings as-is, anything else JSON-encoded.
 */
export interface LeadEntity {
    id: string;
    fields: Record<string, string>;
}
