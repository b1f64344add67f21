import superjson from 'superjson';

// Envelopes on the job queue and operation payloads share the store's
// memory with everything else; keep them small.
export const MAX_PAYLOAD_SIZE = 512 * 1024;

export class SerializationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'SerializationError';
    }
}

export function serialize(value: unknown, maxBytes: number = MAX_PAYLOAD_SIZE): string {
    if (value === undefined) return '';

    let encoded: string;
    try {
        encoded = superjson.stringify(value);
    } catch (err) {
        throw new SerializationError(`Failed to serialize payload: ${err instanceof Error ? err.message : String(err)}`);
    }

    const size = Buffer.byteLength(encoded);
    if (size > maxBytes) {
        throw new SerializationError(`Payload is ${size} bytes, limit is ${maxBytes}`);
    }
    return encoded;
}

export function deserialize<T>(value: string | null | undefined): T | undefined {
    if (!value || value.trim() === '') return undefined;

    try {
        return superjson.parse<T>(value);
    } catch (err) {
        throw new SerializationError(`Failed to deserialize payload: ${err instanceof Error ? err.message : String(err)}`);
    }
}
