export const sleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

export class TimeoutError extends Error {
    constructor(what: string, ms: number) {
        super(`${what} timed out after ${ms}ms`);
        this.name = 'TimeoutError';
    }
}

/** Rejects with TimeoutError if `promise` has not settled within `ms`. */
export function withTimeout<T>(promise: Promise<T>, ms: number, what: string): Promise<T> {
    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(new TimeoutError(what, ms)), ms);
    });
    return Promise.race([promise, deadline]).finally(() => clearTimeout(timer));
}
