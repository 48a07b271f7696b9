import { ExternalServiceError } from '../errors.js';

/**
 * Race a service call against a timer.
 * Rejects with ExternalServiceError once `ms` elapses; the timer is always cleared.
 */
export async function withTimeout<T>(promise: Promise<T>, ms: number, service: string): Promise<T> {
    let timer: NodeJS.Timeout | undefined;

    const timeout = new Promise<never>((_, reject) => {
        timer = setTimeout(() => {
            reject(new ExternalServiceError(service, `timed out after ${ms}ms`));
        }, ms);
    });

    try {
        return await Promise.race([promise, timeout]);
    } finally {
        clearTimeout(timer);
    }
}
