/**
 * Utility for sleeping/delaying execution.
 * @param ms - Milliseconds to sleep
 */
export const sleep = (ms: number): Promise<void> =>
    new Promise(resolve => setTimeout(resolve, ms));

export interface RetryOptions {
    maxRetries?: number;
    initialDelay?: number;
    /** Upper bound for a single backoff window */
    maxDelay?: number;
    /** Prefix for the rate-limit warning */
    label?: string;
}

const getStatus = (error: unknown): number => {
    if (typeof error !== 'object' || error === null) return 0;
    if ('status' in error && typeof error.status === 'number') return error.status;
    if ('statusCode' in error && typeof error.statusCode === 'number') return error.statusCode;
    return 0;
};

const getMessage = (error: unknown): string => {
    if (error instanceof Error) return error.message;
    if (typeof error === 'string') return error;
    return '';
};

/**
 * Executes a function with exponential backoff retry.
 * Only rate-limit (429) failures are retried; anything else is rethrown at once.
 *
 * @throws The last error if all retries fail
 */
export async function withRetry<T>(
    fn: () => Promise<T>,
    options: RetryOptions = {}
): Promise<T> {
    const maxRetries = options.maxRetries ?? 4;
    const initialDelay = options.initialDelay ?? 2000;
    const maxDelay = options.maxDelay ?? Number(process.env.RETRY_MAX_DELAY_MS ?? 60000);
    const label = options.label ?? 'API';
    let lastError: unknown;

    for (let attempt = 0; attempt < maxRetries; attempt++) {
        try {
            return await fn();
        } catch (error: unknown) {
            lastError = error;
            const status = getStatus(error);
            const message = getMessage(error);
            const isRateLimited = status === 429 || message.includes('429');

            if (!isRateLimited) throw error;
            if (attempt === maxRetries - 1) break;

            let delay = initialDelay * Math.pow(2, attempt);

            // Honor an explicit hint such as "Please retry in 22.8s"
            const match = message.match(/retry in ([\d.]+)s/i);
            if (match) {
                const seconds = parseFloat(match[1]);
                delay = Math.max(delay, (seconds + 1) * 1000);
            }

            delay = Math.min(delay, maxDelay);

            console.warn(
                `[${label}] rate limited (429) - Retrying in ${Math.round(delay / 1000)}s (Attempt ${attempt + 1}/${maxRetries})`
            );
            await sleep(delay);
        }
    }

    throw lastError;
}
