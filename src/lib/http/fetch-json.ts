import type { ZodType, ZodTypeDef } from 'zod';
import { UpstreamDecodeError, UpstreamHttpError } from './errors';
import { withRetry, type RetryOptions } from '@/utils/retry';

export interface FetchJsonOptions {
    headers?: Record<string, string>;
    retry?: RetryOptions;
}

/**
 * GET a JSON document and decode it with a zod schema.
 * Non-2xx responses raise UpstreamHttpError (429 is retried); unparsable or
 * mis-shaped bodies raise UpstreamDecodeError.
 */
export async function fetchJson<T>(
    source: string,
    url: string,
    schema: ZodType<T, ZodTypeDef, unknown>,
    options: FetchJsonOptions = {}
): Promise<T> {
    const text = await withRetry(async () => {
        const response = await fetch(url, { headers: options.headers });

        if (!response.ok) {
            const body = await response.text().catch(() => "");
            console.error(`[${source}] API Error (${response.status}) for ${url}:`, body.substring(0, 500));
            throw new UpstreamHttpError(source, response.status, response.statusText, url);
        }

        return response.text();
    }, { label: source, ...options.retry });

    let json: unknown;
    try {
        json = JSON.parse(text);
    } catch {
        console.error(`[${source}] Failed to parse response for ${url}:`, text.substring(0, 500));
        throw new UpstreamDecodeError(source, url, `not JSON: ${text.substring(0, 200)}`);
    }

    const parsed = schema.safeParse(json);
    if (!parsed.success) {
        const first = parsed.error.issues[0];
        const where = first ? `${first.path.join('.') || '<root>'}: ${first.message}` : 'schema mismatch';
        throw new UpstreamDecodeError(source, url, where, parsed.error.issues);
    }

    return parsed.data;
}
