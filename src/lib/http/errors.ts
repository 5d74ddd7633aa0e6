import type { ZodIssue } from 'zod';

/**
 * Non-2xx response from an upstream platform.
 * `status` is read by `withRetry` to detect rate limiting.
 */
export class UpstreamHttpError extends Error {
    readonly status: number;
    readonly url: string;

    constructor(source: string, status: number, statusText: string, url: string) {
        super(`${source} API Error: ${status} ${statusText}`);
        this.name = 'UpstreamHttpError';
        this.status = status;
        this.url = url;
    }
}

/**
 * Upstream body that is not JSON or does not have the expected shape.
 */
export class UpstreamDecodeError extends Error {
    readonly url: string;
    readonly issues: ZodIssue[];

    constructor(source: string, url: string, detail: string, issues: ZodIssue[] = []) {
        super(`Invalid ${source} response: ${detail}`);
        this.name = 'UpstreamDecodeError';
        this.url = url;
        this.issues = issues;
    }
}

export type FailureKind = 'network' | 'decode' | 'identity' | 'empty';

/**
 * Raised inside a league provider; converted to a ProviderFailure at its boundary.
 */
export class ProviderError extends Error {
    readonly kind: FailureKind;

    constructor(kind: FailureKind, message: string) {
        super(message);
        this.name = 'ProviderError';
        this.kind = kind;
    }
}

/**
 * Maps any thrown value onto the failure taxonomy.
 * Anything that is not a decode or provider error is treated as transport failure.
 */
export function classifyFailure(error: unknown): FailureKind {
    if (error instanceof ProviderError) return error.kind;
    if (error instanceof UpstreamDecodeError) return 'decode';
    if (error instanceof SyntaxError) return 'decode';
    return 'network';
}
