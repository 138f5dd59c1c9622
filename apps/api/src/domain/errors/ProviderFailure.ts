/**
 * Closed set of failure signals an embedding provider can report.
 * Providers translate their own exceptions into one of these at the boundary;
 * everything downstream switches on the kind instead of inspecting error classes.
 */
export type ProviderFailureKind =
    | 'rate_limited'
    | 'server_unavailable'
    | 'connection'
    | 'timeout'
    | 'authentication'
    | 'invalid_request'
    | 'aborted'
    | 'unexpected';

export type FailureDisposition = 'retryable' | 'fatal' | 'cancelled';

export const FAILURE_DISPOSITION: Readonly<Record<ProviderFailureKind, FailureDisposition>> = {
    rate_limited: 'retryable',
    server_unavailable: 'retryable',
    connection: 'retryable',
    timeout: 'retryable',
    authentication: 'fatal',
    invalid_request: 'fatal',
    aborted: 'cancelled',
    unexpected: 'fatal',
};

const STATUS_FAILURE_KIND: ReadonlyMap<number, ProviderFailureKind> = new Map([
    [400, 'invalid_request'],
    [401, 'authentication'],
    [403, 'authentication'],
    [404, 'invalid_request'],
    [409, 'invalid_request'],
    [413, 'invalid_request'],
    [422, 'invalid_request'],
    [429, 'rate_limited'],
    [500, 'server_unavailable'],
    [502, 'server_unavailable'],
    [503, 'server_unavailable'],
    [504, 'server_unavailable'],
]);

export function failureKindFromStatus(status: number): ProviderFailureKind {
    return STATUS_FAILURE_KIND.get(status) ?? 'unexpected';
}

export function classifyFailure(kind: ProviderFailureKind): FailureDisposition {
    return FAILURE_DISPOSITION[kind];
}

export class EmbeddingProviderError extends Error {
    constructor(
        public readonly kind: ProviderFailureKind,
        message: string,
        public readonly status?: number,
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = 'EmbeddingProviderError';
    }
}
