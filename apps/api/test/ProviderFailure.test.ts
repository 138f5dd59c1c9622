import { describe, it, expect } from 'vitest';
import {
    classifyFailure,
    failureKindFromStatus,
    ProviderFailureKind,
} from '../src/domain/errors/ProviderFailure';

describe('ProviderFailure', () => {
    it.each([
        [429, 'rate_limited'],
        [500, 'server_unavailable'],
        [502, 'server_unavailable'],
        [503, 'server_unavailable'],
        [504, 'server_unavailable'],
        [401, 'authentication'],
        [403, 'authentication'],
        [400, 'invalid_request'],
        [404, 'invalid_request'],
        [422, 'invalid_request'],
        [418, 'unexpected'],
        [501, 'unexpected'],
    ])('maps status %i to %s', (status, kind) => {
        expect(failureKindFromStatus(status)).toBe(kind);
    });

    it.each<[ProviderFailureKind, string]>([
        ['rate_limited', 'retryable'],
        ['server_unavailable', 'retryable'],
        ['connection', 'retryable'],
        ['timeout', 'retryable'],
        ['authentication', 'fatal'],
        ['invalid_request', 'fatal'],
        ['unexpected', 'fatal'],
        ['aborted', 'cancelled'],
    ])('classifies %s as %s', (kind, disposition) => {
        expect(classifyFailure(kind)).toBe(disposition);
    });
});
