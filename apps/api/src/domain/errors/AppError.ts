import type { ProviderFailureKind } from './ProviderFailure';

export class AppError extends Error {
    constructor(
        message: string,
        public readonly statusCode: number = 500,
        public readonly code: string = 'api_error',
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = new.target.name;
    }
}

/**
 * Caller passed chunking parameters that cannot make forward progress
 */
export class InvalidConfigurationError extends AppError {
    constructor(message: string) {
        super(message, 400, 'invalid_configuration');
    }
}

export class InvalidArgumentError extends AppError {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, 400, 'invalid_argument', options);
    }
}

export class NotFoundError extends AppError {
    constructor(message = 'Resource not found') {
        super(message, 404, 'not_found');
    }
}

// 499 is the de-facto "client closed request" status
export class CancelledError extends AppError {
    constructor(message = 'Operation cancelled', options?: { cause?: unknown }) {
        super(message, 499, 'cancelled', options);
    }
}

export class EmbeddingServiceError extends AppError {
    constructor(
        message: string,
        public readonly failureKind: ProviderFailureKind,
        public readonly attempts: number,
        options?: { cause?: unknown }
    ) {
        super(message, 502, 'embedding_service_error', options);
    }
}

export class BackendUnavailableError extends AppError {
    constructor(message = 'Vector store backend unavailable', options?: { cause?: unknown }) {
        super(message, 503, 'backend_unavailable', options);
    }
}
