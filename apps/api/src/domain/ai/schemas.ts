export enum AiErrorCode {
    PROVIDER_RATE_LIMIT = 'PROVIDER_RATE_LIMIT',
    PROVIDER_AUTH_ERROR = 'PROVIDER_AUTH_ERROR',
    PROVIDER_NETWORK_ERROR = 'PROVIDER_NETWORK_ERROR',
    INTERNAL_ERROR = 'INTERNAL_ERROR',
}

export class AiError extends Error {
    constructor(
        public readonly code: AiErrorCode,
        message: string,
        public readonly originalError?: unknown
    ) {
        super(message);
        this.name = 'AiError';
    }
}
