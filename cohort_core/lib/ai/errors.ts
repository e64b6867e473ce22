export type AiClientErrorCode = 'HTTP_ERROR' | 'INVALID_RESPONSE' | 'REQUEST_FAILED';

export class AiClientError extends Error {
    readonly code: AiClientErrorCode;
    readonly status: number | null;

    constructor(code: AiClientErrorCode, message: string, status: number | null = null) {
        super(message);
        this.name = 'AiClientError';
        this.code = code;
        this.status = status;
    }
}
