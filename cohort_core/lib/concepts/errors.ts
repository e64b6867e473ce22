export type ConceptResolutionErrorCode = 'ABORTED' | 'TIMEOUT' | 'LOOKUP_FAILED' | 'INVALID_RESPONSE';

export class ConceptResolutionError extends Error {
    readonly code: ConceptResolutionErrorCode;

    constructor(code: ConceptResolutionErrorCode, message: string) {
        super(message);
        this.name = 'ConceptResolutionError';
        this.code = code;
    }
}
