export type CohortStoreErrorCode = 'QUERY_FAILED' | 'TIMEOUT' | 'READ_ONLY_VIOLATION' | 'STORE_CLOSED';

export class CohortStoreError extends Error {
    readonly code: CohortStoreErrorCode;

    constructor(code: CohortStoreErrorCode, message: string) {
        super(message);
        this.name = 'CohortStoreError';
        this.code = code;
    }
}
