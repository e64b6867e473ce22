export type SessionStateErrorCode =
    | 'INVALID_STATE'
    | 'INVALID_TRANSITION'
    | 'FINALIZED'
    | 'MISSING_COLLABORATOR'
    | 'INVALID_APPROVAL';

export class SessionStateError extends Error {
    readonly code: SessionStateErrorCode;

    constructor(code: SessionStateErrorCode, message: string) {
        super(message);
        this.name = 'SessionStateError';
        this.code = code;
    }
}
