export type CriteriaValidationErrorCode =
    | 'INVALID_CRITERIA'
    | 'UNKNOWN_PREDICATE'
    | 'INVALID_EDIT';

export interface CriteriaIssue {
    path: string;
    message: string;
}

export class CriteriaValidationError extends Error {
    readonly code: CriteriaValidationErrorCode;
    readonly issues: readonly CriteriaIssue[];

    constructor(code: CriteriaValidationErrorCode, message: string, issues: readonly CriteriaIssue[] = []) {
        super(message);
        this.name = 'CriteriaValidationError';
        this.code = code;
        this.issues = issues;
    }
}
