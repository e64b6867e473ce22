import type { ExecutionErrorKind } from './types';

export class PlanExecutionError extends Error {
    readonly kind: ExecutionErrorKind;

    constructor(kind: ExecutionErrorKind, message: string) {
        super(message);
        this.name = 'PlanExecutionError';
        this.kind = kind;
    }
}
