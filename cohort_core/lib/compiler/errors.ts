export type CompileErrorKind =
    | 'missing_catalog_mapping'
    | 'unresolved_required_predicate'
    | 'invalid_anchor'
    | 'unsupported_unit';

export interface CompileErrorDetail {
    predicateId: string | null;
    kind: CompileErrorKind;
    message: string;
}

export class CriteriaCompileError extends Error {
    readonly kind: CompileErrorKind;
    readonly predicateIds: readonly string[];
    readonly details: readonly CompileErrorDetail[];

    constructor(kind: CompileErrorKind, message: string, details: readonly CompileErrorDetail[] = []) {
        super(message);
        this.name = 'CriteriaCompileError';
        this.kind = kind;
        this.details = details;
        this.predicateIds = Array.from(new Set(
            details.map((detail) => detail.predicateId).filter((id): id is string => id !== null),
        ));
    }
}
