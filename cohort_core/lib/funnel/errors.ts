export type FunnelComputeErrorCode = 'UNKNOWN_PREDICATE' | 'STALE_CACHE' | 'SOURCE_FAILED';

export class FunnelComputeError extends Error {
    readonly code: FunnelComputeErrorCode;
    readonly predicateIds: readonly string[];

    constructor(code: FunnelComputeErrorCode, message: string, predicateIds: readonly string[] = []) {
        super(message);
        this.name = 'FunnelComputeError';
        this.code = code;
        this.predicateIds = predicateIds;
    }
}
