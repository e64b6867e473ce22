import type { CodeSystem, ConceptResolution, PredicateDomain } from '../criteria/types';

export interface ConceptRequest {
    label: string;
    domain: PredicateDomain;
    codeSystemHint?: CodeSystem;
}

export interface ResolveOptions {
    signal?: AbortSignal;
}

/** Maps a clinical concept label to codes. May answer `resolved=false` with alternatives. */
export interface ConceptResolver {
    resolve(label: string, domain: PredicateDomain, codeSystemHint?: CodeSystem, options?: ResolveOptions): Promise<ConceptResolution>;
}

export type ConceptOutcome =
    | { status: 'resolved'; resolution: ConceptResolution }
    | { status: 'unresolved'; resolution: ConceptResolution }
    | { status: 'timeout'; message: string }
    | { status: 'failed'; message: string };

export interface ConceptMatch {
    code: string;
    description: string;
    codeSystem: CodeSystem;
    score: number;
    group?: string;
}
