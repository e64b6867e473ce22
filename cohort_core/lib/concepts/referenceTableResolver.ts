import { DEFAULT_DOMAIN_MAPPINGS } from '../catalog/defaultMappings';
import type { DomainMappings, ReferenceMapping } from '../catalog/types';
import type { AlternativeResolution, CodeSystem, ConceptResolution, Confidence, PredicateDomain } from '../criteria/types';
import type { CohortStore, SqlRow } from '../store/types';
import { ConceptResolutionError } from './errors';
import type { ConceptMatch, ConceptResolver, ResolveOptions } from './types';

const MAX_MATCHES = 50;

export interface ReferenceTableResolverOptions {
    store: CohortStore;
    domainMappings?: DomainMappings;
}

/**
 * Looks concept labels up in the reference tables of the dataset (ICD-10, CPT, NDC).
 *
 * Scores: description equal to the label 1.0, starting with it 0.9, containing it 0.7
 * for diagnoses; 0.8 for procedures; 1.0 / 0.9 / 0.7 for drugs matched on name and class,
 * name only, class only.
 */
export class ReferenceTableConceptResolver implements ConceptResolver {
    private readonly store: CohortStore;
    private readonly mappings: DomainMappings;

    constructor(options: ReferenceTableResolverOptions) {
        this.store = options.store;
        this.mappings = options.domainMappings ?? DEFAULT_DOMAIN_MAPPINGS;
    }

    async resolve(label: string, domain: PredicateDomain, codeSystemHint?: CodeSystem, options: ResolveOptions = {}): Promise<ConceptResolution> {
        const term = label.trim().toLowerCase();
        const reference = this.mappings[domain]?.reference;
        if (term.length === 0 || !reference?.descriptionColumn) {
            return unresolved(codeSystemHint ?? 'local', `No reference table to search for domain "${domain}".`);
        }

        if (domain === 'diagnosis') {
            const matches = await this.search(reference, term, 'ICD10CM', options.signal);
            return resolveDiagnosis(matches);
        }
        if (domain === 'drug') {
            const matches = await this.search(reference, term, 'NDC', options.signal);
            return resolveDrug(matches, term);
        }
        if (domain === 'procedure') {
            const matches = await this.search(reference, term, codeSystemHint === 'HCPCS' ? 'HCPCS' : 'CPT', options.signal);
            return resolveProcedure(matches);
        }
        return unresolved(codeSystemHint ?? 'local', `Reference lookup is not supported for domain "${domain}".`);
    }

    /** Reference rows whose description (or group) contains the term, best score first. */
    async search(reference: ReferenceMapping, term: string, codeSystem: CodeSystem, signal?: AbortSignal): Promise<ConceptMatch[]> {
        if (signal?.aborted) {
            throw new ConceptResolutionError('ABORTED', `Lookup of "${term}" was aborted.`);
        }

        const description = reference.descriptionColumn ?? reference.codeColumn;
        const group = reference.groupColumn;
        const sql = [
            `SELECT r.${reference.codeColumn} AS code, r.${description} AS description${group ? `, r.${group} AS grp` : ''}`,
            `FROM ${reference.table} r`,
            `WHERE LOWER(r.${description}) LIKE ?${group ? ` OR LOWER(r.${group}) LIKE ?` : ''}`,
            `ORDER BY r.${description}, r.${reference.codeColumn}`,
            `LIMIT ${MAX_MATCHES}`,
        ].join('\n');
        const pattern = `%${term}%`;

        let rows: SqlRow[];
        try {
            rows = await this.store.query(sql, { params: group ? [pattern, pattern] : [pattern] });
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            throw new ConceptResolutionError('LOOKUP_FAILED', `Reference lookup in ${reference.table} failed: ${message}`);
        }
        if (signal?.aborted) {
            throw new ConceptResolutionError('ABORTED', `Lookup of "${term}" was aborted.`);
        }

        const matches: ConceptMatch[] = [];
        for (const row of rows) {
            const code = textOf(row.code);
            const text = textOf(row.description);
            if (code === null || text === null) {
                continue;
            }
            const rowGroup = textOf(row.grp) ?? undefined;
            matches.push({
                code,
                description: text,
                codeSystem,
                score: scoreMatch(codeSystem, term, text, rowGroup),
                ...(rowGroup === undefined ? {} : { group: rowGroup }),
            });
        }
        return matches.sort((left, right) => right.score - left.score);
    }
}

export function scoreMatch(codeSystem: CodeSystem, term: string, description: string, group?: string): number {
    const text = description.toLowerCase();
    if (codeSystem === 'NDC') {
        const nameMatch = text.includes(term);
        const groupMatch = group?.toLowerCase().includes(term) ?? false;
        if (nameMatch && groupMatch) {
            return 1.0;
        }
        return nameMatch ? 0.9 : 0.7;
    }
    if (codeSystem === 'CPT' || codeSystem === 'HCPCS') {
        return text.includes(term) ? 0.8 : 0.6;
    }
    if (text === term) {
        return 1.0;
    }
    return text.startsWith(term) ? 0.9 : 0.7;
}

function confidenceFor(score: number): Confidence {
    if (score >= 0.9) {
        return 'high';
    }
    return score >= 0.7 ? 'medium' : 'low';
}

/** ICD-10 matches roll up to their three-character categories as wildcard codes. */
function resolveDiagnosis(matches: readonly ConceptMatch[]): ConceptResolution {
    if (matches.length === 0) {
        return unresolved('ICD10CM', 'No ICD-10 description matches the concept.');
    }
    const best = matches[0].score;
    const top = matches.filter((match) => match.score === best);
    const categories = unique(top.map((match) => `${categoryOf(match.code)}*`));
    const alternatives: AlternativeResolution[] = [
        {
            codeValues: unique(top.map((match) => match.code)),
            description: 'Exact codes of the best matches',
            confidence: confidenceFor(best),
            matchingLogic: 'exact',
        },
    ];
    const weaker = matches.filter((match) => match.score < best);
    if (weaker.length > 0) {
        alternatives.push({
            codeValues: unique(weaker.map((match) => `${categoryOf(match.code)}*`)),
            description: 'Categories of partial description matches',
            confidence: confidenceFor(weaker[0].score),
            matchingLogic: 'wildcard',
        });
    }
    return {
        resolved: true,
        codeSystem: 'ICD10CM',
        codeValues: categories,
        matchingLogic: 'wildcard',
        confidence: confidenceFor(best),
        alternatives,
        notes: top.map((match) => `${match.code} ${match.description}`).join('; '),
    };
}

/** Drug names become ingredient values; the codes of a class-only match are an alternative. */
function resolveDrug(matches: readonly ConceptMatch[], term: string): ConceptResolution {
    const byName = matches.filter((match) => match.description.toLowerCase().includes(term));
    if (byName.length === 0) {
        if (matches.length === 0) {
            return unresolved('NDC', 'No NDC drug name or class matches the concept.');
        }
        return {
            ...unresolved('NDC', 'Only drug classes match; pick the class alternative to use every drug in it.'),
            alternatives: [{
                codeValues: unique(matches.map((match) => match.description.toLowerCase())),
                description: `Every drug in classes matching "${term}"`,
                confidence: 'medium',
                matchingLogic: 'ingredient',
            }],
        };
    }

    const best = byName[0].score;
    return {
        resolved: true,
        codeSystem: 'NDC',
        codeValues: unique(byName.map((match) => match.description.toLowerCase())),
        matchingLogic: 'ingredient',
        confidence: confidenceFor(best),
        alternatives: [{
            codeValues: unique(byName.map((match) => match.code)),
            description: 'Exact NDC codes of the matching drugs',
            confidence: 'medium',
            matchingLogic: 'exact',
        }],
    };
}

function resolveProcedure(matches: readonly ConceptMatch[]): ConceptResolution {
    if (matches.length === 0) {
        return unresolved('CPT', 'No procedure description matches the concept.');
    }
    return {
        resolved: true,
        codeSystem: matches[0].codeSystem,
        codeValues: unique(matches.map((match) => match.code)),
        matchingLogic: 'exact',
        confidence: confidenceFor(matches[0].score),
        notes: matches.map((match) => `${match.code} ${match.description}`).join('; '),
    };
}

function unresolved(codeSystem: CodeSystem, notes: string): ConceptResolution {
    return { resolved: false, codeSystem, codeValues: [], matchingLogic: 'exact', confidence: 'low', notes };
}

function categoryOf(code: string): string {
    return code.split('.')[0].slice(0, 3).toUpperCase();
}

function unique(values: readonly string[]): string[] {
    return Array.from(new Set(values));
}

function textOf(value: unknown): string | null {
    if (typeof value === 'string') {
        return value;
    }
    return typeof value === 'number' || typeof value === 'bigint' ? String(value) : null;
}
