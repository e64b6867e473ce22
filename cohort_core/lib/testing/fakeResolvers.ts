import type { CodeSystem, ConceptResolution, PredicateDomain } from '../criteria/types';
import type { ConceptResolver, ResolveOptions } from '../concepts/types';

type Answer = ConceptResolution | Error | 'hang';

/**
 * Answers concept lookups from a label-keyed table. An Error entry is thrown; `hang`
 * never settles unless the caller aborts. Unknown labels come back unresolved.
 */
export class TableConceptResolver implements ConceptResolver {
    readonly requests: Array<{ label: string; domain: PredicateDomain }> = [];

    constructor(private readonly answers: Readonly<Record<string, Answer>>) {}

    async resolve(label: string, domain: PredicateDomain, codeSystemHint?: CodeSystem, options: ResolveOptions = {}): Promise<ConceptResolution> {
        this.requests.push({ label, domain });
        const answer = this.answers[label];
        if (answer === undefined) {
            return {
                resolved: false,
                codeSystem: codeSystemHint ?? 'local',
                codeValues: [],
                matchingLogic: 'exact',
                confidence: 'low',
                notes: `No codes known for "${label}".`,
            };
        }
        if (answer instanceof Error) {
            throw answer;
        }
        if (answer === 'hang') {
            return new Promise<ConceptResolution>((_, reject) => {
                options.signal?.addEventListener('abort', () => reject(new Error(`Lookup of "${label}" aborted.`)), { once: true });
            });
        }
        return answer;
    }
}
