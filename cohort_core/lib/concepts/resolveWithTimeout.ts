import { withTimeout } from '../utils/withTimeout';
import { ConceptResolutionError } from './errors';
import type { ConceptOutcome, ConceptRequest, ConceptResolver } from './types';

/**
 * Calls the resolver with a deadline. A timeout or a resolver failure becomes an outcome
 * the caller records as a gap; it is never thrown.
 */
export async function resolveWithTimeout(
    resolver: ConceptResolver,
    request: ConceptRequest,
    timeoutMs: number,
): Promise<ConceptOutcome> {
    const controller = new AbortController();
    try {
        const resolution = await withTimeout(
            resolver.resolve(request.label, request.domain, request.codeSystemHint, { signal: controller.signal }),
            timeoutMs,
            () => {
                controller.abort();
                return new ConceptResolutionError('TIMEOUT', `Concept resolution for "${request.label}" exceeded ${timeoutMs}ms.`);
            },
        );
        return resolution.resolved && resolution.codeValues.length > 0
            ? { status: 'resolved', resolution }
            : { status: 'unresolved', resolution };
    } catch (error) {
        if (error instanceof ConceptResolutionError && (error.code === 'TIMEOUT' || error.code === 'ABORTED')) {
            return { status: 'timeout', message: error.message };
        }
        return { status: 'failed', message: error instanceof Error ? error.message : String(error) };
    }
}
