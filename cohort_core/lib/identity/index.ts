export { buildCanonicalHash, sha256, stableStringify } from './canonicalHash';
