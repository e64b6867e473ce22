import crypto from 'node:crypto';

type UnknownRecord = Record<string, unknown>;

export function sha256(input: string | Buffer): string {
    return crypto.createHash('sha256').update(input).digest('hex');
}

/** sha256 over the key-sorted JSON form, so property order never changes the hash. */
export function buildCanonicalHash(input: unknown): string {
    return sha256(stableStringify(input));
}

export function stableStringify(input: unknown, spaces = 0): string {
    return JSON.stringify(canonicalize(input), null, spaces);
}

function canonicalize(value: unknown): unknown {
    if (value === undefined) {
        return null;
    }

    if (value === null || typeof value !== 'object') {
        return value;
    }

    if (Array.isArray(value)) {
        return value.map((entry) => canonicalize(entry));
    }

    const record: UnknownRecord = { ...value };
    return Object.keys(record)
        .sort((left, right) => left.localeCompare(right))
        .reduce<UnknownRecord>((acc, key) => {
            if (record[key] !== undefined) {
                acc[key] = canonicalize(record[key]);
            }
            return acc;
        }, {});
}
