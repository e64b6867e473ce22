import { z } from 'zod';

export class SettingsError extends Error {
    readonly code = 'INVALID_SETTINGS';
    readonly issues: readonly string[];

    constructor(message: string, issues: readonly string[]) {
        super(message);
        this.name = 'SettingsError';
        this.issues = issues;
    }
}

const SettingsSchema = z.object({
    DATABASE_PATH: z.string().trim().min(1).default('data/rwd_claims.db'),
    MAX_REPAIR_ATTEMPTS: z.coerce.number().int().min(0).max(10).default(3),
    QUERY_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
    RESOLVER_TIMEOUT_MS: z.coerce.number().int().positive().default(15_000),
    SUSPICIOUS_DROP_THRESHOLD: z.coerce.number().gt(0).max(1).default(0.95),
    HUGE_COHORT_CEILING: z.coerce.number().int().positive().default(1_000_000),
    PREVIEW_ROW_LIMIT: z.coerce.number().int().min(0).max(1000).default(10),
    AI_ENDPOINT: z.string().trim().url().optional(),
    AI_MODEL: z.string().trim().min(1).optional(),
    AI_API_KEY: z.string().trim().min(1).optional(),
});

export interface AiSettings {
    endpoint: string;
    model: string;
    apiKey?: string;
}

export interface CohortSettings {
    databasePath: string;
    maxRepairAttempts: number;
    queryTimeoutMs: number;
    resolverTimeoutMs: number;
    suspiciousDropThreshold: number;
    hugeCohortCeiling: number;
    previewRowLimit: number;
    /** Null unless both an endpoint and a model are configured. */
    ai: AiSettings | null;
}

/** Reads engine settings from environment variables; unset or blank values take their defaults. */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): CohortSettings {
    const present = Object.fromEntries(
        Object.entries(env).filter((entry): entry is [string, string] => typeof entry[1] === 'string' && entry[1].trim().length > 0),
    );
    const parsed = SettingsSchema.safeParse(present);
    if (!parsed.success) {
        const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
        throw new SettingsError(`Invalid settings: ${issues.join('; ')}`, issues);
    }

    const values = parsed.data;
    const ai = values.AI_ENDPOINT && values.AI_MODEL
        ? { endpoint: values.AI_ENDPOINT, model: values.AI_MODEL, ...(values.AI_API_KEY ? { apiKey: values.AI_API_KEY } : {}) }
        : null;

    return {
        databasePath: values.DATABASE_PATH,
        maxRepairAttempts: values.MAX_REPAIR_ATTEMPTS,
        queryTimeoutMs: values.QUERY_TIMEOUT_MS,
        resolverTimeoutMs: values.RESOLVER_TIMEOUT_MS,
        suspiciousDropThreshold: values.SUSPICIOUS_DROP_THRESHOLD,
        hugeCohortCeiling: values.HUGE_COHORT_CEILING,
        previewRowLimit: values.PREVIEW_ROW_LIMIT,
        ai,
    };
}
