export const SESSION_STATES = [
    'collecting_criteria',
    'compiling_concepts',
    'compiling_query',
    'executing',
    'repairing',
    'funneling',
    'awaiting_feedback',
    'revising',
    'finalized',
] as const;

export type SessionState = typeof SESSION_STATES[number];

// Compile failures and exhausted repairs both wait for the user in awaiting_feedback.
export const ALLOWED_TRANSITIONS: Readonly<Record<SessionState, readonly SessionState[]>> = {
    collecting_criteria: ['compiling_concepts'],
    compiling_concepts: ['compiling_query'],
    compiling_query: ['executing', 'awaiting_feedback'],
    executing: ['repairing', 'funneling', 'awaiting_feedback'],
    repairing: ['executing', 'awaiting_feedback'],
    funneling: ['awaiting_feedback'],
    awaiting_feedback: ['revising', 'finalized'],
    revising: ['compiling_concepts', 'compiling_query'],
    finalized: [],
};

/** States in which `advance()` stops and waits for the caller. */
export const WAITING_STATES: readonly SessionState[] = ['collecting_criteria', 'awaiting_feedback', 'finalized'];

export const APPROVAL_TOKENS: readonly string[] = ['finalize', 'approve', 'good', 'ship it', 'done'];

export function canTransition(from: SessionState, to: SessionState): boolean {
    return ALLOWED_TRANSITIONS[from].includes(to);
}

export function isApprovalToken(token: string): boolean {
    const normalized = token.trim().toLowerCase().replace(/\s+/g, ' ').replace(/[.!]+$/, '');
    return APPROVAL_TOKENS.includes(normalized);
}
