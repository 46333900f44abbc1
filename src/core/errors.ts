// ─────────────────────────────────────────────────────────────
// Proplogic  ·  Errors
// ─────────────────────────────────────────────────────────────

import type { Postulate } from './ir';

/**
 * Thrown whenever a postulate is executed. A derivation that reaches one
 * is a type-level certificate only, never a runnable program.
 */
export class AxiomInvocationError extends Error {
    readonly postulate: Postulate;

    constructor(postulate: Postulate) {
        super(`postulate "${postulate}" cannot be executed`);
        this.name = 'AxiomInvocationError';
        this.postulate = postulate;
    }
}

export function isAxiomInvocation(e: unknown): e is AxiomInvocationError {
    return e instanceof AxiomInvocationError;
}

export class UnboundAtomError extends Error {
    readonly atom: string;

    constructor(atom: string) {
        super(`no truth value assigned to atom "${atom}"`);
        this.name = 'UnboundAtomError';
        this.atom = atom;
    }
}

export class UnknownTheoremError extends Error {
    constructor(name: string) {
        super(`no theorem named "${name}" in the catalog`);
        this.name = 'UnknownTheoremError';
    }
}
