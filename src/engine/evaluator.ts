// ─────────────────────────────────────────────────────────────
// Proplogic  ·  Truth Evaluator
// Classical truth value of a proposition descriptor
// ─────────────────────────────────────────────────────────────

import type { Proposition } from '../core/ir';
import { UnboundAtomError } from '../core/errors';

export type Valuation = Readonly<Partial<Record<string, boolean>>>;

// ── Evaluate a proposition under a valuation ────────────────

/**
 * Computed on every call, visiting each node once. Closed propositions
 * need no valuation and never throw.
 */
export function truth(prop: Proposition, valuation: Valuation = {}): boolean {
    switch (prop.tag) {
        case 'Bool':
            return prop.value;

        case 'Atom': {
            const value = valuation[prop.name];
            if (value === undefined) throw new UnboundAtomError(prop.name);
            return value;
        }

        case 'And':
            return truth(prop.left, valuation) && truth(prop.right, valuation);

        case 'Or':
            return truth(prop.left, valuation) || truth(prop.right, valuation);

        // Material implication: vacuously true when the premise is false
        case 'Imply':
            return !truth(prop.premise, valuation) || truth(prop.conclusion, valuation);
    }
}

export function isClosed(prop: Proposition): boolean {
    switch (prop.tag) {
        case 'Bool': return true;
        case 'Atom': return false;
        case 'And': case 'Or': return isClosed(prop.left) && isClosed(prop.right);
        case 'Imply': return isClosed(prop.premise) && isClosed(prop.conclusion);
    }
}
