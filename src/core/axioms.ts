// ─────────────────────────────────────────────────────────────
// Proplogic  ·  Axioms
// Non-constructive postulates. Their types state classically
// valid facts; their bodies never produce a value.
// ─────────────────────────────────────────────────────────────

import type { False, Not, Or, Prop } from './connectives';
import type { Postulate } from './ir';
import { AxiomInvocationError } from './errors';

function postulate(name: Postulate): never {
    throw new AxiomInvocationError(name);
}

/** Evidence of any proposition. Executing it is always fatal. */
export function axiom<P extends Prop>(): P {
    return postulate('axiom');
}

/**
 * Marks a proof obligation as accepted without proof.
 * @deprecated Replace with a real derivation before release.
 */
export function sorry<P extends Prop>(): P {
    console.warn('[Axiom] sorry: proof obligation accepted without proof');
    return postulate('sorry');
}

/** Principle of explosion: from a contradiction, anything. */
export function exfalso<P extends Prop>(_h: False): P {
    return postulate('exfalso');
}

export function excludedMiddle<P extends Prop>(): Or<P, Not<P>> {
    return postulate('excludedMiddle');
}
