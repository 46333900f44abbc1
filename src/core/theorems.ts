// ─────────────────────────────────────────────────────────────
// Proplogic  ·  Theorems
// Each signature is the statement; each body is the proof.
// Derivations that case on excludedMiddle type-check as
// classical certificates and throw if actually executed.
// ─────────────────────────────────────────────────────────────

import { and, left, right, matchOr, type And, type Or, type Imply, type Not, type Equal, type Prop } from './connectives';
import { exfalso, excludedMiddle } from './axioms';

// ── Commutativity ───────────────────────────────────────────

export function andComm<A extends Prop, B extends Prop>(h: And<A, B>): And<B, A> {
    return and(h.snd, h.fst);
}

export function orComm<L extends Prop, R extends Prop>(h: Or<L, R>): Or<R, L> {
    switch (h.side) {
        case 'left': return right(h.value);
        case 'right': return left(h.value);
    }
}

// ── Double negation ─────────────────────────────────────────

export function doubleNegationIntroduction<P extends Prop>(p: P): Not<Not<P>> {
    return np => np(p);
}

export function doubleNegationElimination<P extends Prop>(nnp: Not<Not<P>>): P {
    return matchOr(
        excludedMiddle<P>(),
        p => p,
        np => exfalso<P>(nnp(np)),
    );
}

export function doubleNegation<P extends Prop>(): Equal<P, Not<Not<P>>> {
    return and<Imply<P, Not<Not<P>>>, Imply<Not<Not<P>>, P>>(
        p => doubleNegationIntroduction(p),
        nnp => doubleNegationElimination(nnp),
    );
}

// ── Contraposition ──────────────────────────────────────────

export function contrapositionForward<P extends Prop, Q extends Prop>(h: Imply<P, Q>): Imply<Not<Q>, Not<P>> {
    return nq => p => nq(h(p));
}

export function contrapositionReverse<P extends Prop, Q extends Prop>(h: Imply<Not<Q>, Not<P>>): Imply<P, Q> {
    return p => matchOr(
        excludedMiddle<Q>(),
        q => q,
        nq => exfalso<Q>(h(nq)(p)),
    );
}

export function contraposition<P extends Prop, Q extends Prop>(): Equal<Imply<P, Q>, Imply<Not<Q>, Not<P>>> {
    return and<Imply<Imply<P, Q>, Imply<Not<Q>, Not<P>>>, Imply<Imply<Not<Q>, Not<P>>, Imply<P, Q>>>(
        h => contrapositionForward(h),
        h => contrapositionReverse(h),
    );
}

// ── Material implication ────────────────────────────────────

export function materialImplicationForward<P extends Prop, Q extends Prop>(h: Imply<P, Q>): Or<Not<P>, Q> {
    return matchOr<P, Not<P>, Or<Not<P>, Q>>(
        excludedMiddle<P>(),
        p => right(h(p)),
        np => left(np),
    );
}

export function materialImplicationReverse<P extends Prop, Q extends Prop>(h: Or<Not<P>, Q>): Imply<P, Q> {
    return p => matchOr(
        h,
        np => exfalso<Q>(np(p)),
        q => q,
    );
}

export function materialImplication<P extends Prop, Q extends Prop>(): Equal<Imply<P, Q>, Or<Not<P>, Q>> {
    return and<Imply<Imply<P, Q>, Or<Not<P>, Q>>, Imply<Or<Not<P>, Q>, Imply<P, Q>>>(
        h => materialImplicationForward(h),
        h => materialImplicationReverse(h),
    );
}
