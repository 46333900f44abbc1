// ─────────────────────────────────────────────────────────────
// Proplogic  ·  Connectives as Types
// Propositions are types, proofs are values of those types
// ─────────────────────────────────────────────────────────────

// ── Literals ────────────────────────────────────────────────

export interface Bool<B extends boolean> {
    readonly value: B;
}

export type True = Bool<true>;
export type False = Bool<false>;

export function bool<B extends boolean>(value: B): Bool<B> {
    return { value };
}

export const trivial: True = bool(true);

// ── Conjunction ─────────────────────────────────────────────

/** Holds evidence of both sides; neither field is optional. */
export interface And<A, B> {
    readonly fst: A;
    readonly snd: B;
}

export function and<A extends Prop, B extends Prop>(fst: A, snd: B): And<A, B> {
    return { fst, snd };
}

// ── Disjunction ─────────────────────────────────────────────

export interface Left<L> {
    readonly side: 'left';
    readonly value: L;
}

export interface Right<R> {
    readonly side: 'right';
    readonly value: R;
}

export type Or<L, R> = Left<L> | Right<R>;

export function left<L extends Prop, R extends Prop = never>(value: L): Or<L, R> {
    return { side: 'left', value };
}

export function right<R extends Prop, L extends Prop = never>(value: R): Or<L, R> {
    return { side: 'right', value };
}

export function isLeft<L extends Prop, R extends Prop>(h: Or<L, R>): h is Left<L> {
    return h.side === 'left';
}

export function isRight<L extends Prop, R extends Prop>(h: Or<L, R>): h is Right<R> {
    return h.side === 'right';
}

/** Case analysis: exactly one branch runs. */
export function matchOr<L extends Prop, R extends Prop, T>(h: Or<L, R>, onLeft: (l: L) => T, onRight: (r: R) => T): T {
    switch (h.side) {
        case 'left': return onLeft(h.value);
        case 'right': return onRight(h.value);
    }
}

// ── Implication and derived forms ───────────────────────────

// The only evidence that is a procedure rather than data.
export type Imply<P, Q> = (p: P) => Q;

export type Not<P> = Imply<P, False>;

export type Equal<P, Q> = And<Imply<P, Q>, Imply<Q, P>>;

// ── Evidence bound ──────────────────────────────────────────

/**
 * Everything that counts as evidence of some proposition. A transformer
 * qualifies through its conclusion; its premise stays unconstrained.
 */
export type Prop =
    | Bool<boolean>
    | And<Prop, Prop>
    | Left<Prop>
    | Right<Prop>
    | ((p: never) => Prop);
