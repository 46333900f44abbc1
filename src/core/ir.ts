// ─────────────────────────────────────────────────────────────
// Proplogic  ·  Proposition Descriptors
// Structural form of every proposition, walked at run time;
// literal booleans survive in the type parameters so the
// truth value also resolves at compile time
// ─────────────────────────────────────────────────────────────

import type { Bool, And, Or, Imply, Prop } from './connectives';

// ── Postulates and bundles ──────────────────────────────────

export type Postulate =
    | 'axiom'           // Foundational postulate
    | 'exfalso'         // Principle of explosion
    | 'excludedMiddle'  // Law of excluded middle
    | 'sorry';          // Accepted without proof

export interface AxiomBundle {
    name: string;
    axioms: Set<Postulate>;
    description: string;
}

export const BUNDLES: Record<'Classical' | 'Intuitionistic' | 'Minimal', AxiomBundle> = {
    Classical: {
        name: 'Classical',
        axioms: new Set(['exfalso', 'excludedMiddle']),
        description: 'Classical propositional logic',
    },
    Intuitionistic: {
        name: 'Intuitionistic',
        axioms: new Set(['exfalso']),
        description: 'Intuitionistic logic: explosion without excluded middle',
    },
    Minimal: {
        name: 'Minimal',
        axioms: new Set(),
        description: 'Minimal logic: no postulates',
    },
};

// ── Descriptors ─────────────────────────────────────────────

export type Proposition =
    | Literal
    | Atom
    | Conjunction
    | Disjunction
    | Implication;

export interface Literal<B extends boolean = boolean> {
    readonly tag: 'Bool';
    readonly value: B;
}

/** A propositional variable; only a valuation gives it a truth value. */
export interface Atom<N extends string = string> {
    readonly tag: 'Atom';
    readonly name: N;
}

export interface Conjunction<A extends Proposition = Proposition, B extends Proposition = Proposition> {
    readonly tag: 'And';
    readonly left: A;
    readonly right: B;
}

export interface Disjunction<L extends Proposition = Proposition, R extends Proposition = Proposition> {
    readonly tag: 'Or';
    readonly left: L;
    readonly right: R;
}

export interface Implication<P extends Proposition = Proposition, Q extends Proposition = Proposition> {
    readonly tag: 'Imply';
    readonly premise: P;
    readonly conclusion: Q;
}

export type Negation<P extends Proposition = Proposition> = Implication<P, Literal<false>>;

export type Biconditional<P extends Proposition = Proposition, Q extends Proposition = Proposition> =
    Conjunction<Implication<P, Q>, Implication<Q, P>>;

// ── Compile-time truth ──────────────────────────────────────

type BoolAnd<X, Y> = X extends true ? Y : false;
type BoolOr<X, Y> = X extends true ? true : Y;
type BoolImply<X, Y> = X extends true ? Y : true;

export type Truth<P extends Proposition> =
    P extends Literal<infer B extends boolean> ? B
    : P extends Atom ? boolean
    : P extends Conjunction<infer A extends Proposition, infer B extends Proposition> ? BoolAnd<Truth<A>, Truth<B>>
    : P extends Disjunction<infer L extends Proposition, infer R extends Proposition> ? BoolOr<Truth<L>, Truth<R>>
    : P extends Implication<infer A extends Proposition, infer B extends Proposition> ? BoolImply<Truth<A>, Truth<B>>
    : never;

// ── Evidence type of a descriptor ───────────────────────────

export type Evidence<P extends Proposition> =
    P extends Literal<infer B extends boolean> ? Bool<B>
    : P extends Atom ? Prop
    : P extends Conjunction<infer A extends Proposition, infer B extends Proposition> ? And<Evidence<A>, Evidence<B>>
    : P extends Disjunction<infer L extends Proposition, infer R extends Proposition> ? Or<Evidence<L>, Evidence<R>>
    : P extends Implication<infer A extends Proposition, infer B extends Proposition> ? Imply<Evidence<A>, Evidence<B>>
    : never;

// ── Smart constructors ──────────────────────────────────────

const FALSE: Literal<false> = { tag: 'Bool', value: false };

export const mk = {
    bool: <B extends boolean>(value: B): Literal<B> => ({ tag: 'Bool', value }),
    atom: <N extends string>(name: N): Atom<N> => ({ tag: 'Atom', name }),
    and: <A extends Proposition, B extends Proposition>(left: A, right: B): Conjunction<A, B> =>
        ({ tag: 'And', left, right }),
    or: <L extends Proposition, R extends Proposition>(left: L, right: R): Disjunction<L, R> =>
        ({ tag: 'Or', left, right }),
    imply: <P extends Proposition, Q extends Proposition>(premise: P, conclusion: Q): Implication<P, Q> =>
        ({ tag: 'Imply', premise, conclusion }),
    not: <P extends Proposition>(p: P): Negation<P> =>
        ({ tag: 'Imply', premise: p, conclusion: FALSE }),
    equal: <P extends Proposition, Q extends Proposition>(p: P, q: Q): Biconditional<P, Q> => ({
        tag: 'And',
        left: { tag: 'Imply', premise: p, conclusion: q },
        right: { tag: 'Imply', premise: q, conclusion: p },
    }),
};

export const Props = {
    True: mk.bool(true),
    False: FALSE,
};

// ── Structural helpers ──────────────────────────────────────

export function propsEqual(a: Proposition, b: Proposition): boolean {
    switch (a.tag) {
        case 'Bool': return b.tag === 'Bool' && a.value === b.value;
        case 'Atom': return b.tag === 'Atom' && a.name === b.name;
        case 'And':
            return b.tag === 'And' && propsEqual(a.left, b.left) && propsEqual(a.right, b.right);
        case 'Or':
            return b.tag === 'Or' && propsEqual(a.left, b.left) && propsEqual(a.right, b.right);
        case 'Imply':
            return b.tag === 'Imply' && propsEqual(a.premise, b.premise) && propsEqual(a.conclusion, b.conclusion);
    }
}

/** Atom names in order of first occurrence. */
export function atoms(prop: Proposition): string[] {
    const seen: string[] = [];
    const visit = (p: Proposition): void => {
        switch (p.tag) {
            case 'Bool': return;
            case 'Atom':
                if (!seen.includes(p.name)) seen.push(p.name);
                return;
            case 'And': case 'Or':
                visit(p.left);
                visit(p.right);
                return;
            case 'Imply':
                visit(p.premise);
                visit(p.conclusion);
                return;
        }
    };
    visit(prop);
    return seen;
}

/** The negated proposition when `prop` has the shape Imply(P, ⊥). */
export function asNegation(prop: Proposition): Proposition | null {
    if (prop.tag === 'Imply' && prop.conclusion.tag === 'Bool' && !prop.conclusion.value) return prop.premise;
    return null;
}

/** Both sides when `prop` has the shape And(Imply(P, Q), Imply(Q, P)). */
export function asBiconditional(prop: Proposition): [Proposition, Proposition] | null {
    if (prop.tag !== 'And' || prop.left.tag !== 'Imply' || prop.right.tag !== 'Imply') return null;
    const { premise, conclusion } = prop.left;
    if (propsEqual(premise, prop.right.conclusion) && propsEqual(conclusion, prop.right.premise)) {
        return [premise, conclusion];
    }
    return null;
}
