// ─────────────────────────────────────────────────────────────
// Proplogic  ·  Theorem Catalog
// Statement schema and postulate usage for every theorem in
// ./theorems, and admissibility against an axiom bundle
// ─────────────────────────────────────────────────────────────

import { mk, type AxiomBundle, type Postulate, type Proposition } from './ir';
import { UnknownTheoremError } from './errors';

export interface TheoremEntry {
    name: string;
    statement: Proposition;
    /** Postulates the derivation invokes itself. */
    postulates: Postulate[];
    dependencies: string[];
}

const P = mk.atom('P');
const Q = mk.atom('Q');

export const THEOREMS: readonly TheoremEntry[] = [
    {
        name: 'andComm',
        statement: mk.imply(mk.and(P, Q), mk.and(Q, P)),
        postulates: [],
        dependencies: [],
    },
    {
        name: 'orComm',
        statement: mk.imply(mk.or(P, Q), mk.or(Q, P)),
        postulates: [],
        dependencies: [],
    },
    {
        name: 'doubleNegationIntroduction',
        statement: mk.imply(P, mk.not(mk.not(P))),
        postulates: [],
        dependencies: [],
    },
    {
        name: 'doubleNegationElimination',
        statement: mk.imply(mk.not(mk.not(P)), P),
        postulates: ['excludedMiddle', 'exfalso'],
        dependencies: [],
    },
    {
        name: 'doubleNegation',
        statement: mk.equal(P, mk.not(mk.not(P))),
        postulates: [],
        dependencies: ['doubleNegationIntroduction', 'doubleNegationElimination'],
    },
    {
        name: 'contrapositionForward',
        statement: mk.imply(mk.imply(P, Q), mk.imply(mk.not(Q), mk.not(P))),
        postulates: [],
        dependencies: [],
    },
    {
        name: 'contrapositionReverse',
        statement: mk.imply(mk.imply(mk.not(Q), mk.not(P)), mk.imply(P, Q)),
        postulates: ['excludedMiddle', 'exfalso'],
        dependencies: [],
    },
    {
        name: 'contraposition',
        statement: mk.equal(mk.imply(P, Q), mk.imply(mk.not(Q), mk.not(P))),
        postulates: [],
        dependencies: ['contrapositionForward', 'contrapositionReverse'],
    },
    {
        name: 'materialImplicationForward',
        statement: mk.imply(mk.imply(P, Q), mk.or(mk.not(P), Q)),
        postulates: ['excludedMiddle'],
        dependencies: [],
    },
    {
        name: 'materialImplicationReverse',
        statement: mk.imply(mk.or(mk.not(P), Q), mk.imply(P, Q)),
        postulates: ['exfalso'],
        dependencies: [],
    },
    {
        name: 'materialImplication',
        statement: mk.equal(mk.imply(P, Q), mk.or(mk.not(P), Q)),
        postulates: [],
        dependencies: ['materialImplicationForward', 'materialImplicationReverse'],
    },
];

export function lookupTheorem(name: string): TheoremEntry | undefined {
    return THEOREMS.find(t => t.name === name);
}

/** Postulates reached directly or through dependencies, sorted by name. */
export function requiredPostulates(name: string): Postulate[] {
    const found = new Set<Postulate>();
    const visited = new Set<string>();
    const visit = (current: string): void => {
        if (visited.has(current)) return;
        visited.add(current);
        const entry = lookupTheorem(current);
        if (!entry) throw new UnknownTheoremError(current);
        for (const p of entry.postulates) found.add(p);
        for (const dep of entry.dependencies) visit(dep);
    };
    visit(name);
    return [...found].sort();
}

export function admissible(entry: TheoremEntry, bundle: AxiomBundle): boolean {
    return requiredPostulates(entry.name).every(p => bundle.axioms.has(p));
}

export function theoremsUnder(bundle: AxiomBundle): string[] {
    return THEOREMS.filter(t => admissible(t, bundle)).map(t => t.name);
}
