// ─────────────────────────────────────────────────────────────
// Proplogic  ·  Truth-Table Harness
// Enumerates literal inputs and checks each connective against
// its classical definition
// ─────────────────────────────────────────────────────────────

import { mk, atoms, type Literal, type Proposition } from '../core/ir';
import { truth } from './evaluator';

export interface TruthRow {
    inputs: boolean[];
    value: boolean;
}

export interface ValuationRow extends TruthRow {
    valuation: Record<string, boolean>;
}

export interface Mismatch extends TruthRow {
    expected: boolean;
}

// ── Enumeration ─────────────────────────────────────────────

export const MAX_ARITY = 20;

/** All-true row first, all-false row last. */
export function enumerateAssignments(arity: number): boolean[][] {
    if (!Number.isInteger(arity) || arity < 0) {
        throw new RangeError(`arity must be a non-negative integer, got ${arity}`);
    }
    if (arity > MAX_ARITY) {
        throw new RangeError(`arity must be at most ${MAX_ARITY}, got ${arity}`);
    }
    const rows: boolean[][] = [];
    const total = 2 ** arity;
    for (let i = 0; i < total; i++) {
        const row: boolean[] = [];
        for (let bit = arity - 1; bit >= 0; bit--) {
            row.push(((i >> bit) & 1) === 0);
        }
        rows.push(row);
    }
    return rows;
}

export function truthTable(arity: number, build: (...literals: Literal[]) => Proposition): TruthRow[] {
    return enumerateAssignments(arity).map(inputs => ({
        inputs,
        value: truth(build(...inputs.map(b => mk.bool(b)))),
    }));
}

/** Table of an open proposition over its atoms, in order of first occurrence. */
export function valuationTable(prop: Proposition): ValuationRow[] {
    const names = atoms(prop);
    return enumerateAssignments(names.length).map(inputs => {
        const valuation: Record<string, boolean> = {};
        names.forEach((name, i) => { valuation[name] = inputs[i]; });
        return { inputs, valuation, value: truth(prop, valuation) };
    });
}

export function isTautology(prop: Proposition): boolean {
    return valuationTable(prop).every(row => row.value);
}

// ── Connective reference definitions ────────────────────────

export type ConnectiveName = 'and' | 'or' | 'imply' | 'not' | 'equal';

interface ConnectiveSpec {
    arity: number;
    build: (...literals: Literal[]) => Proposition;
    reference: (...inputs: boolean[]) => boolean;
}

export const CONNECTIVES: Record<ConnectiveName, ConnectiveSpec> = {
    and: { arity: 2, build: (a, b) => mk.and(a, b), reference: (a, b) => a && b },
    or: { arity: 2, build: (a, b) => mk.or(a, b), reference: (a, b) => a || b },
    imply: { arity: 2, build: (a, b) => mk.imply(a, b), reference: (a, b) => !a || b },
    not: { arity: 1, build: a => mk.not(a), reference: a => !a },
    equal: { arity: 2, build: (a, b) => mk.equal(a, b), reference: (a, b) => a === b },
};

/** Rows where the computed value disagrees with the classical one; empty when correct. */
export function checkConnective(name: ConnectiveName): Mismatch[] {
    const spec = CONNECTIVES[name];
    return truthTable(spec.arity, spec.build)
        .map(row => ({ ...row, expected: spec.reference(...row.inputs) }))
        .filter(row => row.value !== row.expected);
}
