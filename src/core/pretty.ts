// ─────────────────────────────────────────────────────────────
// Proplogic  ·  Pretty-Printer for Propositions
// ─────────────────────────────────────────────────────────────

import { asBiconditional, asNegation, type Proposition } from './ir';
import { requiredPostulates, type TheoremEntry } from './catalog';

// ── Pretty-print a proposition in logical notation ──────────

export function prettyProp(prop: Proposition): string {
    switch (prop.tag) {
        case 'Bool':
            return prop.value ? '⊤' : '⊥';

        case 'Atom':
            return prop.name;

        case 'And': {
            const iff = asBiconditional(prop);
            if (iff) return `(${prettyProp(iff[0])} ↔ ${prettyProp(iff[1])})`;
            return `(${prettyProp(prop.left)} ∧ ${prettyProp(prop.right)})`;
        }

        case 'Or':
            return `(${prettyProp(prop.left)} ∨ ${prettyProp(prop.right)})`;

        case 'Imply': {
            const negated = asNegation(prop);
            if (negated) return `¬${prettyProp(negated)}`;
            return `(${prettyProp(prop.premise)} → ${prettyProp(prop.conclusion)})`;
        }
    }
}

// ── Pretty-print a catalog entry ────────────────────────────

export function prettyTheorem(entry: TheoremEntry): string {
    const uses = requiredPostulates(entry.name);
    return `theorem ${entry.name} : ${prettyProp(entry.statement)}\n  -- uses: ${uses.join(', ') || '(none)'}`;
}
