// ─────────────────────────────────────────────────────────────
// Proplogic  ·  Public API
// ─────────────────────────────────────────────────────────────

export * from './core/connectives';
export {
    mk, Props, BUNDLES, propsEqual, atoms, asNegation, asBiconditional,
    type Proposition, type Literal, type Atom, type Conjunction, type Disjunction,
    type Implication, type Negation, type Biconditional, type Truth, type Evidence,
    type Postulate, type AxiomBundle,
} from './core/ir';
export * from './core/axioms';
export * from './core/theorems';
export * from './core/errors';
export * from './core/catalog';
export { prettyProp, prettyTheorem } from './core/pretty';
export { truth, isClosed, type Valuation } from './engine/evaluator';
export * from './engine/truth-table';
export { emitLatex, renderLatex, exportCatalogLatex, type RenderOptions, type CatalogOptions } from './emitters/latex';
