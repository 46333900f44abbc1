// ─────────────────────────────────────────────────────────────
// Proplogic  ·  Theorem Tests
// ─────────────────────────────────────────────────────────────

import { describe, it, expect, expectTypeOf, vi } from 'vitest';
import {
    andComm, orComm,
    doubleNegationIntroduction, doubleNegationElimination, doubleNegation,
    contrapositionForward, contrapositionReverse, contraposition,
    materialImplicationForward, materialImplicationReverse, materialImplication,
} from '../core/theorems';
import {
    and, left, right, bool, trivial,
    type And, type Or, type Imply, type Not, type Equal, type True, type False, type Prop,
} from '../core/connectives';
import { isAxiomInvocation } from '../core/errors';

const contradiction: False = bool(false);

function postulateOf(fn: () => unknown): string | undefined {
    try {
        fn();
    } catch (e) {
        if (isAxiomInvocation(e)) return e.postulate;
        throw e;
    }
    return undefined;
}

// ── Commutativity ───────────────────────────────────────────

describe('andComm', () => {
    it('swaps the pair', () => {
        const h = and(trivial, and(trivial, contradiction));
        expect(andComm(h)).toEqual({ fst: { fst: trivial, snd: contradiction }, snd: trivial });
    });

    it('is its own inverse', () => {
        const h = and(trivial, contradiction);
        const back = andComm(andComm(h));
        expect(back).toEqual(h);
        expect(back.fst.value).toBe(true);
        expect(back.snd.value).toBe(false);
    });

    it('states A ∧ B → B ∧ A', () => {
        expectTypeOf(andComm<True, False>).returns.toEqualTypeOf<And<False, True>>();
    });
});

describe('orComm', () => {
    it('moves a left payload to the right', () => {
        const h: Or<True, False> = left(trivial);
        expect(orComm(h)).toEqual({ side: 'right', value: trivial });
    });

    it('moves a right payload to the left', () => {
        const h: Or<True, False> = right(contradiction);
        expect(orComm(h)).toEqual({ side: 'left', value: contradiction });
    });

    it('is its own inverse', () => {
        const h: Or<True, False> = right(contradiction);
        expect(orComm(orComm(h))).toEqual(h);
    });

    it('states L ∨ R → R ∨ L', () => {
        expectTypeOf(orComm<True, False>).returns.toEqualTypeOf<Or<False, True>>();
    });
});

// ── Double negation ─────────────────────────────────────────

describe('doubleNegationIntroduction', () => {
    it('applies the refutation to the original evidence', () => {
        const np = vi.fn((_p: True): False => contradiction);
        const result = doubleNegationIntroduction(trivial)(np);
        expect(np).toHaveBeenCalledWith(trivial);
        expect(result).toBe(contradiction);
    });

    it('states P → ¬¬P', () => {
        expectTypeOf(doubleNegationIntroduction<True>).returns.toEqualTypeOf<Not<Not<True>>>();
    });
});

describe('doubleNegationElimination', () => {
    it('reaches excluded middle when executed', () => {
        const nnp = doubleNegationIntroduction(trivial);
        expect(postulateOf(() => doubleNegationElimination(nnp))).toBe('excludedMiddle');
    });

    it('states ¬¬P → P', () => {
        expectTypeOf(doubleNegationElimination<True>).parameter(0).toEqualTypeOf<Not<Not<True>>>();
        expectTypeOf(doubleNegationElimination<True>).returns.toEqualTypeOf<True>();
    });
});

describe('doubleNegation', () => {
    it('packages both directions without running either', () => {
        const iff = doubleNegation<True>();
        expect(typeof iff.fst).toBe('function');
        expect(typeof iff.snd).toBe('function');
    });

    it('forward direction is constructive', () => {
        const np = vi.fn((_p: True): False => contradiction);
        expect(doubleNegation<True>().fst(trivial)(np)).toBe(contradiction);
        expect(np).toHaveBeenCalledOnce();
    });

    it('backward direction reaches excluded middle', () => {
        const nnp = doubleNegationIntroduction(trivial);
        expect(postulateOf(() => doubleNegation<True>().snd(nnp))).toBe('excludedMiddle');
    });

    it('states P ↔ ¬¬P', () => {
        expectTypeOf(doubleNegation<True>).returns.toEqualTypeOf<Equal<True, Not<Not<True>>>>();
    });
});

// ── Contraposition ──────────────────────────────────────────

describe('contrapositionForward', () => {
    it('composes the refutation of Q with the implication', () => {
        const h: Imply<True, And<True, True>> = p => and(p, p);
        const nq = vi.fn((_q: And<True, True>): False => contradiction);
        const result = contrapositionForward(h)(nq)(trivial);
        expect(nq).toHaveBeenCalledWith({ fst: trivial, snd: trivial });
        expect(result).toBe(contradiction);
    });

    it('states (P → Q) → (¬Q → ¬P)', () => {
        expectTypeOf(contrapositionForward<True, False>).returns.toEqualTypeOf<Imply<Not<False>, Not<True>>>();
    });
});

describe('contrapositionReverse', () => {
    it('builds the implication without running anything', () => {
        const h = vi.fn((_nq: Not<False>): Not<True> => _p => contradiction);
        const imp = contrapositionReverse(h);
        expect(typeof imp).toBe('function');
        expect(h).not.toHaveBeenCalled();
    });

    it('reaches excluded middle once applied', () => {
        const imp = contrapositionReverse<True, False>(_nq => _p => contradiction);
        expect(postulateOf(() => imp(trivial))).toBe('excludedMiddle');
    });

    it('states (¬Q → ¬P) → (P → Q)', () => {
        expectTypeOf(contrapositionReverse<True, False>).returns.toEqualTypeOf<Imply<True, False>>();
    });
});

describe('contraposition', () => {
    it('forward component behaves as contrapositionForward', () => {
        const nq = vi.fn((_q: False): False => contradiction);
        const iff = contraposition<True, False>();
        expect(iff.fst(_p => contradiction)(nq)(trivial)).toBe(contradiction);
        expect(nq).toHaveBeenCalledWith(contradiction);
    });

    it('states (P → Q) ↔ (¬Q → ¬P)', () => {
        expectTypeOf(contraposition<True, False>).returns
            .toEqualTypeOf<Equal<Imply<True, False>, Imply<Not<False>, Not<True>>>>();
    });
});

// ── Material implication ────────────────────────────────────

describe('materialImplicationForward', () => {
    it('reaches excluded middle immediately', () => {
        expect(postulateOf(() => materialImplicationForward<True, True>(p => p))).toBe('excludedMiddle');
    });

    it('states (P → Q) → (¬P ∨ Q)', () => {
        expectTypeOf(materialImplicationForward<True, False>).returns.toEqualTypeOf<Or<Not<True>, False>>();
    });
});

describe('materialImplicationReverse', () => {
    it('returns Q directly from the right branch', () => {
        const q = and(trivial, trivial);
        const h: Or<Not<True>, And<True, True>> = right(q);
        expect(materialImplicationReverse(h)(trivial)).toBe(q);
    });

    it('left branch contradicts the given P and explodes', () => {
        const np = vi.fn((_p: True): False => contradiction);
        const h: Or<Not<True>, True> = left<Not<True>, True>(np);
        expect(postulateOf(() => materialImplicationReverse(h)(trivial))).toBe('exfalso');
        expect(np).toHaveBeenCalledWith(trivial);
    });

    it('states (¬P ∨ Q) → (P → Q)', () => {
        expectTypeOf(materialImplicationReverse<True, False>).returns.toEqualTypeOf<Imply<True, False>>();
    });
});

describe('materialImplication', () => {
    it('reverse component runs constructively on a right payload', () => {
        const iff = materialImplication<True, string>();
        expect(iff.snd(right('q'))(trivial)).toBe('q');
    });

    it('forward component reaches excluded middle', () => {
        const iff = materialImplication<True, True>();
        expect(postulateOf(() => iff.fst(p => p))).toBe('excludedMiddle');
    });

    it('states (P → Q) ↔ (¬P ∨ Q)', () => {
        expectTypeOf(materialImplication<True, False>).returns
            .toEqualTypeOf<Equal<Imply<True, False>, Or<Not<True>, False>>>();
    });
});

// ── Evidence bound ──────────────────────────────────────────

describe('theorem signatures', () => {
    it('take evidence, not arbitrary values', () => {
        expectTypeOf(andComm).parameter(0).toEqualTypeOf<And<Prop, Prop>>();
        expectTypeOf<And<number, string>>().not.toMatchTypeOf<Parameters<typeof andComm>[0]>();
        expectTypeOf<Date>().not.toMatchTypeOf<Parameters<typeof doubleNegationIntroduction>[0]>();
    });

    it('reject transformers whose conclusion is not evidence', () => {
        expectTypeOf<Imply<True, string>>().not.toMatchTypeOf<Parameters<typeof contrapositionForward>[0]>();
    });
});
