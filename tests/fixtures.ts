/**
 * Shared transcripts for the translator tests.
 */

export const HYPOTHESIS_FOF = 'fof(a1, axiom, ! [X,Y] : (op(X, op(Y, X)) = X)).';
export const CONJECTURE_FOF = 'fof(conjecture0, conjecture, ! [A,B] : (op(A,B) = op(B,A))).';

/** One goal, one step, justified by the hypothesis */
export const SINGLE_STEP = [
    HYPOTHESIS_FOF,
    CONJECTURE_FOF,
    'Axiom 2 (a1): op(X, op(Y, X)) = X.',
    'The conjecture is true! Here is a proof.',
    '',
    'Goal 1: op(A,B) = op(B,A).',
    'Proof:',
    '  op(a, b)',
    '= { by axiom 2 (a1) }',
    '  op(b, a)',
    'RESULT: Theorem',
].join('\n');

/**
 * A declared lemma without proof, a proved lemma relying on an inline
 * axiom, and a two-step goal citing both the lemma and the hypothesis.
 */
export const WITH_LEMMAS = [
    'fof(a1, axiom, ! [X,Y,Z] : (op(X, op(Y, Z)) = op(Y, X))).',
    'fof(conjecture0, conjecture, ! [A,B] : (op(A, B) = op(B, A))).',
    'Axiom 1 (a1): op(X, op(Y, Z)) = op(Y, X).',
    'Axiom 2 (history_lemma_7): op(X, X) = X.',
    '% single_lemma_2: ! [X] : op(X, op(X, X)) = X | deps: history_lemma_7, a1',
    'The conjecture is true! Here is a proof.',
    '',
    'Lemma 4: op(X, Y) = op(X, op(Y, Y)).',
    'Proof:',
    '  op(x, y)',
    '= { by axiom 2 (history_lemma_7) }',
    '  op(x, op(y, y))',
    'RESULT: Theorem',
    '',
    'Goal 1: op(A, B) = op(B, A).',
    'Proof:',
    '  op(a, b)',
    '= { by lemma 4 }',
    '  op(a, op(b, b))',
    '= { by axiom 1 (a1) }',
    '  op(b, a)',
    'RESULT: Theorem',
].join('\n');

/**
 * A declared inline axiom cited only by a lemma's dependency list, never
 * inside a proof block
 */
export const DEPENDENCY_HINT_ONLY = [
    HYPOTHESIS_FOF,
    CONJECTURE_FOF,
    'Axiom 2 (a1): op(X, op(Y, X)) = X.',
    'Axiom 3 (single_lemma_5): op(X, X) = X.',
    '% single_lemma_2: op(X, Y) = X | deps: single_lemma_5, a1',
    'The conjecture is true! Here is a proof.',
    '',
    'Goal 1: op(A,B) = op(B,A).',
    'Proof:',
    '  op(a, b)',
    '= { by axiom 2 (a1) }',
    '  op(b, a)',
    'RESULT: Theorem',
].join('\n');

export const PREAMBLE_TEXT = [
    'import Mathlib.Tactic.NthRewrite',
    'import Duper',
    'open Lean Grind',
    '',
    'class Magma (α : Type _) where',
    '  op : α → α → α',
    '',
    'infix:65 " ◇ " => Magma.op',
    '',
].join('\n');
