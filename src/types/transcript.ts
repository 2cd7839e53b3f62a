/**
 * Transcript Record Types
 *
 * Records produced while scanning a prover transcript. They are created
 * during the scan and read afterwards; canonical names live in
 * ResolvedLemma, never on the records themselves.
 */
import type { Expression } from './term.js';

export type DependencyKind =
    | 'hypothesis'  // a1, the axiom assumed for the whole theorem
    | 'single'      // single_lemma_N
    | 'history'     // history_lemma_N
    | 'lemma'       // free text "by lemma N", named Lemma_N
    | 'named';      // any other token from a deps: list

export interface DependencyToken {
    kind: DependencyKind;
    /** Lookup key: the source token, or Lemma_N for free-text references */
    name: string;
}

/**
 * Top-level fof(...) declaration
 */
export interface TopLevelRecord {
    name: string;
    role: 'axiom' | 'conjecture';
    formula: string;
    line: number;
}

/**
 * Inline "Axiom N (name): expr." declaration
 */
export interface AxiomRecord {
    name: string;
    expression: Expression;
    line: number;
}

export interface LemmaRecord {
    name: string;
    expression: Expression;
    dependencies: DependencyToken[];
    line: number;
}

export interface ProofLine {
    text: string;
    line: number;
}

export interface ProofBlock {
    name: string;
    lines: ProofLine[];
}

/**
 * A lemma after renumbering and dependency rewriting
 */
export interface ResolvedLemma {
    sourceName: string;
    name: string;
    expression: Expression;
    dependencies: string[];
    proof?: ProofBlock;
    isConjecture: boolean;
}

export interface RetainedAxiom {
    sourceName: string;
    name: string;
    expression: Expression;
}

export interface CalcStep {
    lhs: string;
    rhs: string;
    justification: string;
    line: number;
}
