/**
 * Term and Expression Types
 *
 * Terms are binary trees over the single magma operation. Leaves keep the
 * spelling they had in the source text; renaming produces new trees.
 */

export type TermType = 'variable' | 'apply';

export interface VariableTerm {
    type: 'variable';
    name: string;
}

export interface ApplyTerm {
    type: 'apply';
    left: Term;
    right: Term;
}

export type Term = VariableTerm | ApplyTerm;

/**
 * A bare term, or an equation with exactly one top-level '='
 */
export type Expression =
    | { type: 'term'; term: Term }
    | { type: 'equation'; lhs: Term; rhs: Term };

/**
 * Lower-cased source name -> canonical name (x0, x1, ...)
 */
export type Renaming = Map<string, string>;

export interface TermParseResult {
    term: Term;
    /** Offset just past the parsed term */
    next: number;
}

export function createVariable(name: string): VariableTerm {
    return { type: 'variable', name };
}

export function createApply(left: Term, right: Term): ApplyTerm {
    return { type: 'apply', left, right };
}
