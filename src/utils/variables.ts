/**
 * Variable normalization
 *
 * Free variables of one expression are renamed to x0, x1, ... in the sorted
 * order of their lower-cased spellings. `X` and `x` are the same variable,
 * which is what lets the prover's skolem constants (a, b) line up with the
 * statement's variables (A, B). A renaming belongs to exactly one
 * expression and is never reused for another.
 */
import type { Expression, Renaming, Term } from '../types/term.js';
import { createApply, createVariable } from '../types/term.js';

const IDENTIFIER = /[A-Za-z]\w*/g;
const OPERATOR_KEYWORD = 'op';

export interface NormalizedText {
    text: string;
    variables: string[];
}

/**
 * Distinct lower-cased names in code unit order, `op` excluded
 */
export function canonicalOrder(names: Iterable<string>): string[] {
    const lowered = new Set<string>();
    for (const name of names) {
        const lower = name.toLowerCase();
        if (lower !== OPERATOR_KEYWORD) {
            lowered.add(lower);
        }
    }
    return [...lowered].sort();
}

export function buildRenaming(names: Iterable<string>): Renaming {
    const renaming: Renaming = new Map();
    canonicalOrder(names).forEach((name, i) => renaming.set(name, `x${i}`));
    return renaming;
}

/**
 * Canonical names of a renaming, in index order
 */
export function renamedVariables(renaming: Renaming): string[] {
    return [...renaming.values()];
}

export function applyRenaming(text: string, renaming: Renaming): string {
    return text.replace(IDENTIFIER, name => renaming.get(name.toLowerCase()) ?? name);
}

/**
 * Rename the identifiers of raw expression text
 */
export function normalizeVariables(text: string): NormalizedText {
    const renaming = buildRenaming(text.match(IDENTIFIER) ?? []);
    return {
        text: applyRenaming(text, renaming),
        variables: renamedVariables(renaming),
    };
}

export function termVariables(term: Term, into: string[] = []): string[] {
    if (term.type === 'variable') {
        into.push(term.name);
    } else {
        termVariables(term.left, into);
        termVariables(term.right, into);
    }
    return into;
}

export function expressionVariables(expression: Expression): string[] {
    if (expression.type === 'term') {
        return termVariables(expression.term);
    }
    return termVariables(expression.rhs, termVariables(expression.lhs));
}

export function renameTerm(term: Term, renaming: Renaming): Term {
    if (term.type === 'variable') {
        return createVariable(renaming.get(term.name.toLowerCase()) ?? term.name);
    }
    return createApply(renameTerm(term.left, renaming), renameTerm(term.right, renaming));
}

export function renameExpression(expression: Expression, renaming: Renaming): Expression {
    if (expression.type === 'term') {
        return { type: 'term', term: renameTerm(expression.term, renaming) };
    }
    return {
        type: 'equation',
        lhs: renameTerm(expression.lhs, renaming),
        rhs: renameTerm(expression.rhs, renaming),
    };
}

/**
 * Renaming scoped to a single expression
 */
export function scopeOf(expression: Expression): Renaming {
    return buildRenaming(expressionVariables(expression));
}
