import type { Expression, Term } from '../types/term.js';
import { OPERATOR_SYMBOL } from '../parser/infix.js';

/**
 * Render a term in Lean infix notation, fully parenthesized
 */
export function renderInfix(term: Term): string {
    switch (term.type) {
        case 'variable':
            return term.name;
        case 'apply':
            return `(${renderInfix(term.left)} ${OPERATOR_SYMBOL} ${renderInfix(term.right)})`;
    }
}

/**
 * Render a term in TPTP prefix notation
 */
export function renderPrefix(term: Term): string {
    switch (term.type) {
        case 'variable':
            return term.name;
        case 'apply':
            return `op(${renderPrefix(term.left)},${renderPrefix(term.right)})`;
    }
}

export function renderExpression(expression: Expression, render: (term: Term) => string = renderInfix): string {
    switch (expression.type) {
        case 'term':
            return render(expression.term);
        case 'equation':
            return `${render(expression.lhs)} = ${render(expression.rhs)}`;
    }
}

/**
 * Greedy left-to-right wrap of one equation side at operator symbols.
 * Continuation lines start with `indent`.
 */
export function wrapSide(text: string, indent: string, maxLength: number = 80): string {
    const trimmed = text.trim();
    if (trimmed.length <= maxLength) {
        return trimmed;
    }

    const parts = trimmed.split(OPERATOR_SYMBOL).map(p => p.trim());
    const lines: string[] = [];
    let current = parts[0];

    for (const part of parts.slice(1)) {
        const candidate = `${current} ${OPERATOR_SYMBOL} ${part}`;
        if (candidate.length > maxLength) {
            lines.push(current);
            current = part;
        } else {
            current = candidate;
        }
    }

    lines.push(current);
    return lines.join('\n' + indent);
}

/**
 * `lhs = rhs`, broken after '=' when longer than maxLength
 */
export function formatEquationBody(lhs: string, rhs: string, indent: string, maxLength: number = 80): string {
    const full = `${lhs} = ${rhs}`;
    if (full.length <= maxLength) {
        return full;
    }
    return `${lhs} =\n${indent}${rhs}`;
}
