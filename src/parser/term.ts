import type { Expression, Term, TermParseResult } from '../types/term.js';
import { createApply, createVariable } from '../types/term.js';
import { createParseError } from '../types/errors.js';

const IDENTIFIER = /[A-Za-z]\w*/y;

/**
 * Recursive-descent parser for prefix magma terms
 *
 * Grammar:
 *   term       = 'op(' term ',' term ')' | identifier
 *   identifier = [A-Za-z] [A-Za-z0-9_]*
 *
 * Positions in errors are offsets into the input string.
 */
export class TermParser {
    private input: string;
    private pos: number;

    constructor(input: string, start: number = 0) {
        this.input = input;
        this.pos = start;
    }

    get position(): number {
        return this.pos;
    }

    parseTerm(): Term {
        this.skipWhitespace();
        if (this.pos >= this.input.length) {
            throw createParseError('Unexpected end while parsing term', this.input, this.pos);
        }

        if (this.input.startsWith('op(', this.pos)) {
            this.pos += 3;
            const left = this.parseTerm();
            this.expect(',', "Expected ',' in op(...)");
            const right = this.parseTerm();
            this.expect(')', "Expected ')' in op(...)");
            return createApply(left, right);
        }

        IDENTIFIER.lastIndex = this.pos;
        const match = IDENTIFIER.exec(this.input);
        if (!match) {
            throw createParseError(
                `Expected variable but found '${this.input[this.pos]}'`,
                this.input,
                this.pos
            );
        }
        this.pos += match[0].length;
        return createVariable(match[0]);
    }

    skipWhitespace(): void {
        while (this.pos < this.input.length && /\s/.test(this.input[this.pos])) {
            this.pos++;
        }
    }

    private expect(char: string, message: string): void {
        this.skipWhitespace();
        if (this.input[this.pos] !== char) {
            throw createParseError(`${message} at pos ${this.pos}`, this.input, this.pos);
        }
        this.pos++;
    }
}

/**
 * Parse one term starting at `start`. Text after the term is left alone.
 */
export function parseTerm(text: string, start: number = 0): TermParseResult {
    const parser = new TermParser(text, start);
    const term = parser.parseTerm();
    return { term, next: parser.position };
}

/**
 * Parse the side of an equation occupying text[start, end). The side must
 * be consumed entirely, apart from whitespace and trailing periods.
 */
export function parseSide(text: string, start: number = 0, end: number = text.length): Term {
    let stop = end;
    while (stop > start && /[\s.]/.test(text[stop - 1])) {
        stop--;
    }
    const parser = new TermParser(text.slice(0, stop), start);
    const term = parser.parseTerm();
    parser.skipWhitespace();
    if (parser.position !== stop) {
        throw createParseError(
            `Extra characters after parsed term: '${text.slice(parser.position, stop)}'`,
            text,
            parser.position
        );
    }
    return term;
}

/**
 * Offset of the first '=' outside parentheses, or -1
 */
export function findTopLevelEquals(text: string, start: number = 0, end: number = text.length): number {
    let depth = 0;
    for (let i = start; i < end; i++) {
        const c = text[i];
        if (c === '(') {
            depth++;
        } else if (c === ')') {
            depth--;
        } else if (c === '=' && depth === 0) {
            return i;
        }
    }
    return -1;
}

/**
 * True when text[start] is '(' and its matching ')' is text[end - 1]
 */
function enclosesWhole(text: string, start: number, end: number): boolean {
    if (end - start < 2 || text[start] !== '(' || text[end - 1] !== ')') {
        return false;
    }
    let depth = 0;
    for (let i = start; i < end; i++) {
        if (text[i] === '(') {
            depth++;
        } else if (text[i] === ')') {
            depth--;
            if (depth === 0) {
                return i === end - 1;
            }
        }
    }
    return false;
}

/**
 * Parse an expression: a bare term or `lhs = rhs`, optionally wrapped in
 * one pair of outer parentheses and followed by a period.
 */
export function parseExpression(text: string): Expression {
    let start = 0;
    let end = text.length;
    const trim = () => {
        while (start < end && /\s/.test(text[start])) start++;
        while (end > start && /[\s.]/.test(text[end - 1])) end--;
    };

    trim();
    if (enclosesWhole(text, start, end)) {
        start++;
        end--;
        trim();
    }

    const eq = findTopLevelEquals(text, start, end);
    if (eq < 0) {
        return { type: 'term', term: parseSide(text, start, end) };
    }
    return {
        type: 'equation',
        lhs: parseSide(text, start, eq),
        rhs: parseSide(text, eq + 1, end),
    };
}

/**
 * Remove a leading TPTP universal quantifier prefix `! [X, Y] :`
 */
export function stripQuantifiers(formula: string): string {
    const match = /^\s*!\s*\[[^\]]*\]\s*:\s*([\s\S]*)$/.exec(formula);
    return (match ? match[1] : formula).trim();
}
