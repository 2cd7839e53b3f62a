import type { Term } from '../types/term.js';
import { createApply, createVariable } from '../types/term.js';
import { createParseError } from '../types/errors.js';

export type InfixTokenType =
    | 'IDENT'     // x, y, z
    | 'OP'        // ◇
    | 'LPAREN'    // (
    | 'RPAREN'    // )
    | 'EOF';

export interface InfixToken {
    type: InfixTokenType;
    value: string;
    position: number;
}

export const OPERATOR_SYMBOL = '◇';

/**
 * Tokenizer for Lean infix magma terms such as `x ◇ (y ◇ z)`
 */
export class InfixTokenizer {
    private input: string;
    private pos: number = 0;
    private tokens: InfixToken[] = [];

    constructor(input: string) {
        this.input = input;
    }

    tokenize(): InfixToken[] {
        while (this.pos < this.input.length) {
            this.skipWhitespace();
            if (this.pos >= this.input.length) break;

            const char = this.input[this.pos];

            switch (char) {
                case '(': this.addToken('LPAREN', '('); continue;
                case ')': this.addToken('RPAREN', ')'); continue;
                case OPERATOR_SYMBOL: this.addToken('OP', OPERATOR_SYMBOL); continue;
            }

            if (/[A-Za-z_]/.test(char)) {
                const start = this.pos;
                while (this.pos < this.input.length && /\w/.test(this.input[this.pos])) {
                    this.pos++;
                }
                this.tokens.push({ type: 'IDENT', value: this.input.slice(start, this.pos), position: start });
                continue;
            }

            throw createParseError(`Unexpected character '${char}'`, this.input, this.pos);
        }

        this.tokens.push({ type: 'EOF', value: '', position: this.pos });
        return this.tokens;
    }

    private skipWhitespace(): void {
        while (this.pos < this.input.length && /\s/.test(this.input[this.pos])) {
            this.pos++;
        }
    }

    private addToken(type: InfixTokenType, value: string): void {
        this.tokens.push({ type, value, position: this.pos });
        this.pos += value.length;
    }
}

/**
 * Parser for infix magma terms. `◇` associates to the left, as declared
 * by `infixl` in the equation database.
 *
 * Grammar:
 *   term = atom ('◇' atom)*
 *   atom = IDENT | '(' term ')'
 */
export class InfixParser {
    private tokens: InfixToken[];
    private input: string;
    private pos: number = 0;

    constructor(tokens: InfixToken[], input: string) {
        this.tokens = tokens;
        this.input = input;
    }

    parse(): Term {
        const term = this.parseTerm();
        if (this.current().type !== 'EOF') {
            throw createParseError(
                `Unexpected token '${this.current().value}'`,
                this.input,
                this.current().position
            );
        }
        return term;
    }

    private current(): InfixToken {
        return this.tokens[this.pos] ?? { type: 'EOF', value: '', position: this.input.length };
    }

    private advance(): InfixToken {
        const token = this.current();
        this.pos++;
        return token;
    }

    private parseTerm(): Term {
        let left = this.parseAtom();
        while (this.current().type === 'OP') {
            this.advance();
            const right = this.parseAtom();
            left = createApply(left, right);
        }
        return left;
    }

    private parseAtom(): Term {
        const token = this.current();
        if (token.type === 'IDENT') {
            this.advance();
            return createVariable(token.value);
        }
        if (token.type === 'LPAREN') {
            this.advance();
            const inner = this.parseTerm();
            if (this.current().type !== 'RPAREN') {
                throw createParseError(
                    `Expected ')' but got ${this.current().type}`,
                    this.input,
                    this.current().position
                );
            }
            this.advance();
            return inner;
        }
        throw createParseError(
            `Expected variable or '(' but got ${token.type}`,
            this.input,
            token.position
        );
    }
}

/**
 * Parse a Lean infix term into a Term tree
 */
export function parseInfixTerm(input: string): Term {
    const tokens = new InfixTokenizer(input).tokenize();
    return new InfixParser(tokens, input).parse();
}
