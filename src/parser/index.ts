export {
    TermParser,
    parseTerm,
    parseSide,
    parseExpression,
    findTopLevelEquals,
    stripQuantifiers,
} from './term.js';
export { InfixTokenizer, InfixParser, parseInfixTerm, OPERATOR_SYMBOL } from './infix.js';
export type { InfixToken, InfixTokenType } from './infix.js';
