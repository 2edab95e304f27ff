import type { Fact, Term } from '../types/terms.js';
import { createParseError } from '../types/errors.js';
import { classifyTerm } from '../logic/terms.js';
import { Tokenizer } from './tokenizer.js';
import { Parser, Statement } from './parser.js';

export { Tokenizer } from './tokenizer.js';
export { Parser } from './parser.js';
export type { Statement } from './parser.js';

/**
 * Parse `Name` or `Name(arg, ...)` into a Fact
 */
export function parseFact(input: string): Fact {
    return new Parser(tokenize(input), input).parseAtomStatement();
}

/**
 * Parse a single identifier into a Term
 */
export function parseTerm(input: string): Term {
    const tokens = tokenize(input);
    if (tokens.length !== 2 || tokens[0].type !== 'IDENT') {
        const bad = tokens.length > 1 && tokens[0].type === 'IDENT' ? tokens[1] : tokens[0];
        throw createParseError(
            bad.type === 'EOF' ? 'Expected a term but got end of input' : `Unexpected token '${bad.value}' in term`,
            input,
            bad.position
        );
    }
    return classifyTerm(tokens[0].value);
}

/**
 * Parse premises and conclusion of an inline rule (`P(x), Q(x) => R(x)`)
 * without safety checks; see createRule for those.
 */
export function parseRuleParts(input: string): { premises: Fact[]; conclusion: Fact } {
    return new Parser(tokenize(input), input).parseRule();
}

/**
 * Parse any statement: fact, `? query` or rule
 */
export function parseStatement(input: string): Statement {
    return new Parser(tokenize(input), input).parseStatement();
}

function tokenize(input: string) {
    return new Tokenizer(input).tokenize();
}
