import type { Fact, Term } from '../types/terms.js';
import type { Token, TokenType } from '../types/parser.js';
import { createParseError } from '../types/errors.js';
import { classifyTerm } from '../logic/terms.js';

/**
 * A parsed line before any semantic checks (rule safety, groundness).
 */
export type Statement =
    | { kind: 'fact'; fact: Fact }
    | { kind: 'query'; fact: Fact }
    | { kind: 'rule'; premises: Fact[]; conclusion: Fact };

/**
 * Parser for facts, rules and queries
 *
 * Grammar (EBNF-ish):
 *   statement  = query | rule | fact
 *   query      = '?' atom ['.']
 *   rule       = atom ((',' | '&') atom)* '=>' atom ['.']
 *   fact       = atom ['.']
 *   atom       = IDENT ['(' [IDENT (',' IDENT)*] ')']
 */
export class Parser {
    private tokens: Token[];
    private originalInput: string;
    private pos: number = 0;

    constructor(tokens: Token[], originalInput: string) {
        this.tokens = tokens;
        this.originalInput = originalInput;
    }

    parseStatement(): Statement {
        if (this.current().type === 'QUERY') {
            this.advance();
            return { kind: 'query', fact: this.parseAtomStatement() };
        }
        if (this.tokens.some(t => t.type === 'ARROW')) {
            const { premises, conclusion } = this.parseRule();
            return { kind: 'rule', premises, conclusion };
        }
        return { kind: 'fact', fact: this.parseAtomStatement() };
    }

    /**
     * A single atom followed only by an optional '.'
     */
    parseAtomStatement(): Fact {
        const result = this.parseAtom();
        this.expectEnd();
        return result;
    }

    parseRule(): { premises: Fact[]; conclusion: Fact } {
        const premises: Fact[] = [this.parseAtom()];
        while (this.current().type === 'COMMA' || this.current().type === 'AND') {
            this.advance();
            premises.push(this.parseAtom());
        }
        this.expect('ARROW');
        const conclusion = this.parseAtom();
        this.expectEnd();
        return { premises, conclusion };
    }

    private current(): Token {
        return this.tokens[this.pos] || { type: 'EOF', value: '', position: this.originalInput.length };
    }

    private peek(offset: number = 0): Token {
        return this.tokens[this.pos + offset] || { type: 'EOF', value: '', position: this.originalInput.length };
    }

    private advance(): Token {
        const token = this.current();
        this.pos++;
        return token;
    }

    private expect(type: TokenType): Token {
        if (this.current().type !== type) {
            throw createParseError(
                `Expected ${describe(type)} but got ${describeToken(this.current())}`,
                this.originalInput,
                this.current().position
            );
        }
        return this.advance();
    }

    private expectEnd(): void {
        if (this.current().type === 'DOT') {
            this.advance();
        }
        if (this.current().type !== 'EOF') {
            throw createParseError(
                `Unexpected token '${this.current().value}'`,
                this.originalInput,
                this.current().position
            );
        }
    }

    private parseAtom(): Fact {
        const name = this.current();
        if (name.type !== 'IDENT') {
            throw createParseError(
                `Expected predicate name but got ${describeToken(name)}`,
                this.originalInput,
                name.position
            );
        }
        this.advance();

        if (this.current().type !== 'LPAREN') {
            return { predicate: name.value, args: [] };
        }
        this.advance();

        const args: Term[] = [];
        if (this.current().type === 'RPAREN') {
            this.advance();
            return { predicate: name.value, args };
        }

        for (;;) {
            const arg = this.current();
            if (arg.type !== 'IDENT') {
                throw createParseError(
                    `Expected argument but got ${describeToken(arg)}`,
                    this.originalInput,
                    arg.position
                );
            }
            if (this.peek(1).type === 'LPAREN') {
                throw createParseError(
                    `Nested term '${arg.value}(...)' is not supported; arguments must be plain names`,
                    this.originalInput,
                    this.peek(1).position
                );
            }
            this.advance();
            args.push(classifyTerm(arg.value));

            if (this.current().type === 'COMMA') {
                this.advance();
                continue;
            }
            if (this.current().type === 'RPAREN') {
                this.advance();
                return { predicate: name.value, args };
            }
            throw createParseError(
                `Expected ',' or ')' but got ${describeToken(this.current())}`,
                this.originalInput,
                this.current().position
            );
        }
    }
}

function describe(type: TokenType): string {
    switch (type) {
        case 'ARROW': return "'=>'";
        case 'LPAREN': return "'('";
        case 'RPAREN': return "')'";
        case 'COMMA': return "','";
        case 'EOF': return 'end of input';
        default: return type.toLowerCase();
    }
}

function describeToken(token: Token): string {
    return token.type === 'EOF' ? 'end of input' : `'${token.value}'`;
}
