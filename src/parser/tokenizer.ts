import type { Token, TokenType } from '../types/parser.js';
import { createParseError } from '../types/errors.js';

const IDENT_CHAR = /[A-Za-z0-9]/;

/**
 * Tokenizer for facts, rules and queries
 */
export class Tokenizer {
    private input: string;
    // Keep original input for error reporting
    private originalInput: string;
    private offset: number;
    private pos: number = 0;
    private tokens: Token[] = [];

    constructor(input: string) {
        this.originalInput = input;
        this.input = input.trim();
        // Positions are reported against the untrimmed input
        this.offset = input.length - input.trimStart().length;
    }

    tokenize(): Token[] {
        while (this.pos < this.input.length) {
            this.skipWhitespace();
            if (this.pos >= this.input.length) break;

            const char = this.input[this.pos];

            if (this.match('=>')) {
                this.addToken('ARROW', '=>');
                continue;
            }

            // Single character tokens
            switch (char) {
                case '(': this.addToken('LPAREN', '('); this.pos++; continue;
                case ')': this.addToken('RPAREN', ')'); this.pos++; continue;
                case ',': this.addToken('COMMA', ','); this.pos++; continue;
                case '&': this.addToken('AND', '&'); this.pos++; continue;
                case '?': this.addToken('QUERY', '?'); this.pos++; continue;
                case '.': this.addToken('DOT', '.'); this.pos++; continue;
            }

            // Predicate names, constants and variables share one identifier shape
            if (IDENT_CHAR.test(char)) {
                const start = this.pos;
                while (this.pos < this.input.length && IDENT_CHAR.test(this.input[this.pos])) {
                    this.pos++;
                }
                this.tokens.push({
                    type: 'IDENT',
                    value: this.input.slice(start, this.pos),
                    position: start + this.offset,
                });
                continue;
            }

            const codePoint = this.input.codePointAt(this.pos) ?? 0;
            const shown = String.fromCodePoint(codePoint);
            throw createParseError(`Unexpected character '${shown}'`, this.originalInput, this.pos + this.offset);
        }

        this.tokens.push({ type: 'EOF', value: '', position: this.pos + this.offset });
        return this.tokens;
    }

    private skipWhitespace(): void {
        while (this.pos < this.input.length && /\s/.test(this.input[this.pos])) {
            this.pos++;
        }
    }

    private match(str: string): boolean {
        if (this.input.slice(this.pos, this.pos + str.length) === str) {
            this.pos += str.length;
            return true;
        }
        return false;
    }

    // Called before pos moves past single-char tokens, after it moves past multi-char ones
    private addToken(type: TokenType, value: string): void {
        const start = value.length > 1 ? this.pos - value.length : this.pos;
        this.tokens.push({ type, value, position: start + this.offset });
    }
}
