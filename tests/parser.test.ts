/**
 * Tests for the tokenizer and statement parser
 */

import { Tokenizer, parseFact, parseStatement, parseTerm } from '../src/parser/index.js';
import { constant, fact, factsEqual, renderFact } from '../src/logic/terms.js';
import { LogicException, isLogicException } from '../src/types/errors.js';
import { thrown } from './fixtures.js';

describe('Tokenizer', () => {
    test('reports positions against the untrimmed input', () => {
        const tokens = new Tokenizer('  P(x)').tokenize();

        expect(tokens.map(t => [t.type, t.value, t.position])).toEqual([
            ['IDENT', 'P', 2],
            ['LPAREN', '(', 3],
            ['IDENT', 'x', 4],
            ['RPAREN', ')', 5],
            ['EOF', '', 6],
        ]);
    });

    test('recognizes the rule arrow as one token', () => {
        const tokens = new Tokenizer('A => B').tokenize();

        expect(tokens[1]).toEqual({ type: 'ARROW', value: '=>', position: 2 });
        expect(tokens[2]).toEqual({ type: 'IDENT', value: 'B', position: 5 });
    });

    test('rejects characters outside the grammar with a span', () => {
        const error = thrown(() => new Tokenizer('P(x_y)').tokenize());

        expect(isLogicException(error, 'PARSE_ERROR')).toBe(true);
        if (!isLogicException(error)) return;
        expect(error.message).toBe("Unexpected character '_'");
        expect(error.error.span).toEqual({ start: 3, end: 4, line: 1, col: 4 });
        expect(error.error.suggestion).toBe('Underscores are not allowed in names - use letters and digits only');
    });
});

describe('parseFact', () => {
    test('classifies arguments by their first character', () => {
        const parsed = parseFact('Sells(Robert, x, A)');

        expect(parsed).toEqual({
            predicate: 'Sells',
            args: [
                { kind: 'constant', name: 'Robert' },
                { kind: 'variable', name: 'x' },
                { kind: 'constant', name: 'A' },
            ],
        });
    });

    test('digit-first names are constants', () => {
        expect(parseFact('Age(Bob, 42)').args[1]).toEqual({ kind: 'constant', name: '42' });
    });

    test('parses zero-arity facts with or without parentheses', () => {
        expect(parseFact('  Rainy ')).toEqual({ predicate: 'Rainy', args: [] });
        expect(parseFact('Rainy()')).toEqual({ predicate: 'Rainy', args: [] });
    });

    test('accepts a trailing period', () => {
        expect(renderFact(parseFact('Missile(T1).'))).toBe('Missile(T1)');
    });

    test('renders back without whitespace', () => {
        expect(renderFact(parseFact('Sells( Robert ,T1, A )'))).toBe('Sells(Robert,T1,A)');
    });

    test.each([
        fact('Rainy'),
        fact('Age', ['Bob', constant('42')]),
        fact('Sells', ['Robert', 'T1', 'A']),
    ])('parses its own rendering of %p', (original) => {
        expect(factsEqual(parseFact(renderFact(original)), original)).toBe(true);
    });

    test.each([
        ['P(É)', "Unexpected character 'É'"],
        ['P(😀)', "Unexpected character '😀'"],
    ])('rejects non-ASCII input %s', (input, message) => {
        const error = thrown(() => parseFact(input));

        expect(isLogicException(error, 'PARSE_ERROR')).toBe(true);
        expect(isLogicException(error) && error.message).toBe(message);
        expect(isLogicException(error) && error.error.span?.start).toBe(2);
    });

    test.each([
        ['P(x', "Expected ',' or ')' but got end of input"],
        ['P(x) Q', "Unexpected token 'Q'"],
        ['(x)', "Expected predicate name but got '('"],
        ['P(,x)', "Expected argument but got ','"],
        ['Owns(f(A), x)', "Nested term 'f(...)' is not supported; arguments must be plain names"],
    ])('rejects %s', (input, message) => {
        const error = thrown(() => parseFact(input));

        expect(error).toBeInstanceOf(LogicException);
        expect(isLogicException(error, 'PARSE_ERROR')).toBe(true);
        if (isLogicException(error)) {
            expect(error.message).toBe(message);
            expect(error.error.context).toBe(input);
        }
    });

    test('points at the nested parenthesis', () => {
        const error = thrown(() => parseFact('Owns(f(A), x)'));

        expect(isLogicException(error) && error.error.span?.start).toBe(6);
    });
});

describe('parseTerm', () => {
    test('parses variables and constants', () => {
        expect(parseTerm('x')).toEqual({ kind: 'variable', name: 'x' });
        expect(parseTerm('T1')).toEqual({ kind: 'constant', name: 'T1' });
    });

    test('rejects empty input and extra tokens', () => {
        expect(() => parseTerm('')).toThrow('Expected a term but got end of input');
        expect(() => parseTerm('a b')).toThrow("Unexpected token 'b' in term");
    });
});

describe('parseStatement', () => {
    test('recognizes queries', () => {
        const parsed = parseStatement('? Criminal(Robert)');

        expect(parsed.kind).toBe('query');
        expect(parsed.kind === 'query' && renderFact(parsed.fact)).toBe('Criminal(Robert)');
    });

    test('accepts both premise separators', () => {
        const parsed = parseStatement('P(x) & Q(x), S(x) => R(x)');

        expect(parsed.kind).toBe('rule');
        if (parsed.kind === 'rule') {
            expect(parsed.premises.map(renderFact)).toEqual(['P(x)', 'Q(x)', 'S(x)']);
            expect(renderFact(parsed.conclusion)).toBe('R(x)');
        }
    });

    test('plain atoms are facts', () => {
        expect(parseStatement('Missile(T1)').kind).toBe('fact');
    });

    test('rejects a rule without a conclusion', () => {
        expect(() => parseStatement('P(x) => ')).toThrow('Expected predicate name but got end of input');
    });

    test('rejects premises without a separator', () => {
        expect(() => parseStatement('P(x) Q(x) => R(x)')).toThrow("Expected '=>' but got 'Q'");
    });
});
