/**
 * Tests for statement validation
 */

import { SyntaxValidator, validateStatements } from '../src/syntaxValidator.js';

describe('SyntaxValidator', () => {
    const validator = new SyntaxValidator();

    test('accepts a ground fact', () => {
        expect(validator.validate('Missile(T1)')).toEqual({ valid: true, kind: 'fact', errors: [], warnings: [] });
    });

    test('accepts a safe rule', () => {
        expect(validator.validate('Missile(x) => Weapon(x)')).toEqual({ valid: true, kind: 'rule', errors: [], warnings: [] });
    });

    test('rejects an unsafe rule', () => {
        const result = validator.validate('Foo(x) => Bar(y)');

        expect(result.valid).toBe(false);
        expect(result.kind).toBe('rule');
        expect(result.errors).toEqual(['Unsafe rule: conclusion variable y not bound by any premise']);
    });

    test('rejects facts and queries with variables', () => {
        expect(validator.validate('Missile(x)').errors).toEqual(['Fact contains variable(s) x - facts must be ground']);
        expect(validator.validate('? Criminal(p)').errors).toEqual(['Query contains variable(s) p - queries must be ground']);
    });

    test('warns about a rule that restates a premise', () => {
        const result = validator.validate('P(x) => P(x)');

        expect(result.valid).toBe(true);
        expect(result.warnings).toEqual(['Rule conclusion repeats one of its premises and can never derive anything new']);
    });

    test('warns about lowercase predicates', () => {
        expect(validator.validate('missile(T1)').warnings).toEqual([
            "Predicate 'missile' starts with lowercase - consider using uppercase for consistency",
        ]);
    });

    test('warns about cramped arrows and empty parentheses', () => {
        expect(validator.validate('P(x)=>Q(x)').warnings).toEqual(["Consider adding spaces around '=>' for readability"]);
        expect(validator.validate('Rainy()').warnings).toEqual([
            "Empty parentheses found - write a zero-argument predicate without '()'",
        ]);
    });

    test('explains a wrong arrow', () => {
        expect(validator.validate('P(x) -> Q(x)')).toEqual({
            valid: false,
            errors: ["Unexpected character '-'"],
            warnings: ["Use '=>' to separate rule premises from the conclusion"],
        });
    });

    test('explains unbalanced parentheses', () => {
        expect(validator.validate('P(A')).toEqual({
            valid: false,
            errors: ["Expected ',' or ')' but got end of input"],
            warnings: ['Unmatched opening parenthesis at position 1', "Unbalanced parentheses - missing closing ')'"],
        });
    });
});

describe('validateStatements', () => {
    test('reports every statement', () => {
        const report = validateStatements(['P(A)', 'Foo(x) => Bar(y)']);

        expect(report.valid).toBe(false);
        expect(report.statementResults.map(r => [r.statement, r.valid])).toEqual([
            ['P(A)', true],
            ['Foo(x) => Bar(y)', false],
        ]);
    });

    test('is valid when every statement is', () => {
        expect(validateStatements(['P(A)', 'P(x) => Q(x)', '? Q(A)']).valid).toBe(true);
    });
});
