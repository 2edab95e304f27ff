/**
 * Tests for rule construction, safety and predicate signatures
 */

import {
    assertRuleSafe,
    createRule,
    parseRule,
    renderRule,
    ruleFromStrings,
    ruleLabel,
} from '../src/logic/rule.js';
import { buildSignature } from '../src/logic/signature.js';
import { fact } from '../src/logic/terms.js';
import { isLogicException } from '../src/types/errors.js';
import type { Rule } from '../src/types/terms.js';
import { facts, rules, thrown } from './fixtures.js';

describe('rule safety', () => {
    test('rejects a conclusion variable that no premise binds', () => {
        const error = thrown(() => parseRule('Foo(x) => Bar(y)'));

        expect(isLogicException(error, 'UNSAFE_RULE')).toBe(true);
        if (isLogicException(error)) {
            expect(error.message).toBe('Unsafe rule: conclusion variable y not bound by any premise');
            expect(error.error.context).toBe('Foo(x) => Bar(y)');
            expect(error.error.details).toEqual({ unboundVariables: ['y'] });
        }
    });

    test('lists every unbound variable', () => {
        expect(() => parseRule('Foo(x) => Bar(y, z)'))
            .toThrow('Unsafe rule: conclusion variables y, z not bound by any premise');
    });

    test('accepts ground conclusions', () => {
        expect(renderRule(parseRule('Alarm => Wake'))).toBe('Alarm => Wake');
        expect(createRule([], fact('Sun')).premises).toEqual([]);
    });

    test('a rule without premises may not use variables', () => {
        expect(isLogicException(thrown(() => createRule([], fact('Sun', ['x']))), 'UNSAFE_RULE')).toBe(true);
    });

    test('assertRuleSafe checks rules built by hand', () => {
        const rule: Rule = { premises: [fact('P', ['x'])], conclusion: fact('Q', ['x', 'y']) };

        expect(() => assertRuleSafe(rule)).toThrow('Unsafe rule: conclusion variable y not bound by any premise');
    });
});

describe('rule text', () => {
    test('normalizes separators and spacing', () => {
        expect(renderRule(parseRule('Missile(x)&Owns(A,x)=>Sells(Robert,x,A)')))
            .toBe('Missile(x), Owns(A,x) => Sells(Robert,x,A)');
    });

    test('builds from premise and conclusion strings', () => {
        const rule = ruleFromStrings(['Missile(x)'], 'Weapon(x)', 'weapons');

        expect(rule.name).toBe('weapons');
        expect(renderRule(rule)).toBe('Missile(x) => Weapon(x)');
    });

    test('labels rules by name or position', () => {
        const [unnamed] = rules(['P(x) => Q(x)']);

        expect(ruleLabel(unnamed, 2)).toBe('R3');
        expect(ruleLabel(parseRule('P(x) => Q(x)', 'lift'), 2)).toBe('lift');
        expect('name' in unnamed).toBe(false);
    });
});

describe('buildSignature', () => {
    test('collects arities from facts, rules and query', () => {
        const signature = buildSignature(facts(['P(A)']), rules(['P(x) => Q(x, x)']), fact('R'));

        expect([...signature]).toEqual([['P', 1], ['Q', 2], ['R', 0]]);
    });

    test('rejects a predicate used with two arities', () => {
        const error = thrown(() => buildSignature(facts(['P(A)', 'P(A, B)']), []));

        expect(isLogicException(error, 'ARITY_MISMATCH')).toBe(true);
        if (isLogicException(error)) {
            expect(error.message).toBe("Predicate 'P' used with 2 argument(s) but previously with 1");
            expect(error.error.details).toEqual({ predicate: 'P', expected: 1, actual: 2 });
            expect(error.error.context).toBe('P(A,B)');
        }
    });

    test('keeps the first arity when not strict', () => {
        const signature = buildSignature(facts(['P(A)', 'P(A, B)']), [], undefined, false);

        expect(signature.get('P')).toBe(1);
    });
});
