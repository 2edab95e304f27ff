/**
 * Shared test fixtures.
 */
import { parseFact } from '../src/parser/index.js';
import { parseRule } from '../src/logic/rule.js';
import type { Fact, Rule } from '../src/types/terms.js';

// === Knowledge bases ===
export const CRIME = {
    facts: ['American(Robert)', 'Owns(A, T1)', 'Missile(T1)', 'Enemy(A, America)'],
    rules: [
        'Missile(x) => Weapon(x)',
        'Enemy(x, America) => Hostile(x)',
        'Missile(x), Owns(A, x) => Sells(Robert, x, A)',
        'American(p), Weapon(q), Sells(p, q, r), Hostile(r) => Criminal(p)',
    ],
    query: 'Criminal(Robert)',
};

export const FAMILY = {
    facts: ['Parent(Ann, Bob)', 'Parent(Bob, Cal)', 'Parent(Cal, Dee)'],
    rules: [
        'Parent(x, y) => Ancestor(x, y)',
        'Parent(x, y), Ancestor(y, z) => Ancestor(x, z)',
    ],
};

// === Helpers ===
export function facts(texts: readonly string[]): Fact[] {
    return texts.map(parseFact);
}

export function rules(texts: readonly string[]): Rule[] {
    return texts.map(t => parseRule(t));
}

/**
 * Run fn and return whatever it throws
 */
export function thrown(fn: () => unknown): unknown {
    try {
        fn();
    } catch (e) {
        return e;
    }
    throw new Error('Expected function to throw');
}
