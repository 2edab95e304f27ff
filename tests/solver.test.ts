/**
 * Tests for the fact base and the premise solver
 */

import { FactBase, FactView } from '../src/logic/factBase.js';
import { match, solve } from '../src/logic/solver.js';
import { EMPTY_SUBSTITUTION, extend, substitutionToRecord } from '../src/logic/substitution.js';
import { constant, fact, renderFact } from '../src/logic/terms.js';
import { isLogicException } from '../src/types/errors.js';
import type { Fact } from '../src/types/terms.js';
import { CRIME, FAMILY, facts, thrown } from './fixtures.js';

describe('FactBase', () => {
    test('add reports whether the fact was new', () => {
        const base = new FactBase();

        expect(base.add(fact('Missile', ['T1']))).toBe(true);
        expect(base.add(fact('Missile', ['T1']))).toBe(false);
        expect(base.size).toBe(1);
        expect(base.has(fact('Missile', ['T1']))).toBe(true);
    });

    test('rejects facts with variables', () => {
        const error = thrown(() => new FactBase().add(fact('Missile', ['x'])));

        expect(isLogicException(error, 'NON_GROUND_FACT')).toBe(true);
        expect(isLogicException(error) && error.error.details).toEqual({ variables: ['x'] });
    });

    test('keeps insertion order and indexes by predicate', () => {
        const base = FactBase.from(facts(CRIME.facts));

        expect([...base].map(renderFact)).toEqual(['American(Robert)', 'Owns(A,T1)', 'Missile(T1)', 'Enemy(A,America)']);
        expect(base.withPredicate('Owns').map(renderFact)).toEqual(['Owns(A,T1)']);
        expect(base.withPredicate('Weapon')).toEqual([]);
    });

    test('snapshots are independent', () => {
        const base = FactBase.from(facts(['Missile(T1)']));
        const snap = base.snapshot();
        snap.add(fact('Weapon', ['T1']));

        expect(base.has(fact('Weapon', ['T1']))).toBe(false);
        expect(snap.size).toBe(2);
    });
});

describe('solve', () => {
    const family = FactBase.from(facts(FAMILY.facts));

    test('joins premises through shared variables', () => {
        const crime = FactBase.from(facts(CRIME.facts));
        const solutions = [...solve([fact('Missile', ['x']), fact('Owns', ['A', 'x'])], crime, EMPTY_SUBSTITUTION)];

        expect(solutions.map(substitutionToRecord)).toEqual([{ x: 'T1' }]);
    });

    test('enumerates solutions in fact order', () => {
        const solutions = [...solve([fact('Parent', ['x', 'y']), fact('Parent', ['y', 'z'])], family, EMPTY_SUBSTITUTION)];

        expect(solutions.map(substitutionToRecord)).toEqual([
            { x: 'Ann', y: 'Bob', z: 'Cal' },
            { x: 'Bob', y: 'Cal', z: 'Dee' },
        ]);
    });

    test('yields nothing when a premise cannot be met', () => {
        expect([...solve([fact('Parent', ['x', 'Ann'])], family, EMPTY_SUBSTITUTION)]).toEqual([]);
    });

    test('an empty conjunction has exactly the initial solution', () => {
        const sub0 = extend(EMPTY_SUBSTITUTION, 'x', constant('Ann'));

        expect([...solve([], family, sub0)]).toEqual([sub0]);
    });

    test('starts from the given substitution', () => {
        const sub0 = extend(EMPTY_SUBSTITUTION, 'x', constant('Bob'));
        const solutions = [...solve([fact('Parent', ['x', 'y'])], family, sub0)];

        expect(solutions.map(substitutionToRecord)).toEqual([{ x: 'Bob', y: 'Cal' }]);
    });

    test('is lazy', () => {
        let lookups = 0;
        const view: FactView = {
            size: family.size,
            has: (f: Fact) => family.has(f),
            withPredicate: (predicate: string) => {
                lookups++;
                return family.withPredicate(predicate);
            },
        };
        const solutions = solve([fact('Parent', ['x', 'y']), fact('Parent', ['y', 'z'])], view, EMPTY_SUBSTITUTION);

        expect(lookups).toBe(0);
        solutions.next();
        expect(lookups).toBe(2);
        [...solutions];
        expect(lookups).toBe(4);
    });

    test('can be restarted with the same result', () => {
        const premises = [fact('Parent', ['x', 'y'])];
        const first = [...solve(premises, family, EMPTY_SUBSTITUTION)].map(substitutionToRecord);
        const second = [...solve(premises, family, EMPTY_SUBSTITUTION)].map(substitutionToRecord);

        expect(second).toEqual(first);
        expect(first).toHaveLength(3);
    });
});

describe('match', () => {
    test('reports the fact used by each premise', () => {
        const crime = FactBase.from(facts(CRIME.facts));
        const [found] = [...match([fact('Missile', ['x']), fact('Owns', ['y', 'x'])], crime, EMPTY_SUBSTITUTION)];

        expect(found.support.map(renderFact)).toEqual(['Missile(T1)', 'Owns(A,T1)']);
        expect(substitutionToRecord(found.substitution)).toEqual({ x: 'T1', y: 'A' });
    });
});
