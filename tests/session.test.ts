/**
 * Tests for session management
 */

import { SessionManager, createSessionManager } from '../src/session/manager.js';
import { LogicException, isLogicException } from '../src/types/errors.js';
import { CRIME, thrown } from './fixtures.js';

describe('SessionManager', () => {
    let manager: SessionManager;

    beforeEach(() => {
        manager = createSessionManager();
    });

    afterEach(() => {
        manager.stop();
        manager.clearAll();
    });

    function loadCrime(id: string): void {
        CRIME.facts.forEach(f => manager.assertFact(id, f));
        CRIME.rules.forEach(r => manager.assertRule(id, r));
    }

    describe('create', () => {
        test('creates session with UUID', () => {
            const session = manager.create();

            expect(session.id).toMatch(/^[0-9a-f-]{36}$/);
            expect(session.facts).toEqual([]);
            expect(session.rules).toEqual([]);
            expect(session.strictArity).toBe(true);
            expect(session.createdAt).toBeLessThanOrEqual(Date.now());
        });

        test('uses default TTL when not specified', () => {
            expect(manager.create().ttlMs).toBe(30 * 60 * 1000);
            expect(manager.create({ ttlMs: 60000 }).ttlMs).toBe(60000);
        });

        test('throws when max sessions reached', () => {
            for (let i = 0; i < SessionManager.MAX_SESSIONS; i++) {
                manager.create();
            }

            expect(() => manager.create()).toThrow(LogicException);
            expect(() => manager.create()).toThrow(/limit/i);
        });
    });

    describe('lookup', () => {
        test('retrieves existing session', () => {
            const created = manager.create();

            expect(manager.get(created.id).id).toBe(created.id);
            expect(manager.exists(created.id)).toBe(true);
        });

        test('throws for non-existent session', () => {
            expect(isLogicException(thrown(() => manager.get('missing')), 'SESSION_NOT_FOUND')).toBe(true);
            expect(isLogicException(thrown(() => manager.delete('missing')), 'SESSION_NOT_FOUND')).toBe(true);
        });

        test('delete removes the session', () => {
            const session = manager.create();

            expect(manager.delete(session.id)).toBe(true);
            expect(manager.exists(session.id)).toBe(false);
        });
    });

    describe('facts', () => {
        test('assertFact reports duplicates', () => {
            const { id } = manager.create();

            expect(manager.assertFact(id, 'Missile(T1)')).toBe(true);
            expect(manager.assertFact(id, 'Missile( T1 )')).toBe(false);
            expect(manager.list(id).facts).toEqual(['Missile(T1)']);
        });

        test('rejects facts with variables', () => {
            const { id } = manager.create();

            expect(isLogicException(thrown(() => manager.assertFact(id, 'Missile(x)')), 'NON_GROUND_FACT')).toBe(true);
        });

        test('rejects arity clashes and keeps the session unchanged', () => {
            const { id } = manager.create();
            manager.assertFact(id, 'Owns(A, T1)');

            expect(isLogicException(thrown(() => manager.assertFact(id, 'Owns(A)')), 'ARITY_MISMATCH')).toBe(true);
            expect(manager.list(id).facts).toEqual(['Owns(A,T1)']);
        });

        test('allows arity clashes when strict arity is off', () => {
            const { id } = manager.create({ strictArity: false });
            manager.assertFact(id, 'Owns(A, T1)');

            expect(manager.assertFact(id, 'Owns(A)')).toBe(true);
        });

        test('retractFact removes a known fact', () => {
            const { id } = manager.create();
            manager.assertFact(id, 'Missile(T1)');

            expect(manager.retractFact(id, 'Missile(T1)')).toBe(true);
            expect(manager.retractFact(id, 'Missile(T1)')).toBe(false);
            expect(manager.getInfo(id).factCount).toBe(0);
        });
    });

    describe('rules', () => {
        test('assertRule ignores whitespace when detecting duplicates', () => {
            const { id } = manager.create();

            expect(manager.assertRule(id, 'Missile(x) => Weapon(x)')).toBe(true);
            expect(manager.assertRule(id, 'Missile(x)=>Weapon(x)')).toBe(false);
            expect(manager.list(id).rules).toEqual(['Missile(x) => Weapon(x)']);
        });

        test('rejects unsafe rules', () => {
            const { id } = manager.create();

            expect(isLogicException(thrown(() => manager.assertRule(id, 'Foo(x) => Bar(y)')), 'UNSAFE_RULE')).toBe(true);
            expect(manager.getInfo(id).ruleCount).toBe(0);
        });

        test('retractRule matches the normalized text', () => {
            const { id } = manager.create();
            manager.assertRule(id, 'Missile(x), Owns(A, x) => Sells(Robert, x, A)');

            expect(manager.retractRule(id, 'Missile(x) & Owns(A,x) => Sells(Robert,x,A)')).toBe(true);
            expect(manager.getInfo(id).ruleCount).toBe(0);
        });
    });

    describe('query', () => {
        test('proves from the session knowledge', () => {
            const { id } = manager.create();
            loadCrime(id);

            const result = manager.query(id, CRIME.query);
            expect(result.status).toBe('proven');
            expect(result.rounds).toBe(2);
        });

        test('does not store derived facts', () => {
            const { id } = manager.create();
            loadCrime(id);
            manager.query(id, CRIME.query);

            expect(manager.getInfo(id).factCount).toBe(4);
        });

        test('passes options through', () => {
            const { id } = manager.create();
            loadCrime(id);

            expect(manager.query(id, CRIME.query, { roundCap: 1 }).status).toBe('round_cap');
        });
    });

    describe('lifecycle', () => {
        test('clear keeps the session alive', () => {
            const { id } = manager.create();
            loadCrime(id);
            manager.clear(id);

            expect(manager.getInfo(id)).toMatchObject({ factCount: 0, ruleCount: 0 });
            expect(manager.exists(id)).toBe(true);
        });

        test('getInfo reports expiry', () => {
            const session = manager.create({ ttlMs: 1000 });
            const info = manager.getInfo(session.id);

            expect(info.expiresAt).toBe(info.lastAccessedAt + 1000);
        });

        test('gc removes expired sessions only', () => {
            const short = manager.create({ ttlMs: 1000 });
            const long = manager.create();

            expect(manager.gc(short.lastAccessedAt + 1001)).toBe(1);
            expect(manager.exists(short.id)).toBe(false);
            expect(manager.exists(long.id)).toBe(true);
            expect(manager.count).toBe(1);
        });
    });
});
