/**
 * Premise solver: backtracking search for every substitution that satisfies an
 * ordered conjunction of premise templates against a set of ground facts.
 *
 * Results are produced lazily by generators. Each call starts from its own
 * arguments and shares no mutable state, so a solve can be restarted or run
 * alongside others over the same fact view.
 */

import type { Fact, Substitution } from '../types/terms.js';
import type { FactView } from './factBase.js';
import { unify } from './unify.js';

/**
 * A solution together with the fact matched by each premise, in premise order.
 */
export interface Match {
    substitution: Substitution;
    support: Fact[];
}

export function* match(
    premises: readonly Fact[],
    facts: FactView,
    sub0: Substitution
): Generator<Match, void, undefined> {
    yield* matchFrom(premises, 0, facts, sub0, []);
}

export function* solve(
    premises: readonly Fact[],
    facts: FactView,
    sub0: Substitution
): Generator<Substitution, void, undefined> {
    for (const m of match(premises, facts, sub0)) {
        yield m.substitution;
    }
}

function* matchFrom(
    premises: readonly Fact[],
    index: number,
    facts: FactView,
    sub: Substitution,
    support: Fact[]
): Generator<Match, void, undefined> {
    if (index === premises.length) {
        yield { substitution: sub, support };
        return;
    }

    const premise = premises[index];
    for (const candidate of facts.withPredicate(premise.predicate)) {
        const extended = unify(premise, candidate, sub);
        if (extended !== null) {
            yield* matchFrom(premises, index + 1, facts, extended, [...support, candidate]);
        }
    }
}
