/**
 * One-way unification of a rule-premise template against a ground fact.
 */

import type { Fact, Substitution } from '../types/terms.js';
import { createInternalError } from '../types/errors.js';
import { extend, resolve } from './substitution.js';
import { renderFact } from './terms.js';

/**
 * Extend `sub` so that `pattern` becomes equal to `fact`, or return null.
 *
 * `fact` must be ground. Terms are flat, so no occurs check is needed.
 */
export function unify(pattern: Fact, fact: Fact, sub: Substitution): Substitution | null {
    if (pattern.predicate !== fact.predicate || pattern.args.length !== fact.args.length) {
        return null;
    }

    let current = sub;
    for (let i = 0; i < pattern.args.length; i++) {
        const factArg = fact.args[i];
        if (factArg.kind !== 'constant') {
            throw createInternalError(`cannot unify against non-ground fact ${renderFact(fact)}`);
        }

        const resolved = resolve(pattern.args[i], current);
        if (resolved.kind === 'variable') {
            current = extend(current, resolved.name, factArg);
        } else if (resolved.name !== factArg.name) {
            return null;
        }
    }
    return current;
}
