/**
 * Substitution algebra.
 *
 * Substitutions are immutable maps from variable names to terms. They are only
 * ever extended into new values, so a backtracking search reverts simply by
 * dropping the extended value.
 */

import type { Fact, Substitution, Term } from '../types/terms.js';
import { createInternalError } from '../types/errors.js';
import { renderTerm } from './terms.js';

export const EMPTY_SUBSTITUTION: Substitution = new Map();

/**
 * Chase bindings until a constant or an unbound variable is reached.
 *
 * Transitive: if x is bound to y and y to T1, x resolves to T1. Terminates
 * because extend() never admits a binding that leads back to its variable.
 */
export function resolve(term: Term, sub: Substitution): Term {
    let current = term;
    while (current.kind === 'variable') {
        const next = sub.get(current.name);
        if (next === undefined) {
            return current;
        }
        current = next;
    }
    return current;
}

/**
 * New substitution with one more binding. The variable must be unbound.
 */
export function extend(sub: Substitution, variable: string, term: Term): Substitution {
    if (sub.has(variable)) {
        throw createInternalError(`variable '${variable}' is already bound`, {
            variable,
            bound: renderTerm(resolve({ kind: 'variable', name: variable }, sub)),
        });
    }
    const target = resolve(term, sub);
    if (target.kind === 'variable' && target.name === variable) {
        throw createInternalError(`binding '${variable}' to ${renderTerm(term)} would be circular`, { variable });
    }
    const next = new Map(sub);
    next.set(variable, term);
    return next;
}

export function applySubstitution(f: Fact, sub: Substitution): Fact {
    return {
        predicate: f.predicate,
        args: f.args.map(arg => resolve(arg, sub)),
    };
}

/**
 * Resolved bindings as a plain record, in binding order
 */
export function substitutionToRecord(sub: Substitution): Record<string, string> {
    const record: Record<string, string> = {};
    for (const name of sub.keys()) {
        record[name] = renderTerm(resolve({ kind: 'variable', name }, sub));
    }
    return record;
}

/**
 * Format as `{x/T1, r/A}`
 */
export function formatSubstitution(sub: Substitution): string {
    const parts = Object.entries(substitutionToRecord(sub)).map(([name, value]) => `${name}/${value}`);
    return `{${parts.join(', ')}}`;
}
