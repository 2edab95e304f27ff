import type { Fact, Rule } from '../types/terms.js';
import { createArityMismatchError } from '../types/errors.js';
import { renderFact } from './terms.js';

/**
 * Predicate arities across facts, rule templates and the query.
 *
 * With `strict` set, a predicate seen with two different argument counts is
 * rejected; otherwise the first arity seen is kept.
 */
export function buildSignature(
    facts: Iterable<Fact>,
    rules: readonly Rule[],
    query?: Fact,
    strict: boolean = true
): Map<string, number> {
    const arities = new Map<string, number>();

    const visit = (f: Fact) => {
        const known = arities.get(f.predicate);
        if (known === undefined) {
            arities.set(f.predicate, f.args.length);
        } else if (strict && known !== f.args.length) {
            throw createArityMismatchError(f.predicate, known, f.args.length, renderFact(f));
        }
    };

    for (const f of facts) visit(f);
    for (const rule of rules) {
        rule.premises.forEach(visit);
        visit(rule.conclusion);
    }
    if (query) visit(query);

    return arities;
}
