/**
 * Insertion-ordered set of ground facts, indexed by predicate.
 */

import type { Fact } from '../types/terms.js';
import { createNonGroundFactError } from '../types/errors.js';
import { factKey, factVariables, isGround, renderFact } from './terms.js';

/**
 * Read-only access used by the premise solver
 */
export interface FactView {
    readonly size: number;
    has(fact: Fact): boolean;
    withPredicate(predicate: string): readonly Fact[];
}

export class FactBase implements FactView, Iterable<Fact> {
    private readonly keys = new Set<string>();
    private readonly ordered: Fact[] = [];
    private readonly byPredicate = new Map<string, Fact[]>();

    static from(facts: Iterable<Fact>): FactBase {
        const base = new FactBase();
        for (const f of facts) {
            base.add(f);
        }
        return base;
    }

    get size(): number {
        return this.ordered.length;
    }

    /**
     * Add a ground fact. Returns false if it was already present.
     */
    add(f: Fact): boolean {
        if (!isGround(f)) {
            throw createNonGroundFactError(renderFact(f), factVariables(f));
        }
        const key = factKey(f);
        if (this.keys.has(key)) {
            return false;
        }
        this.keys.add(key);
        this.ordered.push(f);

        let bucket = this.byPredicate.get(f.predicate);
        if (!bucket) {
            bucket = [];
            this.byPredicate.set(f.predicate, bucket);
        }
        bucket.push(f);
        return true;
    }

    has(f: Fact): boolean {
        return this.keys.has(factKey(f));
    }

    withPredicate(predicate: string): readonly Fact[] {
        return this.byPredicate.get(predicate) ?? [];
    }

    toArray(): Fact[] {
        return [...this.ordered];
    }

    /**
     * Independent copy; later additions to either side are not shared.
     */
    snapshot(): FactBase {
        return FactBase.from(this.ordered);
    }

    [Symbol.iterator](): Iterator<Fact> {
        return this.ordered[Symbol.iterator]();
    }
}
