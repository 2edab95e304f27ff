/**
 * Term, Fact and Rule types.
 *
 * Terms are flat: a constant names an individual, a variable ranges over
 * individuals within one rule application. The tag is fixed when the term
 * is parsed and is never re-derived from the name.
 */

export interface Constant {
    kind: 'constant';
    name: string;
}

export interface Variable {
    kind: 'variable';
    name: string;
}

export type Term = Constant | Variable;

/**
 * A predicate applied to an ordered (possibly empty) list of terms.
 * Facts in the fact base are always ground; rule templates may hold variables.
 */
export interface Fact {
    predicate: string;
    args: readonly Term[];
}

/**
 * Horn-style rule: every premise must match for the conclusion to be derived.
 */
export interface Rule {
    name?: string;
    premises: readonly Fact[];
    conclusion: Fact;
}

/** Variable name to bound term. Never mutated once built. */
export type Substitution = ReadonlyMap<string, Term>;
