/**
 * Term and Fact helpers: construction, classification, equality, rendering.
 */

import type { Constant, Fact, Term, Variable } from '../types/terms.js';

export function constant(name: string): Constant {
    return { kind: 'constant', name };
}

export function variable(name: string): Variable {
    return { kind: 'variable', name };
}

/**
 * Build a fact. Plain string arguments are classified by the lexical
 * convention (lowercase first letter is a variable).
 */
export function fact(predicate: string, args: ReadonlyArray<Term | string> = []): Fact {
    return {
        predicate,
        args: args.map(a => typeof a === 'string' ? classifyTerm(a) : a),
    };
}

/**
 * Classify an identifier: lowercase-leading names are variables, everything
 * else (uppercase or digit first) is a constant.
 */
export function classifyTerm(name: string): Term {
    return /^[a-z]/.test(name) ? variable(name) : constant(name);
}

export function isVariable(term: Term): term is Variable {
    return term.kind === 'variable';
}

export function termsEqual(a: Term, b: Term): boolean {
    return a.kind === b.kind && a.name === b.name;
}

export function factsEqual(a: Fact, b: Fact): boolean {
    if (a.predicate !== b.predicate || a.args.length !== b.args.length) {
        return false;
    }
    return a.args.every((arg, i) => termsEqual(arg, b.args[i]));
}

export function isGround(f: Fact): boolean {
    return f.args.every(a => a.kind === 'constant');
}

/**
 * Distinct variable names of a fact, in order of first occurrence.
 */
export function factVariables(f: Fact): string[] {
    const seen = new Set<string>();
    for (const arg of f.args) {
        if (arg.kind === 'variable') seen.add(arg.name);
    }
    return [...seen];
}

export function renderTerm(term: Term): string {
    return term.name;
}

/**
 * Render a fact as `Name` or `Name(a,b)`. Inverse of parseFact for ground facts.
 */
export function renderFact(f: Fact): string {
    if (f.args.length === 0) {
        return f.predicate;
    }
    return `${f.predicate}(${f.args.map(renderTerm).join(',')})`;
}

/**
 * Identity key for set membership. Constants and variables can never share
 * a name, so the rendered text is unambiguous.
 */
export const factKey = renderFact;
