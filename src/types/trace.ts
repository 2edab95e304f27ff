/**
 * Forward-chaining trace and result types
 */

import type { Fact, Rule, Substitution } from './terms.js';
import type { LogicError } from './errors.js';

/**
 * One derived fact: which rule fired, under which bindings, from which facts.
 */
export interface InferenceStep {
    /** 1-based round in which the fact was derived */
    round: number;
    /** Index of the rule in declaration order */
    ruleIndex: number;
    ruleName?: string;
    rule: Rule;
    substitution: Substitution;
    /** Resolved bindings, `variable -> constant` */
    bindings: Record<string, string>;
    /** The fact matched by each premise, in premise order */
    premises: Fact[];
    fact: Fact;
}

/**
 * Terminal states of a run
 */
export type ChainStatus =
    | 'proven'       // query present in the fact base
    | 'converged'    // fixpoint: a round produced nothing new
    | 'round_cap'    // round cap reached first
    | 'timeout'      // maxSeconds elapsed between rounds
    | 'cancelled';   // abort signal observed between rounds

export interface ChainStatistics {
    timeMs: number;
    rounds: number;
    derived: number;
    initialFacts: number;
    finalFacts: number;
}

export interface ChainResult {
    status: ChainStatus;
    proven: boolean;
    /** Number of rounds that merged new facts */
    rounds: number;
    trace: InferenceStep[];
    /** Final fact set, initial facts first, then derived facts in trace order */
    facts: Fact[];
    /** Facts added by the run, in trace order */
    derived: Fact[];
    query?: Fact;
    statistics: ChainStatistics;
    /** Set when the run stopped on the round cap */
    error?: LogicError;
}
