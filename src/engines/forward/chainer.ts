/**
 * Forward-Chaining Driver
 *
 * Round-based fixpoint evaluation. Every round reads a snapshot of the fact
 * base, applies every rule against it, and merges the round's new facts only
 * once all rules have run, so facts derived in round k are visible from round
 * k+1 onwards. Stops when the query appears, when a round derives nothing, or
 * when the round cap, deadline or abort signal says so.
 */

import type { Fact, Rule } from '../../types/terms.js';
import type { ChainOptions } from '../../types/options.js';
import type { ChainResult, ChainStatus, InferenceStep } from '../../types/trace.js';
import { DEFAULTS } from '../../types/options.js';
import {
    LogicError,
    createInvalidOptionError,
    createInvalidQueryError,
    createRoundCapError,
} from '../../types/errors.js';
import { FactBase } from '../../logic/factBase.js';
import { match } from '../../logic/solver.js';
import { assertRuleSafe, parseRule, ruleFromStrings } from '../../logic/rule.js';
import { buildSignature } from '../../logic/signature.js';
import {
    EMPTY_SUBSTITUTION,
    applySubstitution,
    substitutionToRecord,
} from '../../logic/substitution.js';
import { factKey, factVariables, isGround, renderFact } from '../../logic/terms.js';
import { parseFact } from '../../parser/index.js';

/**
 * A rule given as text: either inline (`P(x) => Q(x)`) or as separate
 * premise and conclusion strings.
 */
export type RuleInput = string | { premises: string[]; conclusion: string; name?: string };

export interface ChainInput {
    facts: readonly string[];
    rules: readonly RuleInput[];
    query?: string;
}

export class ForwardChainer {
    private readonly defaults: ChainOptions;

    constructor(defaults: ChainOptions = {}) {
        this.defaults = defaults;
    }

    /**
     * Run to proof, fixpoint or cap. All input problems (non-ground query or
     * facts, unsafe rules, arity clashes, bad options) are thrown before the
     * first round.
     */
    run(
        facts0: Iterable<Fact>,
        rules: readonly Rule[],
        query?: Fact,
        options: ChainOptions = {}
    ): ChainResult {
        const opts = this.resolveOptions(options);
        const roundCap = opts.roundCap ?? DEFAULTS.roundCap;

        if (!Number.isInteger(roundCap) || roundCap < 1) {
            throw createInvalidOptionError('roundCap', roundCap, 'expected a positive integer');
        }
        if (opts.maxSeconds !== undefined && !(opts.maxSeconds > 0)) {
            throw createInvalidOptionError('maxSeconds', opts.maxSeconds, 'expected a positive number');
        }
        if (query && !isGround(query)) {
            throw createInvalidQueryError(renderFact(query), factVariables(query));
        }
        rules.forEach(assertRuleSafe);

        const base = FactBase.from(facts0);
        buildSignature(base, rules, query, opts.strictArity ?? DEFAULTS.strictArity);

        const startTime = Date.now();
        const deadline = opts.maxSeconds !== undefined ? startTime + opts.maxSeconds * 1000 : undefined;
        const initialFacts = base.size;
        const trace: InferenceStep[] = [];
        let rounds = 0;

        const finish = (status: ChainStatus, error?: LogicError): ChainResult => {
            const derived = trace.map(step => step.fact);
            return {
                status,
                proven: status === 'proven',
                rounds,
                trace,
                facts: base.toArray(),
                derived,
                ...(query && { query }),
                statistics: {
                    timeMs: Date.now() - startTime,
                    rounds,
                    derived: derived.length,
                    initialFacts,
                    finalFacts: base.size,
                },
                ...(error && { error }),
            };
        };

        if (query && base.has(query)) {
            return finish('proven');
        }

        for (;;) {
            if (rounds >= roundCap) {
                return finish('round_cap', createRoundCapError(roundCap, base.size).error);
            }
            if (opts.signal?.aborted) {
                return finish('cancelled');
            }
            if (deadline !== undefined && Date.now() >= deadline) {
                return finish('timeout');
            }

            const round = rounds + 1;
            const batch = this.evaluateRound(base.snapshot(), rules, round);
            if (batch.length === 0) {
                return finish('converged');
            }

            // Merge point: the only place the fact base grows
            for (const step of batch) {
                base.add(step.fact);
            }
            trace.push(...batch);
            rounds = round;

            opts.onRound?.(round, batch, base.size);
            opts.onProgress?.(undefined, `Round ${round}: derived ${batch.length} fact(s), ${base.size} known`);

            if (query && base.has(query)) {
                return finish('proven');
            }
        }
    }

    /**
     * Per-call options over constructor defaults, key by key; a key passed
     * as undefined falls back to the default.
     */
    private resolveOptions(options: ChainOptions): ChainOptions {
        const d = this.defaults;
        return {
            roundCap: options.roundCap ?? d.roundCap,
            maxSeconds: options.maxSeconds ?? d.maxSeconds,
            strictArity: options.strictArity ?? d.strictArity,
            signal: options.signal ?? d.signal,
            onRound: options.onRound ?? d.onRound,
            onProgress: options.onProgress ?? d.onProgress,
        };
    }

    /**
     * Apply every rule to the snapshot, keeping only facts new to this round.
     */
    private evaluateRound(snapshot: FactBase, rules: readonly Rule[], round: number): InferenceStep[] {
        const collected = new Set<string>();
        const batch: InferenceStep[] = [];

        rules.forEach((rule, ruleIndex) => {
            for (const { substitution, support } of match(rule.premises, snapshot, EMPTY_SUBSTITUTION)) {
                const derived = applySubstitution(rule.conclusion, substitution);
                const key = factKey(derived);
                if (snapshot.has(derived) || collected.has(key)) {
                    continue;
                }
                collected.add(key);
                batch.push({
                    round,
                    ruleIndex,
                    ...(rule.name !== undefined && { ruleName: rule.name }),
                    rule,
                    substitution,
                    bindings: substitutionToRecord(substitution),
                    premises: support,
                    fact: derived,
                });
            }
        });

        return batch;
    }
}

/**
 * Parse a rule given as text
 */
export function toRule(input: RuleInput): Rule {
    return typeof input === 'string'
        ? parseRule(input)
        : ruleFromStrings(input.premises, input.conclusion, input.name);
}

/**
 * Text-level entry point: parse, check and run.
 */
export function forwardChain(input: ChainInput, options: ChainOptions = {}): ChainResult {
    const facts = input.facts.map(parseFact);
    const rules = input.rules.map(toRule);
    const query = input.query !== undefined ? parseFact(input.query) : undefined;
    return new ForwardChainer().run(facts, rules, query, options);
}

/**
 * Create a new ForwardChainer with default options
 */
export function createForwardChainer(defaults: ChainOptions = {}): ForwardChainer {
    return new ForwardChainer(defaults);
}
