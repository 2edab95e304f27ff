/**
 * Trace Utilities
 *
 * Formats inference steps and extracts the derivation of a single fact.
 */

import type { Fact } from '../../types/terms.js';
import type { InferenceStep } from '../../types/trace.js';
import type { TraceEntry } from '../../types/responses.js';
import { renderRule, ruleLabel } from '../../logic/rule.js';
import { formatSubstitution } from '../../logic/substitution.js';
import { factKey, renderFact } from '../../logic/terms.js';

/**
 * `Round 1 [R1] Missile(x) => Weapon(x) {x/T1}: Missile(T1) => Weapon(T1)`
 */
export function formatStep(step: InferenceStep): string {
    const label = ruleLabel(step.rule, step.ruleIndex);
    const used = step.premises.map(renderFact).join(', ');
    return `Round ${step.round} [${label}] ${renderRule(step.rule)} ${formatSubstitution(step.substitution)}: ${used} => ${renderFact(step.fact)}`;
}

export function formatTrace(trace: readonly InferenceStep[]): string[] {
    return trace.map(formatStep);
}

export function toTraceEntry(step: InferenceStep): TraceEntry {
    return {
        round: step.round,
        rule: renderRule(step.rule),
        ruleIndex: step.ruleIndex,
        bindings: step.bindings,
        premises: step.premises.map(renderFact),
        fact: renderFact(step.fact),
    };
}

/**
 * The steps that derive `target`, supporting steps before the steps that use
 * them, each at most once. Initial facts have no step and end the search.
 * Returns an empty list when `target` was not derived.
 */
export function explain(trace: readonly InferenceStep[], target: Fact): InferenceStep[] {
    const producedBy = new Map<string, InferenceStep>();
    for (const step of trace) {
        const key = factKey(step.fact);
        if (!producedBy.has(key)) {
            producedBy.set(key, step);
        }
    }

    const proof: InferenceStep[] = [];
    const visited = new Set<string>();

    const visit = (f: Fact) => {
        const key = factKey(f);
        const step = producedBy.get(key);
        if (!step || visited.has(key)) return;
        visited.add(key);
        step.premises.forEach(visit);
        proof.push(step);
    };

    visit(target);
    return proof;
}

/**
 * `1. Weapon(T1) by R1 from Missile(T1)`
 */
export function formatProof(steps: readonly InferenceStep[]): string[] {
    return steps.map((step, i) => {
        const head = `${i + 1}. ${renderFact(step.fact)} by ${ruleLabel(step.rule, step.ruleIndex)}`;
        return step.premises.length > 0 ? `${head} from ${step.premises.map(renderFact).join(', ')}` : head;
    });
}
