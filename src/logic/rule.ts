/**
 * Rule construction with the safety check, plus text ingestion and rendering.
 */

import type { Fact, Rule } from '../types/terms.js';
import { createUnsafeRuleError } from '../types/errors.js';
import { parseFact, parseRuleParts } from '../parser/index.js';
import { factVariables, renderFact } from './terms.js';

/**
 * Build a rule, rejecting it if a conclusion variable occurs in no premise.
 */
export function createRule(premises: readonly Fact[], conclusion: Fact, name?: string): Rule {
    const rule: Rule = { premises: [...premises], conclusion, ...(name !== undefined && { name }) };
    assertRuleSafe(rule);
    return rule;
}

/**
 * Throws UNSAFE_RULE for rules built without createRule that break safety.
 */
export function assertRuleSafe(rule: Rule): void {
    const bound = new Set(rule.premises.flatMap(factVariables));
    const unbound = factVariables(rule.conclusion).filter(v => !bound.has(v));
    if (unbound.length > 0) {
        throw createUnsafeRuleError(renderRule(rule), unbound);
    }
}

/**
 * Parse `P(x), Q(x) => R(x)` (premises separated by ',' or '&')
 */
export function parseRule(text: string, name?: string): Rule {
    const { premises, conclusion } = parseRuleParts(text);
    return createRule(premises, conclusion, name);
}

/**
 * Two-column form: premise strings plus a conclusion string
 */
export function ruleFromStrings(premises: readonly string[], conclusion: string, name?: string): Rule {
    return createRule(premises.map(parseFact), parseFact(conclusion), name);
}

export function renderRule(rule: Rule): string {
    return `${rule.premises.map(renderFact).join(', ')} => ${renderFact(rule.conclusion)}`;
}

export function ruleLabel(rule: Rule, index: number): string {
    return rule.name ?? `R${index + 1}`;
}
