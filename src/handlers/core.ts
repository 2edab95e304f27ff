import type { ChainResponse, ChainOptions } from '../types/index.js';
import { DEFAULTS } from '../types/index.js';
import { validateStatements, ValidationReport } from '../syntaxValidator.js';
import { ForwardChainer, RuleInput, toRule } from '../engines/forward/chainer.js';
import { parseFact } from '../parser/index.js';
import { buildChainResponse } from '../utils/response.js';
import type { CheckWellFormedArgs, ForwardChainArgs } from '../tools/schemas.js';

export type SyntaxErrorResponse = { success: false; result: 'syntax_error'; validation: ValidationReport };

/**
 * Inline text of a rule for validation
 */
function ruleText(rule: RuleInput): string {
    return typeof rule === 'string' ? rule : `${rule.premises.join(', ')} => ${rule.conclusion}`;
}

/**
 * Round cap and time limit, extended in high-power mode. An explicit round cap always wins.
 */
export function resolveLimits(roundCap?: number, highPower?: boolean): Pick<ChainOptions, 'roundCap' | 'maxSeconds'> {
    return highPower
        ? { roundCap: roundCap ?? DEFAULTS.highPowerRoundCap, maxSeconds: DEFAULTS.highPowerMaxSeconds }
        : { roundCap: roundCap ?? DEFAULTS.roundCap, maxSeconds: DEFAULTS.maxSeconds };
}

export function forwardChainHandler(
    args: ForwardChainArgs,
    chainer: ForwardChainer,
    onProgress?: (progress: number | undefined, message: string) => void
): ChainResponse | SyntaxErrorResponse {
    const { facts, rules, query, round_cap, strict_arity, include_trace, include_proof, highPower, verbosity } = args;

    // Validate syntax first
    const statements = [
        ...facts,
        ...rules.map(ruleText),
        ...(query !== undefined ? [`? ${query}`] : []),
    ];
    const validation = validateStatements(statements);
    if (!validation.valid) {
        return { success: false, result: 'syntax_error', validation };
    }

    const result = chainer.run(
        facts.map(parseFact),
        rules.map(toRule),
        query !== undefined ? parseFact(query) : undefined,
        {
            ...resolveLimits(round_cap, highPower),
            ...(strict_arity !== undefined && { strictArity: strict_arity }),
            onProgress,
        }
    );

    return buildChainResponse(result, verbosity, {
        includeTrace: include_trace,
        includeProof: include_proof,
    });
}

export function checkWellFormedHandler(args: CheckWellFormedArgs): ValidationReport {
    return validateStatements(args.statements);
}
