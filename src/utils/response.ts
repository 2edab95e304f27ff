import type {
    ChainOutcome,
    ChainResponse,
    ChainResult,
    ChainStatus,
    DetailedChainResponse,
    StandardChainResponse,
    Verbosity,
} from '../types/index.js';
import { explain, formatProof, formatTrace, toTraceEntry } from '../engines/forward/trace.js';
import { renderFact } from '../logic/terms.js';

export interface ResponseOptions {
    /** Add formatted trace lines (standard and detailed only) */
    includeTrace?: boolean;
    /** Add the formatted derivation of the query (standard and detailed only) */
    includeProof?: boolean;
}

const OUTCOMES: Record<ChainStatus, ChainOutcome> = {
    proven: 'proved',
    converged: 'not_proved',
    round_cap: 'round_cap',
    timeout: 'timeout',
    cancelled: 'cancelled',
};

export function chainOutcome(status: ChainStatus, hasQuery: boolean = true): ChainOutcome {
    return status === 'converged' && !hasQuery ? 'closure' : OUTCOMES[status];
}

export function chainMessage(result: ChainResult): string {
    const query = result.query ? renderFact(result.query) : undefined;
    switch (result.status) {
        case 'proven':
            return result.rounds === 0
                ? `${query} is already a known fact`
                : `Proved ${query} after ${result.rounds} round(s)`;
        case 'converged':
            return query
                ? `${query} cannot be derived: fixpoint reached after ${result.rounds} round(s) with ${result.facts.length} facts`
                : `Fixpoint reached after ${result.rounds} round(s) with ${result.facts.length} facts`;
        case 'round_cap':
            return `Stopped at the round cap after ${result.rounds} round(s); the result is partial`;
        case 'timeout':
            return `Stopped on the time limit after ${result.rounds} round(s); the result is partial`;
        case 'cancelled':
            return `Cancelled after ${result.rounds} round(s); the result is partial`;
    }
}

/**
 * Build a standardized chain response based on verbosity level.
 */
export function buildChainResponse(
    result: ChainResult,
    verbosity: Verbosity,
    options: ResponseOptions = {}
): ChainResponse {
    const outcome = chainOutcome(result.status, result.query !== undefined);
    const success = outcome === 'proved' || outcome === 'closure';

    if (verbosity === 'minimal') {
        return { success, result: outcome };
    }

    const standard: StandardChainResponse = {
        success,
        result: outcome,
        message: chainMessage(result),
        rounds: result.rounds,
        derivedFacts: result.derived.map(renderFact),
    };
    if (options.includeTrace) {
        standard.inferenceSteps = formatTrace(result.trace);
    }
    if (options.includeProof && result.proven && result.query) {
        standard.proof = formatProof(explain(result.trace, result.query));
    }
    if (result.error) {
        standard.error = result.error;
    }

    if (verbosity === 'standard') {
        return standard;
    }

    const detailed: DetailedChainResponse = {
        ...standard,
        status: result.status,
        trace: result.trace.map(toTraceEntry),
        facts: result.facts.map(renderFact),
        statistics: result.statistics,
    };
    return detailed;
}
