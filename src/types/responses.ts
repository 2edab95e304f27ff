/**
 * Response types for tool and CLI output
 */

import type { LogicError } from './errors.js';
import type { ChainStatistics, ChainStatus } from './trace.js';

/**
 * Verbosity level for responses
 */
export type Verbosity = 'minimal' | 'standard' | 'detailed';

/**
 * `closure`: no query was given and the fixpoint was reached
 */
export type ChainOutcome = 'proved' | 'not_proved' | 'closure' | 'round_cap' | 'timeout' | 'cancelled';

/**
 * Minimal response - just success/failure and result type
 */
export interface MinimalChainResponse {
    success: boolean;
    result: ChainOutcome;
}

/**
 * Standard response - includes message, rounds and derived facts
 */
export interface StandardChainResponse extends MinimalChainResponse {
    message: string;
    rounds: number;
    derivedFacts: string[];
    inferenceSteps?: string[];
    proof?: string[];
    error?: LogicError;
}

/**
 * Structured trace entry for detailed responses
 */
export interface TraceEntry {
    round: number;
    rule: string;
    ruleIndex: number;
    bindings: Record<string, string>;
    premises: string[];
    fact: string;
}

/**
 * Detailed response - includes debug info
 */
export interface DetailedChainResponse extends StandardChainResponse {
    status: ChainStatus;
    trace: TraceEntry[];
    facts: string[];
    statistics: ChainStatistics;
}

/**
 * Union type for chain responses
 */
export type ChainResponse = MinimalChainResponse | StandardChainResponse | DetailedChainResponse;

/**
 * Session info returned on creation
 */
export interface SessionInfo {
    session_id: string;
    created_at: string;
    expires_at: string;
    ttl_minutes: number;
    active_sessions: number;
}

export interface AssertResponse {
    success: boolean;
    session_id: string;
    fact_count: number;
    rule_count: number;
    added?: string;
    result?: 'syntax_error' | 'rejected';
    message?: string;
}

export interface RetractResponse {
    success: boolean;
    session_id: string;
    fact_count: number;
    rule_count: number;
    message: string;
}

export interface KnowledgeListResponse {
    session_id: string;
    fact_count: number;
    rule_count: number;
    facts: string[];
    rules: string[];
}

export interface SessionClearResponse {
    success: boolean;
    session_id: string;
    message: string;
}

export interface SessionDeleteResponse {
    success: boolean;
    message: string;
}
