import type {
    AssertResponse,
    ChainResponse,
    KnowledgeListResponse,
    RetractResponse,
    SessionClearResponse,
    SessionDeleteResponse,
    SessionInfo,
} from '../types/index.js';
import { DEFAULTS } from '../types/index.js';
import { validateStatements } from '../syntaxValidator.js';
import { SessionManager } from '../session/manager.js';
import { buildChainResponse } from '../utils/response.js';
import { resolveLimits, SyntaxErrorResponse } from './core.js';
import type {
    AssertFactArgs,
    AssertRuleArgs,
    CreateSessionArgs,
    QuerySessionArgs,
    RetractRuleArgs,
    SessionOnlyArgs,
} from '../tools/schemas.js';

export function createSessionHandler(
    args: CreateSessionArgs,
    sessionManager: SessionManager
): SessionInfo {
    const { ttl_minutes, strict_arity } = args;
    const ttlMs = ttl_minutes
        ? Math.min(ttl_minutes, DEFAULTS.maxSessionTtlMinutes) * 60 * 1000  // Max 24 hours
        : undefined;

    const session = sessionManager.create({ ttlMs, strictArity: strict_arity });
    const info = sessionManager.getInfo(session.id);

    return {
        session_id: session.id,
        created_at: new Date(info.createdAt).toISOString(),
        expires_at: new Date(info.expiresAt).toISOString(),
        ttl_minutes: Math.round(info.ttlMs / 60000),
        active_sessions: sessionManager.count,
    };
}

function counts(sessionManager: SessionManager, sessionId: string) {
    const info = sessionManager.getInfo(sessionId);
    return { fact_count: info.factCount, rule_count: info.ruleCount };
}

export function assertFactHandler(
    args: AssertFactArgs,
    sessionManager: SessionManager
): AssertResponse {
    const { session_id, fact } = args;

    const validation = validateStatements([fact]);
    const [report] = validation.statementResults;
    if (!validation.valid || report.kind !== 'fact') {
        return {
            success: false,
            session_id,
            ...counts(sessionManager, session_id),
            result: 'syntax_error',
            message: report.errors[0] ?? `Expected a fact but got a ${report.kind}`,
        };
    }

    const added = sessionManager.assertFact(session_id, fact);
    return {
        success: true,
        session_id,
        ...counts(sessionManager, session_id),
        ...(added ? { added: fact } : { message: `Already known: ${fact}` }),
    };
}

export function assertRuleHandler(
    args: AssertRuleArgs,
    sessionManager: SessionManager
): AssertResponse {
    const { session_id, rule, name } = args;

    const validation = validateStatements([rule]);
    const [report] = validation.statementResults;
    if (!validation.valid || report.kind !== 'rule') {
        return {
            success: false,
            session_id,
            ...counts(sessionManager, session_id),
            result: report.kind === 'rule' ? 'rejected' : 'syntax_error',
            message: report.errors[0] ?? `Expected a rule but got a ${report.kind}`,
        };
    }

    const added = sessionManager.assertRule(session_id, rule, name);
    return {
        success: true,
        session_id,
        ...counts(sessionManager, session_id),
        ...(added ? { added: rule } : { message: `Already known: ${rule}` }),
    };
}

export function retractFactHandler(
    args: AssertFactArgs,
    sessionManager: SessionManager
): RetractResponse {
    const { session_id, fact } = args;

    const removed = sessionManager.retractFact(session_id, fact);
    return {
        success: removed,
        session_id,
        ...counts(sessionManager, session_id),
        message: removed
            ? `Removed: ${fact}`
            : `Fact not found in session: ${fact}`,
    };
}

export function retractRuleHandler(
    args: RetractRuleArgs,
    sessionManager: SessionManager
): RetractResponse {
    const { session_id, rule } = args;

    const removed = sessionManager.retractRule(session_id, rule);
    return {
        success: removed,
        session_id,
        ...counts(sessionManager, session_id),
        message: removed
            ? `Removed: ${rule}`
            : `Rule not found in session: ${rule}`,
    };
}

export function querySessionHandler(
    args: QuerySessionArgs,
    sessionManager: SessionManager,
    onProgress?: (progress: number | undefined, message: string) => void
): (ChainResponse & { session_id: string }) | SyntaxErrorResponse {
    const { session_id, query, round_cap, include_trace, include_proof, verbosity } = args;

    // Validate query syntax
    const validation = validateStatements([`? ${query}`]);
    if (!validation.valid) {
        return { success: false, result: 'syntax_error', validation };
    }

    const result = sessionManager.query(session_id, query, {
        ...resolveLimits(round_cap),
        onProgress,
    });
    return {
        session_id,
        ...buildChainResponse(result, verbosity, {
            includeTrace: include_trace,
            includeProof: include_proof,
        }),
    };
}

export function listKnowledgeHandler(
    args: SessionOnlyArgs,
    sessionManager: SessionManager
): KnowledgeListResponse & { created_at?: string; expires_at?: string } {
    const { session_id, verbosity } = args;

    const { facts, rules } = sessionManager.list(session_id);
    const info = sessionManager.getInfo(session_id);

    return {
        session_id,
        fact_count: facts.length,
        rule_count: rules.length,
        facts,
        rules,
        ...(verbosity === 'detailed' && {
            created_at: new Date(info.createdAt).toISOString(),
            expires_at: new Date(info.expiresAt).toISOString(),
        }),
    };
}

export function clearSessionHandler(
    args: SessionOnlyArgs,
    sessionManager: SessionManager
): SessionClearResponse {
    const { session_id } = args;

    const session = sessionManager.clear(session_id);

    return {
        success: true,
        session_id: session.id,
        message: 'Session cleared',
    };
}

export function deleteSessionHandler(
    args: SessionOnlyArgs,
    sessionManager: SessionManager
): SessionDeleteResponse {
    const { session_id } = args;

    sessionManager.delete(session_id);

    return {
        success: true,
        message: `Session ${session_id} deleted`,
    };
}
