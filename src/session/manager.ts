/**
 * Session Manager
 *
 * Provides session-based reasoning over an accumulated set of facts and rules.
 * Sessions live in memory for the lifetime of the process, auto-expire after
 * their TTL and are garbage collected periodically.
 */

import { randomUUID } from 'crypto';
import type { Fact, Rule } from '../types/terms.js';
import type { ChainOptions } from '../types/options.js';
import type { ChainResult } from '../types/trace.js';
import { DEFAULTS } from '../types/options.js';
import {
    createNonGroundFactError,
    createSessionNotFoundError,
    createSessionLimitError,
} from '../types/errors.js';
import { ForwardChainer } from '../engines/forward/chainer.js';
import { parseFact } from '../parser/index.js';
import { parseRule, renderRule } from '../logic/rule.js';
import { buildSignature } from '../logic/signature.js';
import { factVariables, factsEqual, isGround, renderFact } from '../logic/terms.js';

/**
 * A reasoning session with accumulated facts and rules
 */
export interface Session {
    id: string;
    facts: Fact[];
    rules: Rule[];
    createdAt: number;
    lastAccessedAt: number;
    ttlMs: number;               // Time-to-live in milliseconds
    strictArity: boolean;
}

/**
 * Session creation options
 */
export interface CreateSessionOptions {
    ttlMs?: number;              // Custom TTL (default: 30 minutes)
    strictArity?: boolean;       // Reject arity clashes on assert (default: true)
}

/**
 * Session Manager - handles session lifecycle and operations
 */
export class SessionManager {
    private sessions = new Map<string, Session>();
    private gcIntervalId: ReturnType<typeof setInterval> | null = null;
    private chainer: ForwardChainer;

    /** GC runs every minute */
    private readonly gcIntervalMs = 60_000;

    /** Default session TTL: 30 minutes */
    private readonly defaultTtlMs = DEFAULTS.sessionTtlMs;

    /** Maximum number of concurrent sessions */
    static readonly MAX_SESSIONS = DEFAULTS.maxSessions;

    constructor(chainer: ForwardChainer = new ForwardChainer()) {
        this.chainer = chainer;
        // Start garbage collection; never keeps the process alive on its own
        this.gcIntervalId = setInterval(() => this.gc(), this.gcIntervalMs);
        this.gcIntervalId.unref();
    }

    /**
     * Create a new reasoning session
     */
    create(options?: CreateSessionOptions): Session {
        if (this.sessions.size >= SessionManager.MAX_SESSIONS) {
            throw createSessionLimitError(SessionManager.MAX_SESSIONS);
        }

        const now = Date.now();
        const session: Session = {
            id: randomUUID(),
            facts: [],
            rules: [],
            createdAt: now,
            lastAccessedAt: now,
            ttlMs: options?.ttlMs ?? this.defaultTtlMs,
            strictArity: options?.strictArity ?? DEFAULTS.strictArity,
        };

        this.sessions.set(session.id, session);
        return session;
    }

    /**
     * Get a session by ID (updates lastAccessedAt)
     */
    get(id: string): Session {
        const session = this.sessions.get(id);
        if (!session) {
            throw createSessionNotFoundError(id);
        }
        session.lastAccessedAt = Date.now();
        return session;
    }

    /**
     * Check if a session exists
     */
    exists(id: string): boolean {
        return this.sessions.has(id);
    }

    /**
     * Delete a session
     */
    delete(id: string): boolean {
        if (!this.sessions.has(id)) {
            throw createSessionNotFoundError(id);
        }
        return this.sessions.delete(id);
    }

    /**
     * Assert a ground fact. Returns false if the session already knew it.
     */
    assertFact(id: string, text: string): boolean {
        const session = this.get(id);
        const parsed = parseFact(text);
        if (!isGround(parsed)) {
            throw createNonGroundFactError(renderFact(parsed), factVariables(parsed));
        }
        if (session.facts.some(f => factsEqual(f, parsed))) {
            return false;
        }
        buildSignature([...session.facts, parsed], session.rules, undefined, session.strictArity);
        session.facts.push(parsed);
        return true;
    }

    /**
     * Assert an inline rule (`P(x), Q(x) => R(x)`). Unsafe rules are rejected.
     * Returns false if an identical rule is already present.
     */
    assertRule(id: string, text: string, name?: string): boolean {
        const session = this.get(id);
        const rule = parseRule(text, name);
        const rendered = renderRule(rule);
        if (session.rules.some(r => renderRule(r) === rendered)) {
            return false;
        }
        buildSignature(session.facts, [...session.rules, rule], undefined, session.strictArity);
        session.rules.push(rule);
        return true;
    }

    /**
     * Retract a fact. Returns true if the fact was found and removed.
     */
    retractFact(id: string, text: string): boolean {
        const session = this.get(id);
        const parsed = parseFact(text);
        const index = session.facts.findIndex(f => factsEqual(f, parsed));
        if (index === -1) {
            return false;
        }
        session.facts.splice(index, 1);
        return true;
    }

    /**
     * Retract a rule, matched by its normalized text.
     */
    retractRule(id: string, text: string): boolean {
        const session = this.get(id);
        const rendered = renderRule(parseRule(text));
        const index = session.rules.findIndex(r => renderRule(r) === rendered);
        if (index === -1) {
            return false;
        }
        session.rules.splice(index, 1);
        return true;
    }

    /**
     * List facts and rules in a session, rendered
     */
    list(id: string): { facts: string[]; rules: string[] } {
        const session = this.get(id);
        return {
            facts: session.facts.map(renderFact),
            rules: session.rules.map(renderRule),
        };
    }

    /**
     * Run forward chaining over the session's knowledge toward a ground query.
     * The session itself is left unchanged.
     */
    query(id: string, query: string, options: ChainOptions = {}): ChainResult {
        const session = this.get(id);
        return this.chainer.run(session.facts, session.rules, parseFact(query), {
            strictArity: session.strictArity,
            ...options,
        });
    }

    /**
     * Clear all facts and rules from a session (keeps session alive)
     */
    clear(id: string): Session {
        const session = this.get(id);
        session.facts = [];
        session.rules = [];
        return session;
    }

    /**
     * Get session info without modifying lastAccessedAt
     */
    getInfo(id: string): {
        id: string;
        factCount: number;
        ruleCount: number;
        createdAt: number;
        lastAccessedAt: number;
        ttlMs: number;
        expiresAt: number;
    } {
        const session = this.sessions.get(id);
        if (!session) {
            throw createSessionNotFoundError(id);
        }
        return {
            id: session.id,
            factCount: session.facts.length,
            ruleCount: session.rules.length,
            createdAt: session.createdAt,
            lastAccessedAt: session.lastAccessedAt,
            ttlMs: session.ttlMs,
            expiresAt: session.lastAccessedAt + session.ttlMs,
        };
    }

    /**
     * Get number of active sessions
     */
    get count(): number {
        return this.sessions.size;
    }

    /**
     * Garbage collect expired sessions. Returns the number removed.
     */
    gc(now: number = Date.now()): number {
        let removed = 0;
        for (const [id, session] of this.sessions) {
            if (now - session.lastAccessedAt > session.ttlMs) {
                this.sessions.delete(id);
                removed++;
            }
        }
        return removed;
    }

    /**
     * Stop the garbage collector (for cleanup)
     */
    stop(): void {
        if (this.gcIntervalId) {
            clearInterval(this.gcIntervalId);
            this.gcIntervalId = null;
        }
    }

    /**
     * Clear all sessions (for testing)
     */
    clearAll(): void {
        this.sessions.clear();
    }
}

/**
 * Create a new SessionManager instance
 */
export function createSessionManager(chainer?: ForwardChainer): SessionManager {
    return new SessionManager(chainer);
}
