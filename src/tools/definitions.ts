import type { Tool } from '@modelcontextprotocol/sdk/types.js';

/**
 * Verbosity parameter schema for tools
 */
const verbositySchema = {
    type: 'string',
    enum: ['minimal', 'standard', 'detailed'],
    description: "Response verbosity: 'minimal' (token-efficient), 'standard' (default), 'detailed' (debug info)",
};

const sessionIdSchema = {
    type: 'string',
    description: 'Session ID from create-session',
};

const ruleSchema = {
    oneOf: [
        {
            type: 'string',
            description: 'Inline rule, e.g. "Missile(x), Owns(A, x) => Sells(Robert, x, A)"',
        },
        {
            type: 'object',
            properties: {
                premises: { type: 'array', items: { type: 'string' } },
                conclusion: { type: 'string' },
                name: { type: 'string' },
            },
            required: ['premises', 'conclusion'],
        },
    ],
};

export const TOOLS: Tool[] = [
    // ==================== CORE REASONING TOOLS ====================
    {
        name: 'forward-chain',
        description: `Derive new facts from ground facts and Horn rules by forward chaining.

**When to use:** You have facts and if-then rules and want to know whether a fact follows, or what the full closure is.
**Syntax:** Names starting with a lowercase letter are variables; everything else is a constant.

**Example:**
  facts: ["American(Robert)", "Missile(T1)", "Owns(A, T1)", "Enemy(A, America)"]
  rules: ["Missile(x) => Weapon(x)", "Enemy(x, America) => Hostile(x)",
          "Missile(x), Owns(A, x) => Sells(Robert, x, A)",
          "American(p), Weapon(q), Sells(p, q, r), Hostile(r) => Criminal(p)"]
  query: "Criminal(Robert)"
  → Returns: { success: true, result: "proved", rounds: 2 }

**Common issues:**
- Every variable in a rule's conclusion must appear in a premise
- Queries and facts must not contain variables`,
        inputSchema: {
            type: 'object',
            properties: {
                facts: {
                    type: 'array',
                    items: { type: 'string' },
                    description: 'Ground facts',
                },
                rules: {
                    type: 'array',
                    items: ruleSchema,
                    description: 'Rules as inline text or { premises, conclusion, name }',
                },
                query: {
                    type: 'string',
                    description: 'Ground fact to prove. Omit to compute the closure.',
                },
                round_cap: {
                    type: 'integer',
                    description: 'Max rounds before giving up (default: 1000)',
                },
                strict_arity: {
                    type: 'boolean',
                    description: 'Reject predicates used with different argument counts. Default: true.',
                },
                include_trace: {
                    type: 'boolean',
                    description: 'Include one line per derived fact',
                },
                include_proof: {
                    type: 'boolean',
                    description: 'Include the derivation of the query when proved',
                },
                highPower: {
                    type: 'boolean',
                    description: 'Enable extended limits (300s, 100k rounds)',
                },
                verbosity: verbositySchema,
            },
            required: ['facts', 'rules'],
        },
    },
    {
        name: 'check-well-formed',
        description: `Check facts, rules and queries for syntax and safety problems without running anything.

**Example:**
  statements: ["Missile(T1)", "Foo(x) => Bar(y)", "? Criminal(Robert)"]
  → Reports the unsafe rule (y is not bound by any premise)`,
        inputSchema: {
            type: 'object',
            properties: {
                statements: {
                    type: 'array',
                    items: { type: 'string' },
                    description: 'Facts, rules ("... => ...") or queries ("? ...")',
                },
                verbosity: verbositySchema,
            },
            required: ['statements'],
        },
    },

    // ==================== SESSION MANAGEMENT TOOLS ====================
    {
        name: 'create-session',
        description: `Create a new reasoning session for building up facts and rules incrementally.

**Notes:**
- Sessions live in memory only and auto-expire after TTL (default: 30 minutes)
- Maximum 1000 concurrent sessions`,
        inputSchema: {
            type: 'object',
            properties: {
                ttl_minutes: {
                    type: 'integer',
                    description: 'Session time-to-live in minutes (default: 30, max: 1440)',
                },
                strict_arity: {
                    type: 'boolean',
                    description: 'Reject arity clashes on assert. Default: true.',
                },
                verbosity: verbositySchema,
            },
            required: [],
        },
    },
    {
        name: 'assert-fact',
        description: 'Add a ground fact to a session.',
        inputSchema: {
            type: 'object',
            properties: {
                session_id: sessionIdSchema,
                fact: { type: 'string', description: 'Ground fact, e.g. "Missile(T1)"' },
                verbosity: verbositySchema,
            },
            required: ['session_id', 'fact'],
        },
    },
    {
        name: 'assert-rule',
        description: 'Add a rule ("P(x), Q(x) => R(x)") to a session. Unsafe rules are rejected.',
        inputSchema: {
            type: 'object',
            properties: {
                session_id: sessionIdSchema,
                rule: { type: 'string', description: 'Inline rule' },
                name: { type: 'string', description: 'Optional label shown in traces' },
                verbosity: verbositySchema,
            },
            required: ['session_id', 'rule'],
        },
    },
    {
        name: 'retract-fact',
        description: 'Remove a fact from a session.',
        inputSchema: {
            type: 'object',
            properties: {
                session_id: sessionIdSchema,
                fact: { type: 'string' },
                verbosity: verbositySchema,
            },
            required: ['session_id', 'fact'],
        },
    },
    {
        name: 'retract-rule',
        description: 'Remove a rule from a session (matched ignoring whitespace).',
        inputSchema: {
            type: 'object',
            properties: {
                session_id: sessionIdSchema,
                rule: { type: 'string' },
                verbosity: verbositySchema,
            },
            required: ['session_id', 'rule'],
        },
    },
    {
        name: 'query-session',
        description: `Forward-chain over a session's facts and rules toward a ground query.

The session is not modified; derived facts are reported, not stored.`,
        inputSchema: {
            type: 'object',
            properties: {
                session_id: sessionIdSchema,
                query: { type: 'string', description: 'Ground fact to prove' },
                round_cap: { type: 'integer', description: 'Max rounds (default: 1000)' },
                include_trace: { type: 'boolean' },
                include_proof: { type: 'boolean' },
                verbosity: verbositySchema,
            },
            required: ['session_id', 'query'],
        },
    },
    {
        name: 'list-knowledge',
        description: 'List the facts and rules in a session.',
        inputSchema: {
            type: 'object',
            properties: {
                session_id: sessionIdSchema,
                verbosity: verbositySchema,
            },
            required: ['session_id'],
        },
    },
    {
        name: 'clear-session',
        description: 'Remove all facts and rules from a session, keeping it alive.',
        inputSchema: {
            type: 'object',
            properties: {
                session_id: sessionIdSchema,
            },
            required: ['session_id'],
        },
    },
    {
        name: 'delete-session',
        description: 'Delete a session.',
        inputSchema: {
            type: 'object',
            properties: {
                session_id: sessionIdSchema,
            },
            required: ['session_id'],
        },
    },
];
