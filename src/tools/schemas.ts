/**
 * Argument schemas for every tool, checked before a handler runs.
 */

import { z } from 'zod';
import { createInvalidArgumentsError } from '../types/errors.js';

// Reusable schemas
export const verbositySchema = z.enum(['minimal', 'standard', 'detailed']).default('standard')
    .describe("Response verbosity: 'minimal' (token-efficient), 'standard' (default), 'detailed' (debug info)");

export const ruleInputSchema = z.union([
    z.string().min(1),
    z.object({
        premises: z.array(z.string().min(1)).min(1),
        conclusion: z.string().min(1),
        name: z.string().min(1).optional(),
    }),
]);

const sessionIdSchema = z.string().min(1).describe('Session ID from create-session');

export const forwardChainSchema = z.object({
    facts: z.array(z.string()).describe('Ground facts, e.g. "Missile(T1)"'),
    rules: z.array(ruleInputSchema).describe('Rules, inline "P(x), Q(x) => R(x)" or { premises, conclusion }'),
    query: z.string().optional().describe('Ground fact to prove; omit to compute the full closure'),
    round_cap: z.number().int().positive().optional(),
    strict_arity: z.boolean().optional(),
    include_trace: z.boolean().optional(),
    include_proof: z.boolean().optional(),
    highPower: z.boolean().optional(),
    verbosity: verbositySchema,
});

export const checkWellFormedSchema = z.object({
    statements: z.array(z.string()).min(1),
    verbosity: verbositySchema,
});

export const createSessionSchema = z.object({
    ttl_minutes: z.number().positive().optional(),
    strict_arity: z.boolean().optional(),
    verbosity: verbositySchema,
});

export const assertFactSchema = z.object({
    session_id: sessionIdSchema,
    fact: z.string(),
    verbosity: verbositySchema,
});

export const assertRuleSchema = z.object({
    session_id: sessionIdSchema,
    rule: z.string(),
    name: z.string().min(1).optional(),
    verbosity: verbositySchema,
});

export const retractRuleSchema = z.object({
    session_id: sessionIdSchema,
    rule: z.string(),
    verbosity: verbositySchema,
});

export const querySessionSchema = z.object({
    session_id: sessionIdSchema,
    query: z.string(),
    round_cap: z.number().int().positive().optional(),
    include_trace: z.boolean().optional(),
    include_proof: z.boolean().optional(),
    verbosity: verbositySchema,
});

export const sessionOnlySchema = z.object({
    session_id: sessionIdSchema,
    verbosity: verbositySchema,
});

export type ForwardChainArgs = z.infer<typeof forwardChainSchema>;
export type CheckWellFormedArgs = z.infer<typeof checkWellFormedSchema>;
export type CreateSessionArgs = z.infer<typeof createSessionSchema>;
export type AssertFactArgs = z.infer<typeof assertFactSchema>;
export type AssertRuleArgs = z.infer<typeof assertRuleSchema>;
export type RetractRuleArgs = z.infer<typeof retractRuleSchema>;
export type QuerySessionArgs = z.infer<typeof querySessionSchema>;
export type SessionOnlyArgs = z.infer<typeof sessionOnlySchema>;

/**
 * Validate raw tool arguments, throwing INVALID_ARGUMENTS with one entry per issue.
 */
export function parseToolArgs<S extends z.ZodTypeAny>(tool: string, schema: S, args: unknown): z.infer<S> {
    const parsed = schema.safeParse(args);
    if (!parsed.success) {
        throw createInvalidArgumentsError(
            tool,
            parsed.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        );
    }
    return parsed.data;
}
