import type { Verbosity } from './responses.js';
import type { InferenceStep } from './trace.js';

export interface ReasoningOptions {
    verbosity?: Verbosity;
    /** Stop between rounds once this many seconds have elapsed */
    maxSeconds?: number;
    includeTrace?: boolean;
    /**
     * Callback for progress updates.
     * @param progress A number between 0 and 1 (if known) or undefined.
     * @param message A descriptive message about the current step.
     */
    onProgress?: (progress: number | undefined, message: string) => void;
}

export interface ChainOptions extends ReasoningOptions {
    /** Maximum number of productive rounds (positive integer) */
    roundCap?: number;
    /** Reject predicates used with differing argument counts */
    strictArity?: boolean;
    /** Checked before each round; an aborted signal stops the run */
    signal?: AbortSignal;
    /** Called after every merged round with that round's new steps */
    onRound?: (round: number, steps: readonly InferenceStep[], factCount: number) => void;
}

export const DEFAULTS = {
    roundCap: 1000,
    highPowerRoundCap: 100000,
    maxSeconds: 30,
    highPowerMaxSeconds: 300,
    strictArity: true,
    sessionTtlMs: 30 * 60 * 1000,
    maxSessionTtlMinutes: 1440,
    maxSessions: 1000,
} as const;
