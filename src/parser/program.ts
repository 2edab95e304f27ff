/**
 * Line-oriented knowledge files.
 *
 *   # comment            % comment
 *   American(Robert)
 *   Missile(x) => Weapon(x)
 *   ? Criminal(Robert)
 */

import type { Fact, Rule } from '../types/terms.js';
import { LogicException, createParseError } from '../types/errors.js';
import { createRule } from '../logic/rule.js';
import { parseStatement } from './index.js';

export interface Program {
    facts: Fact[];
    rules: Rule[];
    query?: Fact;
}

/**
 * Split knowledge text into statement lines, dropping blanks and comments.
 */
export function statementLines(text: string): Array<{ line: number; text: string }> {
    return text.split('\n')
        .map((raw, i) => ({ line: i + 1, text: raw.trim() }))
        .filter(l => l.text && !l.text.startsWith('#') && !l.text.startsWith('%'));
}

export function parseProgram(text: string): Program {
    const program: Program = { facts: [], rules: [] };

    for (const { line, text: statement } of statementLines(text)) {
        try {
            const parsed = parseStatement(statement);
            switch (parsed.kind) {
                case 'fact':
                    program.facts.push(parsed.fact);
                    break;
                case 'rule':
                    program.rules.push(createRule(parsed.premises, parsed.conclusion));
                    break;
                case 'query':
                    if (program.query) {
                        throw createParseError('Only one query is allowed per program', statement, 0);
                    }
                    program.query = parsed.fact;
                    break;
            }
        } catch (e) {
            if (e instanceof LogicException) {
                throw new LogicException({
                    ...e.error,
                    message: `Line ${line}: ${e.error.message}`,
                    details: { ...e.error.details, line },
                });
            }
            throw e;
        }
    }

    return program;
}
