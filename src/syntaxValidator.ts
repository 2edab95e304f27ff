/**
 * Syntax Validator for facts, rules and queries
 *
 * Validates statements using the parser and the semantic checks the engine
 * applies before a run, then adds linting/heuristics.
 */

import { parseStatement, Statement } from './parser/index.js';
import { createRule } from './logic/rule.js';
import { factVariables, factsEqual } from './logic/terms.js';
import { getSuggestion } from './types/errors.js';

export type StatementKind = 'fact' | 'rule' | 'query';

export interface ValidationResult {
    valid: boolean;
    kind?: StatementKind;
    errors: string[];
    warnings: string[];
}

export interface StatementResult extends ValidationResult {
    statement: string;
}

export interface ValidationReport {
    valid: boolean;
    statementResults: StatementResult[];
}

/**
 * Syntax Validator for knowledge statements
 */
export class SyntaxValidator {
    private errors: string[] = [];
    private warnings: string[] = [];

    /**
     * Validate a single statement
     */
    validate(statement: string): ValidationResult {
        this.errors = [];
        this.warnings = [];

        let parsed: Statement;
        try {
            parsed = parseStatement(statement);
        } catch (e) {
            this.errors.push((e as Error).message);
            this.runDiagnostics(statement);
            return {
                valid: false,
                errors: [...this.errors],
                warnings: [...this.warnings]
            };
        }

        this.checkSemantics(parsed);
        this.checkNaming(statement);
        this.checkCommonMistakes(statement, parsed);

        return {
            valid: this.errors.length === 0,
            kind: parsed.kind,
            errors: [...this.errors],
            warnings: [...this.warnings]
        };
    }

    /**
     * Run heuristic checks to explain errors
     */
    private runDiagnostics(statement: string): void {
        this.checkBalancedParens(statement);
        const suggestion = getSuggestion(statement);
        if (suggestion) {
            this.warnings.push(suggestion);
        }
    }

    /**
     * Check for balanced parentheses
     */
    private checkBalancedParens(statement: string): void {
        const stack: number[] = [];

        for (let i = 0; i < statement.length; i++) {
            const char = statement[i];
            if (char === '(') {
                stack.push(i);
            } else if (char === ')') {
                if (stack.length === 0) {
                    this.warnings.push(`Unmatched closing parenthesis at position ${i}`);
                } else {
                    stack.pop();
                }
            }
        }

        if (stack.length > 0) {
            this.warnings.push(`Unmatched opening parenthesis at position ${stack[0]}`);
        }
    }

    /**
     * Checks the engine would otherwise raise before a run
     */
    private checkSemantics(parsed: Statement): void {
        switch (parsed.kind) {
            case 'fact': {
                const vars = factVariables(parsed.fact);
                if (vars.length > 0) {
                    this.errors.push(`Fact contains variable(s) ${vars.join(', ')} - facts must be ground`);
                }
                break;
            }
            case 'query': {
                const vars = factVariables(parsed.fact);
                if (vars.length > 0) {
                    this.errors.push(`Query contains variable(s) ${vars.join(', ')} - queries must be ground`);
                }
                break;
            }
            case 'rule':
                try {
                    createRule(parsed.premises, parsed.conclusion);
                } catch (e) {
                    this.errors.push((e as Error).message);
                }
                if (parsed.premises.some(p => factsEqual(p, parsed.conclusion))) {
                    this.warnings.push('Rule conclusion repeats one of its premises and can never derive anything new');
                }
                break;
        }
    }

    /**
     * Check predicate naming conventions
     */
    private checkNaming(statement: string): void {
        const pattern = /(?:^|[\s,&?=>])([A-Za-z0-9]+)\s*\(/g;
        let match;

        while ((match = pattern.exec(statement)) !== null) {
            const name = match[1];
            if (/^[a-z]/.test(name)) {
                this.warnings.push(
                    `Predicate '${name}' starts with lowercase - consider using uppercase for consistency`
                );
            }
        }
    }

    /**
     * Check for common syntax mistakes
     */
    private checkCommonMistakes(statement: string, parsed: Statement): void {
        if (/\(\s*\)/.test(statement)) {
            this.warnings.push(`Empty parentheses found - write a zero-argument predicate without '()'`);
        }
        if (parsed.kind === 'rule' && /\w=>|=>\w/.test(statement)) {
            this.warnings.push(`Consider adding spaces around '=>' for readability`);
        }
    }
}

/**
 * Validate a list of statements
 */
export function validateStatements(statements: string[]): ValidationReport {
    const validator = new SyntaxValidator();
    const results: StatementResult[] = [];
    let allValid = true;

    for (const statement of statements) {
        const result = validator.validate(statement);
        results.push({
            statement,
            ...result
        });
        if (!result.valid) {
            allValid = false;
        }
    }

    return {
        valid: allValid,
        statementResults: results
    };
}
