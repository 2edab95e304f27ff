/**
 * Library Entry Point
 *
 * Exports the core functionality for use in other projects.
 * This file should NOT import @modelcontextprotocol/sdk or any other
 * server-specific dependencies.
 */

// Core logic
export * from './logic/index.js';

// Driver and trace
export * from './engines/forward/index.js';

// Parser
export { parseFact, parseTerm, parseStatement, Tokenizer, Parser } from './parser/index.js';
export type { Statement } from './parser/index.js';
export { parseProgram } from './parser/program.js';
export type { Program } from './parser/program.js';

// Validation
export { validateStatements, SyntaxValidator } from './syntaxValidator.js';
export type { ValidationReport, ValidationResult, StatementResult } from './syntaxValidator.js';

// Sessions
export { SessionManager, createSessionManager } from './session/manager.js';

// Responses
export { buildChainResponse } from './utils/response.js';

// Types and Interfaces
export * from './types/index.js';
