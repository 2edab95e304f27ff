#!/usr/bin/env node
/**
 * MCP Forward-Chaining Server - Entry Point
 */

import { runServer } from './server.js';

async function main(): Promise<void> {
    const args = process.argv.slice(2);

    if (args.includes('--help') || args.includes('-h')) {
        console.log(`
MCP Forward-Chaining Server - rule-based inference over ground facts

Usage: mcp-forward-chain [options]

Options:
  --help, -h     Show this help message
  --version, -v  Show version information

Core Tools:
  - forward-chain      Derive facts from facts and rules, optionally toward a query
  - check-well-formed  Validate facts, rules and queries

Session Tools:
  - create-session     Create a reasoning session
  - assert-fact        Add a ground fact
  - assert-rule        Add a rule
  - retract-fact       Remove a fact
  - retract-rule       Remove a rule
  - list-knowledge     List facts and rules
  - query-session      Forward-chain over the session toward a query
  - clear-session      Remove all facts and rules
  - delete-session     Delete session

The server communicates via stdio using the Model Context Protocol.
`);
        process.exit(0);
    }

    if (args.includes('--version') || args.includes('-v')) {
        console.log('mcp-forward-chain version 0.3.0');
        process.exit(0);
    }

    try {
        await runServer();
    } catch (error) {
        console.error('Failed to start server:', error);
        process.exit(1);
    }
}

void main();
