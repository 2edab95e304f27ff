#!/usr/bin/env node
import { readFileSync } from 'fs';
import * as readline from 'readline';
import chalk from 'chalk';
import { parseProgram, statementLines } from './parser/program.js';
import { parseFact, parseStatement } from './parser/index.js';
import { createForwardChainer } from './engines/forward/chainer.js';
import { explain, formatProof, formatTrace } from './engines/forward/trace.js';
import { validateStatements } from './syntaxValidator.js';
import { createSessionManager } from './session/manager.js';
import { chainMessage } from './utils/response.js';
import { renderFact } from './logic/terms.js';
import { DEFAULTS, ChainResult, isLogicException } from './types/index.js';

const VERSION = '0.3.0';
const HELP = `
Forward-chaining CLI v${VERSION}

Usage:
  fwdchain run <file.kb>        Forward-chain the file's facts and rules toward its query
  fwdchain validate <file.kb>   Check syntax and rule safety of every line
  fwdchain repl                 Interactive mode

Knowledge files hold one statement per line:
  American(Robert)                               fact
  Missile(x), Owns(A, x) => Sells(Robert, x, A)  rule
  ? Criminal(Robert)                             query
Lines starting with # or % are comments.

Options:
  --query=<fact>     Override (or supply) the query
  --round-cap=<n>    Maximum number of rounds (default ${DEFAULTS.roundCap})
  --trace            Print every derived fact
  --proof            Print the derivation of the query
  --high-power, -H   Enable extended limits (${DEFAULTS.highPowerMaxSeconds}s, ${DEFAULTS.highPowerRoundCap} rounds)
  --help, -h         Show this help
  --version, -v      Show version

Examples:
  fwdchain run --proof examples/west.kb
  fwdchain run --query="Criminal(A)" examples/west.kb
`;

const args = process.argv.slice(2);
const highPower = args.includes('--high-power') || args.includes('-H');
const showTrace = args.includes('--trace');
const showProof = args.includes('--proof');

let queryOverride: string | undefined;
let roundCapArg: string | undefined;
const cleanArgs: string[] = [];

for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg.startsWith('--query=')) {
        queryOverride = arg.slice('--query='.length);
    } else if (arg === '--query') {
        if (i + 1 < args.length) {
            queryOverride = args[i + 1];
            i++;
        }
    } else if (arg.startsWith('--round-cap=')) {
        roundCapArg = arg.slice('--round-cap='.length);
    } else if (!arg.startsWith('-')) {
        cleanArgs.push(arg);
    }
}

const commandName = cleanArgs[0];
const fileName = cleanArgs[1];

function printResult(result: ChainResult): void {
    console.log(result.proven ? chalk.green('✓ PROVED') : chalk.red(`✗ NOT PROVED (${result.status})`));
    console.log(chainMessage(result));
    console.log(`Time: ${result.statistics.timeMs}ms`);

    if (showTrace && result.trace.length > 0) {
        console.log('\nTrace:\n' + formatTrace(result.trace).join('\n'));
    }
    if (showProof && result.proven && result.query) {
        const proof = formatProof(explain(result.trace, result.query));
        console.log('\nProof:\n' + (proof.length > 0 ? proof.join('\n') : `${renderFact(result.query)} is an initial fact`));
    }
}

async function main() {
    if (args.includes('--help') || args.includes('-h') || !commandName) {
        console.log(HELP);
        return;
    }

    if (args.includes('--version') || args.includes('-v')) {
        console.log(VERSION);
        return;
    }

    if (commandName === 'repl') {
        return runRepl();
    }

    if (!fileName) {
        console.error('Error: file argument required');
        process.exit(1);
    }

    const content = readFileSync(fileName, 'utf-8');

    switch (commandName) {
        case 'run': {
            const program = parseProgram(content);
            const query = queryOverride !== undefined ? parseFact(queryOverride) : program.query;
            const roundCap = roundCapArg !== undefined ? Number(roundCapArg) : undefined;

            console.log(query ? `Query: ${renderFact(query)}` : 'No query: computing the closure');
            console.log(`From ${program.facts.length} facts and ${program.rules.length} rules...`);

            const chainer = createForwardChainer();
            const result = chainer.run(program.facts, program.rules, query, {
                roundCap: highPower ? DEFAULTS.highPowerRoundCap : roundCap,
                maxSeconds: highPower ? DEFAULTS.highPowerMaxSeconds : DEFAULTS.maxSeconds,
            });

            printResult(result);
            if (!query) {
                console.log('\nFacts:\n' + result.facts.map(renderFact).join('\n'));
            }
            process.exit(result.proven || (!query && result.status === 'converged') ? 0 : 1);
            break;
        }
        case 'validate': {
            const lines = statementLines(content);
            const report = validateStatements(lines.map(l => l.text));
            report.statementResults.forEach((r, i) => {
                console.log(`${r.valid ? chalk.green('✓') : chalk.red('✗')} ${lines[i].line}: ${r.statement}`);
                r.errors.forEach(e => console.log(`  Error: ${e}`));
                r.warnings.forEach(w => console.log(chalk.yellow(`  Warning: ${w}`)));
            });
            process.exit(report.valid ? 0 : 1);
            break;
        }
        default:
            console.error(`Unknown command: ${commandName}`);
            console.log(HELP);
            process.exit(1);
    }
}

async function runRepl() {
    const sessions = createSessionManager();
    const session = sessions.create({ ttlMs: Number.MAX_SAFE_INTEGER });

    const rl = readline.createInterface({
        input: process.stdin,
        output: process.stdout,
        prompt: 'fwdchain> '
    });

    console.log(`Forward-chaining REPL v${VERSION}${highPower ? ' [HIGH-POWER]' : ''}`);
    console.log('Type facts, rules (P(x) => Q(x)) or queries (? Q(A)). Commands: .list, .clear, .retract <stmt>, .quit, .help\n');
    rl.prompt();

    rl.on('line', (line) => {
        const trimmed = line.trim();

        try {
            if (trimmed === '.help') {
                console.log('Statements:');
                console.log('  Missile(T1)              Add a fact');
                console.log('  Missile(x) => Weapon(x)  Add a rule');
                console.log('  ? Weapon(T1)             Forward-chain toward a query');
                console.log('Commands:');
                console.log('  .retract <fact|rule>     Remove a fact or rule');
                console.log('  .list                    List facts and rules');
                console.log('  .clear                   Clear the session');
                console.log('  .quit, .exit, .q         Exit REPL');
            } else if (trimmed.startsWith('.retract ')) {
                const statement = trimmed.slice(9).trim();
                const removed = statement.includes('=>')
                    ? sessions.retractRule(session.id, statement)
                    : sessions.retractFact(session.id, statement);
                console.log(removed ? '✓ Retracted' : '✗ Not found');
            } else if (trimmed === '.list') {
                const { facts, rules } = sessions.list(session.id);
                if (facts.length === 0 && rules.length === 0) {
                    console.log('(empty)');
                }
                facts.forEach(f => console.log(`  ${f}`));
                rules.forEach((r, i) => console.log(`  R${i + 1}: ${r}`));
            } else if (trimmed === '.clear') {
                sessions.clear(session.id);
                console.log('Cleared.');
            } else if (trimmed === '.quit' || trimmed === '.exit' || trimmed === '.q') {
                rl.close();
                return;
            } else if (trimmed && !trimmed.startsWith('.')) {
                const statement = parseStatement(trimmed);
                if (statement.kind === 'query') {
                    const result = sessions.query(session.id, renderFact(statement.fact), {
                        roundCap: highPower ? DEFAULTS.highPowerRoundCap : DEFAULTS.roundCap,
                    });
                    printResult(result);
                } else if (statement.kind === 'rule') {
                    const added = sessions.assertRule(session.id, trimmed);
                    const rules = sessions.list(session.id).rules;
                    console.log(added ? `✓ Rule R${rules.length}: ${rules[rules.length - 1]}` : '(already known)');
                } else {
                    const added = sessions.assertFact(session.id, trimmed);
                    console.log(added ? `✓ ${renderFact(statement.fact)}` : '(already known)');
                }
            } else if (trimmed) {
                console.log('Unknown command. Use .list, .retract, .clear, .help or .quit');
            }
        } catch (e) {
            if (isLogicException(e) && e.error.suggestion) {
                console.log(chalk.red(`✗ ${e.message}`) + `\n  ${e.error.suggestion}`);
            } else {
                console.log(chalk.red(`✗ ${(e as Error).message}`));
            }
        }
        rl.prompt();
    });

    rl.on('close', () => {
        sessions.stop();
        process.exit(0);
    });
}

main().catch(e => {
    console.error('Error:', e instanceof Error ? e.message : String(e));
    process.exit(1);
});
