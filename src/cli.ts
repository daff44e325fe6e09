#!/usr/bin/env node
import chalk from 'chalk';
import { KnowledgeBase } from './knowledgeBase.js';
import { take } from './utils/enumerate.js';
import { DEFAULTS, EvidenceOptions, isLogicException } from './types/index.js';

export const VERSION = '0.1.0';
const HELP = `
Argument Engine CLI v${VERSION}

Usage:
  argument-engine validate <source>             Parse and report the knowledge base size
  argument-engine cases <source>                Classify every literal
  argument-engine arguments <literal> <source>  List the arguments for a literal
  argument-engine print <source>                Print the consolidated knowledge base

<source> is a file path, or program text when no such file exists.

Options:
  --dedupe           Drop repeated evidence sets (env: ARGUMENT_ENGINE_DEDUPLICATE=1)
  --limit=<n>        List at most n arguments (default: ${DEFAULTS.maxListedArguments})
  --json             Print JSON instead of text
  --verbose          Report rule cycles cut during the search
  --help, -h         Show this help
  --version, -v      Show version

Examples:
  argument-engine cases weather.pl
  argument-engine arguments work_well "stay_home. happy :- stay_home. work_well :- happy."
`;

interface CliOptions {
    dedupe: boolean;
    limit: number;
    json: boolean;
    verbose: boolean;
}

/**
 * Run one CLI invocation and return its exit status.
 */
export function run(args: string[], env: NodeJS.ProcessEnv = process.env): number {
    if (args.includes('--help') || args.includes('-h')) {
        console.log(HELP);
        return 0;
    }
    if (args.includes('--version') || args.includes('-v')) {
        console.log(VERSION);
        return 0;
    }

    const options: CliOptions = {
        dedupe: args.includes('--dedupe') || env.ARGUMENT_ENGINE_DEDUPLICATE === '1',
        limit: DEFAULTS.maxListedArguments,
        json: args.includes('--json'),
        verbose: args.includes('--verbose'),
    };
    const cleanArgs: string[] = [];

    for (const arg of args) {
        if (arg.startsWith('--limit=')) {
            const limit = Number(arg.split('=')[1]);
            if (!Number.isInteger(limit) || limit < 1) {
                console.error(chalk.red(`Error: Invalid limit '${arg.split('=')[1]}'. Use a positive integer.`));
                return 1;
            }
            options.limit = limit;
        } else if (!arg.startsWith('--')) {
            cleanArgs.push(arg);
        }
    }

    const [commandName, ...operands] = cleanArgs;
    if (!commandName) {
        console.log(HELP);
        return 1;
    }

    try {
        switch (commandName) {
            case 'validate':
                return validate(requireSource(operands[0]), options);
            case 'cases':
                return listCases(requireSource(operands[0]), options);
            case 'arguments': {
                if (!operands[0]) {
                    console.error(chalk.red('Error: literal argument required'));
                    return 1;
                }
                return listArguments(operands[0], requireSource(operands[1]), options);
            }
            case 'print':
                return print(requireSource(operands[0]), options);
            default:
                console.error(chalk.red(`Unknown command: ${commandName}`));
                console.log(HELP);
                return 1;
        }
    } catch (e) {
        reportError(e);
        return 1;
    }
}

function requireSource(source: string | undefined): KnowledgeBase {
    if (source === undefined) {
        throw new Error('source argument required (file path or program text)');
    }
    return KnowledgeBase.fromString(source);
}

function validate(kb: KnowledgeBase, options: CliOptions): number {
    const size = kb.size;
    if (options.json) {
        console.log(JSON.stringify(size, null, 2));
    } else {
        console.log(chalk.green(`✓ ${size.clauses} clauses, ${size.rules} rules, ${size.literals} literals`));
    }
    return 0;
}

function listCases(kb: KnowledgeBase, options: CliOptions): number {
    const cases = kb.allCases();
    if (options.json) {
        console.log(JSON.stringify(cases.map(c => ({
            literal: c.claim.key,
            classification: c.classification,
            supported: c.isSupported,
        })), null, 2));
        return 0;
    }

    const width = Math.max(0, ...cases.map(c => c.claim.key.length));
    for (const c of cases) {
        const label = c.claim.key.padEnd(width);
        const note = c.isSupported ? '' : chalk.yellow(' (no arguments)');
        console.log(`${chalk.bold(label)}  ${c.classification}${note}`);
    }
    return 0;
}

function listArguments(literal: string, kb: KnowledgeBase, options: CliOptions): number {
    const evidenceOptions: EvidenceOptions = { deduplicate: options.dedupe };
    if (options.verbose) {
        evidenceOptions.onCycle = (revisited, path) => {
            console.error(chalk.dim(`cycle cut: ${[...path, revisited].map(l => l.key).join(' -> ')}`));
        };
    }

    // one extra to tell whether the limit cut the listing short
    const listed = [...take(kb.arguments(literal, evidenceOptions), options.limit + 1)];
    const truncated = listed.length > options.limit;
    const shown = listed.slice(0, options.limit);

    if (options.json) {
        console.log(JSON.stringify({ claim: kb.lookup(literal).key, truncated, arguments: shown }, null, 2));
        return 0;
    }

    console.log(chalk.bold(`Arguments for ${kb.lookup(literal).key}: ${shown.length}${truncated ? '+' : ''}`));
    for (const argument of shown) {
        console.log(`  ${argument.toString()}`);
    }
    if (truncated) {
        console.log(chalk.dim(`  ... stopped after ${options.limit} (use --limit=<n> for more)`));
    }
    return 0;
}

function print(kb: KnowledgeBase, options: CliOptions): number {
    console.log(options.json ? JSON.stringify(kb.toJSON(), null, 2) : kb.toString());
    return 0;
}

function reportError(e: unknown): void {
    if (isLogicException(e)) {
        const { code, message, span, suggestion } = e.error;
        console.error(chalk.red(`Error [${code}]: ${message}`));
        if (span?.line !== undefined && span.col !== undefined) {
            console.error(`  at line ${span.line}, column ${span.col}`);
        }
        if (suggestion) {
            console.error(chalk.cyan(`  Suggestion: ${suggestion}`));
        }
        return;
    }
    console.error(chalk.red(`Error: ${e instanceof Error ? e.message : String(e)}`));
}

if (require.main === module) {
    process.exitCode = run(process.argv.slice(2));
}
