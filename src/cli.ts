#!/usr/bin/env node
import 'dotenv/config';
import chalk from 'chalk';
import path from 'path';
import type { Verbosity } from './types/options.js';
import { loadConfig } from './config.js';
import { TranslationException } from './types/errors.js';
import { formatDirectorySummary, formatTranslationError } from './utils/formatting.js';
import { translateTranscript } from './translator/index.js';
import { generateFromProofs, readText, summarizeLogs, translateFile } from './commands.js';

const VERSION = '0.3.0';
const HELP = `
trace2lean v${VERSION}

Usage:
  trace2lean <transcript>              Translate a prover transcript to Lean
  trace2lean generate <proofs.lean>    Write TPTP problems for every theorem in a proofs file
  trace2lean summarize <log_dir>       Summarize Vampire/Minimized statistics of .log files

Options:
  --out-dir=<dir>      Output directory, relative to the current directory
                       (translate: default lean/Proof,
                       generate: default benchmarks/input<N>)
  --equations=<dir>    Equation database for generate (default benchmarks/Equations)
  --stdout             Print the Lean document instead of writing a file
  --verbose            Print each pipeline stage
  --quiet              Print errors only
  --help, -h           Show this help
  --version, -v        Show version

Environment:
  TRACE2LEAN_OUTPUT_DIR, TRACE2LEAN_MAX_LINE_LENGTH, TRACE2LEAN_TACTIC,
  TRACE2LEAN_HYPOTHESIS, TRACE2LEAN_VERBOSITY (also read from .env)

Examples:
  trace2lean output/Equation3_implies_Equation8.out
  trace2lean generate --equations=benchmarks/Equations Proofs11.lean
  trace2lean summarize logs
`;

const args = process.argv.slice(2);

const flags = new Map<string, string>();
const cleanArgs: string[] = [];

for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const option = /^--(out-dir|equations)(?:=(.*))?$/.exec(arg);
    if (option) {
        if (option[2] !== undefined) {
            flags.set(option[1], option[2]);
        } else if (i + 1 < args.length) {
            flags.set(option[1], args[i + 1]);
            i++;
        }
    } else if (!arg.startsWith('-')) {
        cleanArgs.push(arg);
    }
}

const SUBCOMMANDS = ['generate', 'summarize'];
const commandName = SUBCOMMANDS.includes(cleanArgs[0]) ? cleanArgs[0] : 'translate';
const fileName = commandName === 'translate' ? cleanArgs[0] : cleanArgs[1];

function verbosityFlag(): Verbosity | undefined {
    if (args.includes('--quiet')) return 'minimal';
    if (args.includes('--verbose')) return 'detailed';
    return undefined;
}

function main(): number {
    if (args.includes('--help') || args.includes('-h')) {
        console.log(HELP);
        return 0;
    }

    if (args.includes('--version') || args.includes('-v')) {
        console.log(VERSION);
        return 0;
    }

    if (cleanArgs.length === 0) {
        console.log(HELP);
        return 1;
    }

    if (!fileName) {
        console.error('Error: file argument required');
        return 1;
    }

    const config = loadConfig(process.env, {
        outputDir: commandName === 'translate' ? flags.get('out-dir') : undefined,
        verbosity: verbosityFlag(),
    });
    const quiet = config.verbosity === 'minimal';
    const progress = config.verbosity === 'detailed'
        ? (message: string) => console.error(chalk.dim(`  ${message}`))
        : undefined;

    switch (commandName) {
        case 'translate': {
            if (args.includes('--stdout')) {
                const result = translateTranscript(readText(fileName), { ...config, onProgress: progress });
                process.stdout.write(result.document);
                return 0;
            }
            const result = translateFile(fileName, config, progress);
            if (!quiet) {
                console.log(chalk.green('✓ Generated Lean file:'), result.outputPath);
                console.log(chalk.dim(`  ${result.lemmaCount} lemmas, ${result.retainedAxioms.length} retained axioms`));
            }
            return 0;
        }
        case 'generate': {
            const equations = flags.get('equations') ?? path.join('benchmarks', 'Equations');
            const result = generateFromProofs(fileName, equations, flags.get('out-dir'));
            if (!quiet) {
                for (const theorem of result.skipped) {
                    console.warn(chalk.yellow(`Skipping ${theorem}: missing equation`));
                }
                console.log(chalk.green(`✓ Written: ${result.written.length}`), `to ${result.outputDir}`);
                console.log(`Skipped: ${result.skipped.length}`);
            }
            return 0;
        }
        case 'summarize': {
            console.log(formatDirectorySummary(summarizeLogs(fileName)));
            return 0;
        }
        default:
            console.error(`Unknown command: ${commandName}`);
            console.log(HELP);
            return 1;
    }
}

try {
    process.exitCode = main();
} catch (e) {
    if (e instanceof TranslationException) {
        console.error(chalk.red('✗ ' + formatTranslationError(e.error)));
    } else {
        console.error(chalk.red('Error:'), e instanceof Error ? e.message : String(e));
    }
    process.exitCode = 1;
}
