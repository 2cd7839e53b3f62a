/**
 * TPTP problem generation
 *
 * Looks up the two equations of every `EquationN_implies_EquationM`
 * theorem in a Lean equation database and writes one fof problem per
 * theorem for the prover.
 */
import fs from 'fs';
import path from 'path';
import type { Term } from '../types/term.js';
import { createApply, createVariable } from '../types/term.js';
import { createParseError } from '../types/errors.js';
import { parseInfixTerm } from '../parser/infix.js';
import { renderPrefix } from '../utils/printer.js';
import { termVariables } from '../utils/variables.js';

const EQUATION_START = /^equation\s+(\d+)\s*:=/;
const THEOREM = /theorem\s+(Equation\d+)_implies_(Equation\d+)/g;
const EQUATION_FILE = /^Eqns.*\.lean$/;

export interface TptpEquation {
    /** `(lhs = rhs)` in prefix notation */
    formula: string;
    /** X0, X1, ... in order of first appearance */
    variables: string[];
}

export interface GeneratedProblem {
    fileName: string;
    content: string;
}

export interface GenerationReport {
    problems: GeneratedProblem[];
    skipped: string[];
}

/**
 * Equation number -> equation text, from Lean sources declaring
 * `equation N := lhs = rhs` (possibly continued on following lines)
 */
export function buildEquationIndex(sources: Iterable<string>): Map<number, string> {
    const index = new Map<number, string>();

    for (const source of sources) {
        let current: number | undefined;
        let buffer: string[] = [];
        const flush = () => {
            if (current !== undefined) {
                index.set(current, buffer.join(' ').trim());
            }
        };

        for (const raw of source.split(/\r?\n/)) {
            const line = raw.trim();
            const start = EQUATION_START.exec(line);
            if (start) {
                flush();
                current = Number(start[1]);
                buffer = [line.slice(line.indexOf(':=') + 2).trim()];
            } else if (current !== undefined && line) {
                buffer.push(line);
            }
        }
        flush();
    }

    return index;
}

/**
 * Convert `x ◇ y = (y ◇ x) ◇ x` to `(op(X0,X1) = op(op(X1,X0),X0))`
 */
export function leanEquationToTptp(text: string): TptpEquation {
    const eq = text.indexOf('=');
    if (eq < 0) {
        throw createParseError("Expected '=' in equation", text);
    }
    const lhs = parseInfixTerm(text.slice(0, eq).trim());
    const rhs = parseInfixTerm(text.slice(eq + 1).trim());

    const renaming = new Map<string, string>();
    for (const name of [...termVariables(lhs), ...termVariables(rhs)]) {
        if (name !== 'op' && !renaming.has(name)) {
            renaming.set(name, `X${renaming.size}`);
        }
    }
    const rename = (term: Term): Term => term.type === 'variable'
        ? createVariable(renaming.get(term.name) ?? term.name)
        : createApply(rename(term.left), rename(term.right));
    const render = (term: Term) => renderPrefix(rename(term));

    return {
        formula: `(${render(lhs)} = ${render(rhs)})`,
        variables: [...renaming.values()],
    };
}

export function renderProblem(axiom: TptpEquation, conjecture: TptpEquation): string {
    const variables = [...new Set([...axiom.variables, ...conjecture.variables])].sort().join(', ');
    return `fof(a1, axiom,
    ! [${variables}] :
        ${axiom.formula}
).

fof(conjecture0, conjecture,
    ! [${variables}] :
        ${conjecture.formula}
).
`;
}

export function generateProblems(proofsText: string, index: Map<number, string>): GenerationReport {
    const problems: GeneratedProblem[] = [];
    const skipped: string[] = [];

    for (const [, axName, conjName] of proofsText.matchAll(THEOREM)) {
        const theorem = `${axName}_implies_${conjName}`;
        const axiom = index.get(Number(axName.replace('Equation', '')));
        const conjecture = index.get(Number(conjName.replace('Equation', '')));
        if (axiom === undefined || conjecture === undefined) {
            skipped.push(theorem);
            continue;
        }
        problems.push({
            fileName: `${theorem}.p`,
            content: renderProblem(leanEquationToTptp(axiom), leanEquationToTptp(conjecture)),
        });
    }

    return { problems, skipped };
}

/**
 * `benchmarks/input<N>` where N is the first number in the file's stem
 */
export function problemDirectoryFor(proofsPath: string, root: string = 'benchmarks'): string {
    const stem = path.basename(proofsPath, path.extname(proofsPath));
    const match = /(\d+)/.exec(stem);
    return path.join(root, `input${match ? match[1] : '0'}`);
}

export function loadEquationIndex(equationsDir: string): Map<number, string> {
    const files = fs.readdirSync(equationsDir)
        .filter(f => EQUATION_FILE.test(f))
        .sort();
    return buildEquationIndex(files.map(f => fs.readFileSync(path.join(equationsDir, f), 'utf-8')));
}

export function writeProblems(report: GenerationReport, outputDir: string): string[] {
    fs.mkdirSync(outputDir, { recursive: true });
    return report.problems.map(problem => {
        const file = path.join(outputDir, problem.fileName);
        fs.writeFileSync(file, problem.content);
        return file;
    });
}
