/**
 * Calc-Block Builder
 *
 * Turns a proof block of the form
 *
 *     op(a, b)
 *   = { by axiom 1 (a1) }
 *     op(b, a)
 *
 * into Lean calc steps `(x0 ◇ x1) = (x1 ◇ x0) := by duper [op_law]`.
 */
import type { CalcStep, ProofBlock, ProofLine } from '../types/transcript.js';
import type { Renaming } from '../types/term.js';
import type { ResolvedTranslateOptions } from '../types/options.js';
import { LAYOUT } from '../types/options.js';
import { TranslationException, createMissingDependencyError, createParseError } from '../types/errors.js';
import { parseTerm } from '../parser/term.js';
import { renderInfix, wrapSide } from '../utils/printer.js';
import { renameTerm } from '../utils/variables.js';
import { DependencyResolver } from './dependencies.js';

const JUSTIFICATION = /^=\s*\{\s*by\s+(\S+).*?\}/;
const FIRST_REFERENCE = /(single_lemma_\d+|history_lemma_\d+|a1)/;
const LEMMA_NUMBER = /lemma\s+(\d+)/i;

/**
 * Source token justifying one step. Only the first reference on the line
 * counts.
 */
export function justificationToken(text: string): string | undefined {
    const ref = FIRST_REFERENCE.exec(text);
    if (ref) {
        return ref[1];
    }
    const lemma = LEMMA_NUMBER.exec(text);
    return lemma ? `Lemma_${lemma[1]}` : undefined;
}

export function isJustification(text: string): boolean {
    return JUSTIFICATION.test(text);
}

function renderSide(neighbour: ProofLine | undefined, at: ProofLine, which: string, renaming: Renaming): string {
    if (!neighbour || !neighbour.text || neighbour.text.toLowerCase() === 'proof:' || isJustification(neighbour.text)) {
        throw createParseError(`Justification has no ${which} term`, at.text).atLine(at.line, at.text);
    }
    try {
        return renderInfix(renameTerm(parseTerm(neighbour.text).term, renaming));
    } catch (e) {
        if (e instanceof TranslationException) {
            throw e.atLine(neighbour.line, neighbour.text);
        }
        throw e;
    }
}

export function buildCalcSteps(
    block: ProofBlock,
    renaming: Renaming,
    resolver: DependencyResolver
): CalcStep[] {
    const steps: CalcStep[] = [];
    const lines = block.lines;

    for (let i = 0; i < lines.length; i++) {
        const line = lines[i];
        if (!line.text || line.text.toLowerCase() === 'proof:' || !isJustification(line.text)) {
            continue;
        }

        const token = justificationToken(line.text);
        if (token === undefined) {
            throw createMissingDependencyError(line.text, `line ${line.line}`);
        }

        steps.push({
            lhs: renderSide(lines[i - 1], line, 'left-hand', renaming),
            rhs: renderSide(lines[i + 1], line, 'right-hand', renaming),
            justification: resolver.resolve(token, `line ${line.line}: ${line.text}`),
            line: line.line,
        });
    }

    return steps;
}

/**
 * One step on one line when both sides fit the budget together, otherwise
 * broken after '='.
 */
export function formatCalcStep(
    step: CalcStep,
    options: Pick<ResolvedTranslateOptions, 'maxLineLength' | 'tactic'>
): string {
    const indent = LAYOUT.stepIndent;
    const proof = `:= by\n${indent}${options.tactic} [${step.justification}]`;

    if (step.lhs.length + step.rhs.length <= options.maxLineLength) {
        return `${step.lhs} = ${step.rhs} ${proof}`;
    }
    const lhs = wrapSide(step.lhs, indent, options.maxLineLength);
    const rhs = wrapSide(step.rhs, indent, options.maxLineLength);
    return `${lhs} =\n${indent}${rhs} ${proof}`;
}

export function formatCalcBlock(
    steps: CalcStep[],
    options: Pick<ResolvedTranslateOptions, 'maxLineLength' | 'tactic'>
): string {
    return steps.map(step => formatCalcStep(step, options)).join(LAYOUT.stepSeparator);
}
