/**
 * Document Renderer
 *
 * Pure string assembly of the Lean file: preamble, hypothesis schema,
 * retained axioms, conjecture schema, then the theorem whose body lists
 * the lemmas and ends with the conjecture's own proof.
 */
import type { Expression, Renaming } from '../types/term.js';
import type { ResolvedLemma, RetainedAxiom, TopLevelRecord } from '../types/transcript.js';
import type { ResolvedTranslateOptions } from '../types/options.js';
import { LAYOUT } from '../types/options.js';
import { TranslationException } from '../types/errors.js';
import { parseExpression, stripQuantifiers } from '../parser/term.js';
import { formatEquationBody, renderExpression, renderInfix } from '../utils/printer.js';
import { renameExpression, renamedVariables, scopeOf } from '../utils/variables.js';
import { buildCalcSteps, formatCalcBlock } from './calc.js';
import { DependencyResolver } from './dependencies.js';
import {
    PREAMBLE,
    abbrevTemplate,
    axiomTemplate,
    calcProof,
    haveTemplate,
    showTemplate,
    tacticProof,
    theoremHeaderTemplate,
} from './templates.js';

type LayoutOptions = Pick<ResolvedTranslateOptions, 'maxLineLength' | 'tactic' | 'hypothesisName'>;

interface ScopedBody {
    renaming: Renaming;
    variables: string[];
    body: string;
}

/**
 * Rename an expression within its own scope and render its body,
 * optionally broken after '='
 */
function scopedBody(expression: Expression, maxLineLength?: number): ScopedBody {
    const renaming = scopeOf(expression);
    const renamed = renameExpression(expression, renaming);
    let body: string;
    if (renamed.type === 'equation' && maxLineLength !== undefined) {
        body = formatEquationBody(
            renderInfix(renamed.lhs),
            renderInfix(renamed.rhs),
            LAYOUT.bodyBreakIndent,
            maxLineLength
        );
    } else {
        body = renderExpression(renamed);
    }
    return { renaming, variables: renamedVariables(renaming), body };
}

function parseFormula(record: TopLevelRecord): Expression {
    try {
        return parseExpression(stripQuantifiers(record.formula));
    } catch (e) {
        if (e instanceof TranslationException) {
            throw e.atLine(record.line, record.formula);
        }
        throw e;
    }
}

export function renderSchema(record: TopLevelRecord): string {
    const { variables, body } = scopedBody(parseFormula(record));
    return abbrevTemplate(record.name, variables, body);
}

export function renderRetainedAxiom(axiom: RetainedAxiom, options: LayoutOptions): string {
    const { variables, body } = scopedBody(axiom.expression, options.maxLineLength);
    return axiomTemplate(axiom.name, variables, body);
}

export function renderLemma(
    lemma: ResolvedLemma,
    resolver: DependencyResolver,
    options: LayoutOptions
): string {
    const { renaming, variables, body } = scopedBody(lemma.expression, options.maxLineLength);

    const proof = lemma.proof
        ? calcProof(formatCalcBlock(buildCalcSteps(lemma.proof, renaming, resolver), options))
        : tacticProof(options.tactic, lemma.dependencies);

    return lemma.isConjecture
        ? showTemplate(variables, proof)
        : haveTemplate(lemma.name, variables, body, proof);
}

export interface DocumentParts {
    hypothesis: TopLevelRecord;
    conjecture: TopLevelRecord;
    axioms: RetainedAxiom[];
    lemmas: ResolvedLemma[];
}

export function renderDocument(
    parts: DocumentParts,
    resolver: DependencyResolver,
    options: LayoutOptions
): string {
    const ordered = [
        ...parts.lemmas.filter(l => !l.isConjecture),
        ...parts.lemmas.filter(l => l.isConjecture),
    ];
    const blocks = ordered.map(lemma => renderLemma(lemma, resolver, options));
    if (!ordered.some(l => l.isConjecture)) {
        const { variables } = scopedBody(parseFormula(parts.conjecture));
        blocks.push(showTemplate(variables, tacticProof(options.tactic, [])));
    }

    const theorem = theoremHeaderTemplate(parts.hypothesis.name, parts.conjecture.name, options.hypothesisName)
        + blocks.join('\n');

    return [
        PREAMBLE,
        renderSchema(parts.hypothesis),
        ...parts.axioms.map(axiom => renderRetainedAxiom(axiom, options)),
        renderSchema(parts.conjecture),
        theorem,
    ].join('\n');
}
