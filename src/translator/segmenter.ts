/**
 * Proof-Trace Segmenter
 *
 * Splits a prover transcript into inline axioms, lemma declarations,
 * top-level fof records and proof blocks. The line classification is a
 * pure transition function over an explicit state; the Segmenter applies
 * the resulting effects to a TranslationContext.
 */
import type {
    DependencyKind,
    DependencyToken,
    ProofBlock,
    ProofLine,
    TopLevelRecord,
} from '../types/transcript.js';
import type { Expression } from '../types/term.js';
import { TranslationException } from '../types/errors.js';
import { parseExpression, stripQuantifiers } from '../parser/term.js';
import { TranslationContext } from './context.js';

export type SegmenterState = 'SCANNING_HEADER' | 'IN_PROOF_SECTION' | 'ACCUMULATING_GOAL';

export type SegmenterEffect =
    | { type: 'axiom'; name: string; expression: string }
    | { type: 'lemma'; name: string; expression: string; dependencies: string[] }
    | { type: 'openBlock'; keyword: 'Goal' | 'Lemma'; number: number; name?: string; expression: string }
    | { type: 'appendLine'; text: string; references: string[] }
    | { type: 'closeBlock' }
    | { type: 'passthrough'; text: string };

export interface Transition {
    state: SegmenterState;
    effects: SegmenterEffect[];
}

export const PROOF_MARKER = 'The conjecture is true! Here is a proof';
const LEMMA_PREFIXES = ['% single_lemma_', '% history_lemma_'];
const TERMINATOR = 'RESULT';

const AXIOM_LINE = /^Axiom\s+\d+\s+\(([^)]+)\):\s*(.*)$/;
const LEMMA_DECLARATION = /^%\s*(\S+?):\s*(.*)$/;
const BLOCK_HEADER = /^(Goal|Lemma)\s+(\d+)(?:\s*\(([^)]+)\))?\s*:\s*(.*)$/;
const REFERENCE = /\((single_lemma_\d+|history_lemma_\d+|a1)\)/g;
const LEMMA_MENTION = /by lemma (\d+)/gi;
const FOF = /fof\(\s*([^,]+?)\s*,\s*([^,]+?)\s*,([\s\S]*)\)\s*\.$/;

/**
 * Parenthesized axiom references on one proof line, in order
 */
export function findReferences(text: string): string[] {
    return [...text.matchAll(REFERENCE)].map(m => m[1]);
}

export function classifyDependency(name: string): DependencyToken {
    let kind: DependencyKind = 'named';
    if (name === 'a1') {
        kind = 'hypothesis';
    } else if (/^single_lemma_\d+$/.test(name)) {
        kind = 'single';
    } else if (/^history_lemma_\d+$/.test(name)) {
        kind = 'history';
    } else if (/^Lemma_\d+$/.test(name)) {
        kind = 'lemma';
    }
    return { kind, name };
}

/**
 * Dependencies cited anywhere in a proof block, deduplicated and sorted
 */
export function extractDependencies(lines: readonly string[]): DependencyToken[] {
    const names = new Set<string>();
    for (const line of lines) {
        for (const ref of findReferences(line)) {
            names.add(ref);
        }
        for (const m of line.matchAll(LEMMA_MENTION)) {
            names.add(`Lemma_${m[1]}`);
        }
    }
    return [...names].sort().map(classifyDependency);
}

function parseDependencyHints(text: string): string[] {
    const idx = text.indexOf('deps:');
    if (idx < 0) {
        return [];
    }
    return text.slice(idx + 'deps:'.length)
        .split(',')
        .map(d => d.split('->')[0].trim())
        .filter(d => d.length > 0);
}

/**
 * Classify one transcript line in the given state
 */
export function transition(state: SegmenterState, rawLine: string): Transition {
    const line = rawLine.trim();

    const axiom = AXIOM_LINE.exec(line);
    if (axiom) {
        return {
            state,
            effects: [{ type: 'axiom', name: axiom[1], expression: axiom[2].replace(/\.+$/, '') }],
        };
    }

    if (line.startsWith(PROOF_MARKER)) {
        return { state: state === 'SCANNING_HEADER' ? 'IN_PROOF_SECTION' : state, effects: [] };
    }

    if (LEMMA_PREFIXES.some(p => line.startsWith(p))) {
        const [body, ...rest] = line.split('|');
        const decl = LEMMA_DECLARATION.exec(body.trim());
        if (!decl) {
            return { state, effects: [] };
        }
        return {
            state,
            effects: [{
                type: 'lemma',
                name: decl[1],
                expression: decl[2].trim(),
                dependencies: parseDependencyHints(rest.join('|')),
            }],
        };
    }

    if (state !== 'SCANNING_HEADER') {
        const header = BLOCK_HEADER.exec(line);
        if (header) {
            const open: SegmenterEffect = {
                type: 'openBlock',
                keyword: header[1] === 'Goal' ? 'Goal' : 'Lemma',
                number: Number(header[2]),
                name: header[3]?.trim(),
                expression: header[4].trim(),
            };
            return {
                state: 'ACCUMULATING_GOAL',
                effects: state === 'ACCUMULATING_GOAL' ? [{ type: 'closeBlock' }, open] : [open],
            };
        }
    }

    if (state === 'ACCUMULATING_GOAL') {
        if (line.startsWith(TERMINATOR)) {
            return { state: 'IN_PROOF_SECTION', effects: [{ type: 'closeBlock' }] };
        }
        if (line && !line.startsWith('Goal') && !line.startsWith('Lemma')) {
            return { state, effects: [{ type: 'appendLine', text: line, references: findReferences(line) }] };
        }
        return { state, effects: [] };
    }

    return { state, effects: [{ type: 'passthrough', text: line }] };
}

/**
 * Parse a complete `fof(name, role, formula).` declaration
 */
export function parseFof(text: string, line: number): TopLevelRecord | undefined {
    const match = FOF.exec(text);
    if (!match) {
        return undefined;
    }
    const role = match[2];
    if (role !== 'axiom' && role !== 'conjecture') {
        return undefined;
    }
    return { name: match[1], role, formula: match[3].trim(), line };
}

/**
 * Accumulates fof declarations that span several lines
 */
export class FofCollector {
    private buffer: string = '';
    private startLine: number = 0;

    feed(text: string, line: number): TopLevelRecord | undefined {
        if (text.includes('fof(')) {
            this.buffer = text;
            this.startLine = line;
        } else if (this.buffer) {
            this.buffer += ' ' + text;
        } else {
            return undefined;
        }

        if (!this.buffer.endsWith(').')) {
            return undefined;
        }
        const complete = this.buffer;
        this.buffer = '';
        return parseFof(complete, this.startLine);
    }
}

function parseAt(text: string, line: number, source: string): Expression {
    try {
        return parseExpression(text);
    } catch (e) {
        if (e instanceof TranslationException) {
            throw e.atLine(line, source);
        }
        throw e;
    }
}

/**
 * Applies transition effects to a TranslationContext, line by line
 */
export class Segmenter {
    private context: TranslationContext;
    private state: SegmenterState = 'SCANNING_HEADER';
    private current?: ProofBlock;
    private fof = new FofCollector();

    constructor(context: TranslationContext) {
        this.context = context;
    }

    get currentState(): SegmenterState {
        return this.state;
    }

    feed(rawLine: string, lineNumber: number): void {
        const { state, effects } = transition(this.state, rawLine);
        this.state = state;
        for (const effect of effects) {
            this.apply(effect, lineNumber, rawLine.trim());
        }
    }

    /**
     * Close a block left open by a transcript without a RESULT line
     */
    finish(): void {
        this.closeBlock();
        if (this.state === 'ACCUMULATING_GOAL') {
            this.state = 'IN_PROOF_SECTION';
        }
    }

    private apply(effect: SegmenterEffect, line: number, source: string): void {
        const ctx = this.context;
        switch (effect.type) {
            case 'axiom':
                ctx.axioms.set(effect.name, {
                    name: effect.name,
                    expression: parseAt(effect.expression, line, source),
                    line,
                });
                break;
            case 'lemma':
                ctx.registerLemma({
                    name: effect.name,
                    expression: parseAt(stripQuantifiers(effect.expression), line, source),
                    dependencies: effect.dependencies.map(classifyDependency),
                    line,
                }, true);
                break;
            case 'openBlock': {
                const name = effect.name
                    ?? (effect.keyword === 'Goal' && ctx.conjecture ? ctx.conjecture.name : `Lemma_${effect.number}`);
                this.current = { name, lines: [] };
                if (!ctx.isHypothesisName(name) && !ctx.lemmas.has(name)) {
                    ctx.registerLemma({
                        name,
                        expression: parseAt(stripQuantifiers(effect.expression), line, source),
                        dependencies: [],
                        line,
                    }, false);
                }
                break;
            }
            case 'appendLine': {
                const proofLine: ProofLine = { text: effect.text, line };
                this.current?.lines.push(proofLine);
                for (const ref of effect.references) {
                    ctx.usedReferences.add(ref);
                }
                break;
            }
            case 'closeBlock':
                this.closeBlock();
                break;
            case 'passthrough': {
                const record = this.fof.feed(effect.text, line);
                if (record?.role === 'axiom') {
                    ctx.hypothesis = record;
                } else if (record?.role === 'conjecture') {
                    ctx.conjecture = record;
                }
                break;
            }
        }
    }

    private closeBlock(): void {
        const block = this.current;
        this.current = undefined;
        if (!block || block.lines.length === 0) {
            return;
        }
        const ctx = this.context;
        ctx.proofs.set(block.name, block);
        const record = ctx.lemmas.get(block.name);
        if (record) {
            ctx.lemmas.set(block.name, {
                ...record,
                dependencies: extractDependencies(block.lines.map(l => l.text)),
            });
        }
    }
}

/**
 * Scan a whole transcript into the context
 */
export function segmentTranscript(text: string, context: TranslationContext): TranslationContext {
    const segmenter = new Segmenter(context);
    text.split(/\r?\n/).forEach((line, i) => segmenter.feed(line, i + 1));
    segmenter.finish();
    return context;
}
