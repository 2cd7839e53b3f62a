/**
 * Transcript translation pipeline
 *
 * segment -> check top-level records -> resolve -> render
 */
import type { TranslateOptions } from '../types/options.js';
import { resolveTranslateOptions } from '../types/options.js';
import { createMissingTopLevelRecordError } from '../types/errors.js';
import { TranslationContext } from './context.js';
import { segmentTranscript } from './segmenter.js';
import { DependencyResolver, resolveDependencies } from './dependencies.js';
import { renderDocument } from './document.js';

export interface TranslationResult {
    document: string;
    hypothesis: string;
    conjecture: string;
    lemmaCount: number;
    retainedAxioms: string[];
    /** Source -> canonical names */
    nameMapping: Record<string, string>;
}

export function translateTranscript(text: string, options: TranslateOptions = {}): TranslationResult {
    const opts = resolveTranslateOptions(options);
    const progress = (message: string) => opts.onProgress?.(message);

    const context = segmentTranscript(text, new TranslationContext());
    progress(`Segmented ${context.axioms.size} inline axioms, ${context.lemmas.size} lemmas, ${context.proofs.size} proof blocks`);

    const { hypothesis, conjecture } = context;
    if (!hypothesis) {
        throw createMissingTopLevelRecordError('axiom');
    }
    if (!conjecture) {
        throw createMissingTopLevelRecordError('conjecture');
    }

    const resolver = new DependencyResolver(opts.hypothesisName);
    const resolution = resolveDependencies(context, opts, resolver);
    progress(`Resolved ${resolution.nameMapping.size} names, retained ${resolution.axioms.length} axioms`);

    const document = renderDocument(
        { hypothesis, conjecture, axioms: resolution.axioms, lemmas: resolution.lemmas },
        resolver,
        opts
    );
    progress(`Rendered ${document.split('\n').length} lines`);

    return {
        document,
        hypothesis: hypothesis.name,
        conjecture: conjecture.name,
        lemmaCount: resolution.lemmas.filter(l => !l.isConjecture).length,
        retainedAxioms: resolution.axioms.map(a => a.name),
        nameMapping: Object.fromEntries(resolution.nameMapping),
    };
}

export { TranslationContext } from './context.js';
export { Segmenter, FofCollector, segmentTranscript, transition, extractDependencies, PROOF_MARKER } from './segmenter.js';
export type { SegmenterState, SegmenterEffect, Transition } from './segmenter.js';
export { DependencyResolver, resolveDependencies } from './dependencies.js';
export type { Resolution } from './dependencies.js';
export { buildCalcSteps, formatCalcStep, formatCalcBlock, justificationToken } from './calc.js';
export { renderDocument, renderLemma, renderSchema, renderRetainedAxiom } from './document.js';
