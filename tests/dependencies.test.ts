/**
 * Lemma renumbering and axiom retention
 */

import { DependencyResolver, resolveDependencies } from '../src/translator/dependencies.js';
import { TranslationContext } from '../src/translator/context.js';
import { segmentTranscript } from '../src/translator/segmenter.js';
import { DEPENDENCY_HINT_ONLY, SINGLE_STEP, WITH_LEMMAS } from './fixtures.js';

describe('resolveDependencies', () => {
    test('needs no retained axiom when only the hypothesis is cited', () => {
        const ctx = segmentTranscript(SINGLE_STEP, new TranslationContext());
        const resolution = resolveDependencies(ctx, { hypothesisName: 'op_law' });

        expect(resolution.axioms).toEqual([]);
        expect(resolution.lemmas.map(l => [l.name, l.dependencies, l.isConjecture])).toEqual([
            ['conjecture0', ['op_law'], true],
        ]);
    });

    test('renumbers lemmas and retains cited inline axioms', () => {
        const ctx = segmentTranscript(WITH_LEMMAS, new TranslationContext());
        const resolution = resolveDependencies(ctx, { hypothesisName: 'op_law' });

        expect(resolution.axioms.map(a => [a.sourceName, a.name])).toEqual([['history_lemma_7', 'axiom1']]);
        expect(resolution.lemmas.map(l => [l.sourceName, l.name, l.dependencies])).toEqual([
            ['single_lemma_2', 'lemma_1', ['axiom1', 'op_law']],
            ['Lemma_4', 'lemma_2', ['axiom1']],
            ['conjecture0', 'conjecture0', ['lemma_2', 'op_law']],
        ]);
        expect([...resolution.nameMapping]).toEqual([
            ['history_lemma_7', 'axiom1'],
            ['single_lemma_2', 'lemma_1'],
            ['Lemma_4', 'lemma_2'],
            ['conjecture0', 'conjecture0'],
        ]);
    });

    test('attaches proof blocks to the lemmas they prove', () => {
        const ctx = segmentTranscript(WITH_LEMMAS, new TranslationContext());
        const { lemmas } = resolveDependencies(ctx, { hypothesisName: 'op_law' });
        expect(lemmas.map(l => l.proof !== undefined)).toEqual([false, true, true]);
    });
});

describe('DependencyResolver', () => {
    test('maps the hypothesis token to the configured name', () => {
        expect(new DependencyResolver('h').resolve('a1')).toBe('h');
    });

    test('throws for an unknown token', () => {
        expect(() => new DependencyResolver().resolve('single_lemma_8', 'line 9'))
            .toThrow("Dependency 'single_lemma_8' does not resolve to a lemma, axiom or the hypothesis");
    });

    test('throws for a cited axiom that was never declared', () => {
        const ctx = new TranslationContext();
        ctx.usedReferences.add('single_lemma_9');
        expect(() => new DependencyResolver().retainAxioms(ctx))
            .toThrow("Dependency 'single_lemma_9' does not resolve to a lemma, axiom or the hypothesis");
    });

    test('keeps the token of a declared axiom that is only named in a dependency list', () => {
        const ctx = segmentTranscript(DEPENDENCY_HINT_ONLY, new TranslationContext());
        const resolution = resolveDependencies(ctx, { hypothesisName: 'op_law' });

        expect(resolution.axioms).toEqual([]);
        expect(resolution.lemmas.map(l => [l.name, l.dependencies])).toEqual([
            ['lemma_1', ['single_lemma_5', 'op_law']],
            ['conjecture0', ['op_law']],
        ]);
    });

    test('selects the lookup by dependency kind', () => {
        const ctx = segmentTranscript(WITH_LEMMAS, new TranslationContext());
        const resolver = new DependencyResolver('h');
        resolveDependencies(ctx, { hypothesisName: 'h' }, resolver);

        expect(resolver.resolveToken({ kind: 'hypothesis', name: 'a1' })).toBe('h');
        expect(resolver.resolveToken({ kind: 'lemma', name: 'Lemma_4' })).toBe('lemma_2');
        expect(resolver.resolveToken({ kind: 'history', name: 'history_lemma_7' })).toBe('axiom1');
        expect(() => resolver.resolveToken({ kind: 'lemma', name: 'history_lemma_7' }))
            .toThrow("Dependency 'history_lemma_7' does not resolve to a lemma, axiom or the hypothesis");
    });

    test('drops references that are lemmas', () => {
        const ctx = segmentTranscript(WITH_LEMMAS, new TranslationContext());
        ctx.usedReferences.add('single_lemma_2');
        const retained = new DependencyResolver().retainAxioms(ctx);
        expect(retained.map(a => a.name)).toEqual(['axiom1']);
    });
});
