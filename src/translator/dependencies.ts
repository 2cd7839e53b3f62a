/**
 * Dependency Resolver
 *
 * Renumbers lemmas to lemma_1, lemma_2, ... in discovery order, gives every
 * inline axiom that the proof still relies on a synthesized name
 * (axiom1, axiom2, ...) and rewrites dependency tokens to those names.
 */
import type { DependencyToken, ResolvedLemma, RetainedAxiom } from '../types/transcript.js';
import type { ResolvedTranslateOptions } from '../types/options.js';
import { DEFAULTS } from '../types/options.js';
import { createMissingDependencyError } from '../types/errors.js';
import { TranslationContext } from './context.js';

export interface Resolution {
    lemmas: ResolvedLemma[];
    axioms: RetainedAxiom[];
    /** Source -> canonical name for every renamed lemma and axiom */
    nameMapping: Map<string, string>;
}

export class DependencyResolver {
    private lemmaNames = new Map<string, string>();
    private axiomNames = new Map<string, string>();
    /** Every inline axiom of the transcript, retained or not */
    private declaredAxioms = new Set<string>();
    private hypothesisName: string;

    constructor(hypothesisName: string = DEFAULTS.hypothesisName) {
        this.hypothesisName = hypothesisName;
    }

    /**
     * Inline axioms referenced by proofs and not re-derived as lemmas,
     * named in sorted order of their source tokens
     */
    retainAxioms(context: TranslationContext): RetainedAxiom[] {
        const retained: RetainedAxiom[] = [];
        for (const name of context.axioms.keys()) {
            this.declaredAxioms.add(name);
        }
        const candidates = [...context.usedReferences]
            .sort()
            .filter(ref => ref !== DEFAULTS.hypothesisToken && !context.lemmas.has(ref));

        for (const ref of candidates) {
            const axiom = context.axioms.get(ref);
            if (!axiom) {
                throw createMissingDependencyError(ref, 'referenced in a proof but never declared as an Axiom');
            }
            const name = `axiom${retained.length + 1}`;
            this.axiomNames.set(ref, name);
            retained.push({ sourceName: ref, name, expression: axiom.expression });
        }
        return retained;
    }

    /**
     * Canonical lemma names in discovery order; the conjecture keeps its own
     */
    renumberLemmas(context: TranslationContext): void {
        let counter = 1;
        for (const name of context.lemmas.keys()) {
            this.lemmaNames.set(name, context.isConjectureName(name) ? name : `lemma_${counter++}`);
        }
    }

    /**
     * Canonical name for a source token. A declared inline axiom that was
     * not retained keeps its source token. Throws when nothing matches.
     */
    resolve(name: string, context?: string): string {
        const lemma = this.lemmaNames.get(name);
        if (lemma !== undefined) {
            return lemma;
        }
        const axiom = this.axiomNames.get(name);
        if (axiom !== undefined) {
            return axiom;
        }
        if (name === DEFAULTS.hypothesisToken) {
            return this.hypothesisName;
        }
        if (this.declaredAxioms.has(name)) {
            return name;
        }
        throw createMissingDependencyError(name, context);
    }

    resolveToken(token: DependencyToken, context?: string): string {
        switch (token.kind) {
            case 'hypothesis':
                return this.hypothesisName;
            case 'lemma': {
                // "by lemma N" can only name a proof block
                const lemma = this.lemmaNames.get(token.name);
                if (lemma === undefined) {
                    throw createMissingDependencyError(token.name, context);
                }
                return lemma;
            }
            default:
                return this.resolve(token.name, context);
        }
    }

    get nameMapping(): Map<string, string> {
        return new Map([...this.axiomNames, ...this.lemmaNames]);
    }
}

/**
 * Finalization pass over a fully segmented context
 */
export function resolveDependencies(
    context: TranslationContext,
    options: Pick<ResolvedTranslateOptions, 'hypothesisName'>,
    resolver: DependencyResolver = new DependencyResolver(options.hypothesisName)
): Resolution {
    const axioms = resolver.retainAxioms(context);
    resolver.renumberLemmas(context);

    const lemmas: ResolvedLemma[] = [];
    for (const record of context.lemmas.values()) {
        lemmas.push({
            sourceName: record.name,
            name: resolver.resolve(record.name),
            expression: record.expression,
            dependencies: record.dependencies.map(d =>
                resolver.resolveToken(d, `dependency of ${record.name} (line ${record.line})`)),
            proof: context.proofs.get(record.name),
            isConjecture: context.isConjectureName(record.name),
        });
    }

    return { lemmas, axioms, nameMapping: resolver.nameMapping };
}
