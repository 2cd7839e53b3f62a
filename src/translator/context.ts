import type {
    AxiomRecord,
    LemmaRecord,
    ProofBlock,
    TopLevelRecord,
} from '../types/transcript.js';
import { DEFAULTS } from '../types/options.js';

/**
 * Mutable state of one transcript translation. Every stage receives the
 * context explicitly; nothing is kept between translations.
 */
export class TranslationContext {
    hypothesis?: TopLevelRecord;
    conjecture?: TopLevelRecord;

    /** Inline axioms by source name */
    readonly axioms = new Map<string, AxiomRecord>();
    /** Lemma records in discovery order */
    readonly lemmas = new Map<string, LemmaRecord>();
    /** Proof blocks by the name of the record they prove */
    readonly proofs = new Map<string, ProofBlock>();
    /** Axiom references seen inside proof blocks */
    readonly usedReferences = new Set<string>();

    /**
     * True when a proof block of this name proves the hypothesis itself
     */
    isHypothesisName(name: string): boolean {
        return name.toLowerCase() === DEFAULTS.hypothesisToken
            || (this.hypothesis !== undefined && name === this.hypothesis.name);
    }

    isConjectureName(name: string): boolean {
        return name.startsWith('conjecture')
            || (this.conjecture !== undefined && name === this.conjecture.name);
    }

    registerLemma(record: LemmaRecord, replace: boolean): void {
        if (replace || !this.lemmas.has(record.name)) {
            this.lemmas.set(record.name, record);
        }
    }
}
