export type Verbosity = 'minimal' | 'standard' | 'detailed';

export interface TranslateOptions {
    /** Budget for one rendered equation or term side */
    maxLineLength?: number;
    /** Tactic closing every calc step and unproved lemma */
    tactic?: string;
    /** Name bound to the hypothesis in the theorem header */
    hypothesisName?: string;
    /**
     * Callback for progress updates, one message per pipeline stage.
     */
    onProgress?: (message: string) => void;
}

export type ResolvedTranslateOptions = Required<Omit<TranslateOptions, 'onProgress'>>
    & Pick<TranslateOptions, 'onProgress'>;

export const DEFAULTS = {
    maxLineLength: 80,
    tactic: 'duper',
    hypothesisName: 'op_law',
    hypothesisToken: 'a1',
    outputDir: 'lean/Proof',
    verbosity: 'standard',
    summaryThreshold: 15,
} as const;

/**
 * Fixed indents of the emitted Lean text
 */
export const LAYOUT = {
    /** Continuation of a calc step and its tactic line */
    stepIndent: '        ',
    /** Between consecutive calc steps */
    stepSeparator: '\n      ',
    /** Right side of a broken lemma or axiom body */
    bodyBreakIndent: '      ',
} as const;

export function resolveTranslateOptions(options: TranslateOptions = {}): ResolvedTranslateOptions {
    return {
        maxLineLength: options.maxLineLength ?? DEFAULTS.maxLineLength,
        tactic: options.tactic ?? DEFAULTS.tactic,
        hypothesisName: options.hypothesisName ?? DEFAULTS.hypothesisName,
        onProgress: options.onProgress,
    };
}
