/**
 * Shared type definitions for trace2lean
 */

// Re-export error types
export {
    TranslationException,
    createParseError,
    createMissingDependencyError,
    createMissingTopLevelRecordError,
    createConfigError,
    createIoError,
    serializeTranslationError,
} from './errors.js';

export type {
    TranslationErrorCode,
    ErrorSpan,
    TranslationError,
} from './errors.js';

// Re-export term types
export { createVariable, createApply } from './term.js';

export type {
    Term,
    VariableTerm,
    ApplyTerm,
    Expression,
    Renaming,
    TermParseResult,
} from './term.js';

// Re-export transcript types
export type {
    DependencyKind,
    DependencyToken,
    TopLevelRecord,
    AxiomRecord,
    LemmaRecord,
    ProofLine,
    ProofBlock,
    ResolvedLemma,
    RetainedAxiom,
    CalcStep,
} from './transcript.js';

// Re-export options
export {
    DEFAULTS,
    LAYOUT,
    resolveTranslateOptions,
} from './options.js';

export type {
    Verbosity,
    TranslateOptions,
    ResolvedTranslateOptions,
} from './options.js';
