/**
 * trace2lean - Library Entry Point
 *
 * Exports the translation pipeline for use in other projects.
 * Nothing here writes to the console or the file system except the
 * file-level commands.
 */

// Translation pipeline
export * from './translator/index.js';

// Parsers
export * from './parser/index.js';

// Rendering and variable normalization
export { renderInfix, renderPrefix, renderExpression, wrapSide, formatEquationBody } from './utils/printer.js';
export {
    canonicalOrder,
    buildRenaming,
    applyRenaming,
    normalizeVariables,
    renameTerm,
    renameExpression,
    scopeOf,
} from './utils/variables.js';

// Types and Interfaces
export * from './types/index.js';

// Configuration
export { loadConfig, ConfigSchema } from './config.js';
export type { Config, ConfigOverrides } from './config.js';

// TPTP problem generation and log statistics
export * from './tptp/generator.js';
export * from './stats/summarize.js';

// File-level commands
export { translateFile, generateFromProofs, summarizeLogs, outputPathFor } from './commands.js';
export type { TranslateFileResult, GenerateFileResult } from './commands.js';
