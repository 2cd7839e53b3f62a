/**
 * File-level commands behind the CLI
 */
import fs from 'fs';
import path from 'path';
import type { Config } from './config.js';
import type { TranslationResult } from './translator/index.js';
import type { GenerationReport } from './tptp/generator.js';
import type { DirectorySummary } from './stats/summarize.js';
import { createIoError } from './types/errors.js';
import { translateTranscript } from './translator/index.js';
import { generateProblems, loadEquationIndex, problemDirectoryFor, writeProblems } from './tptp/generator.js';
import { summarizeLogDirectory } from './stats/summarize.js';

export interface TranslateFileResult extends TranslationResult {
    outputPath: string;
}

export function readText(file: string): string {
    if (!fs.existsSync(file)) {
        throw createIoError(`Input file ${file} does not exist`, file);
    }
    return fs.readFileSync(file, 'utf-8');
}

/**
 * `<outputDir>/<input base name>.lean`, with a relative outputDir taken
 * from the current directory
 */
export function outputPathFor(inputPath: string, outputDir: string): string {
    const base = path.basename(inputPath, path.extname(inputPath));
    return path.resolve(outputDir, `${base}.lean`);
}

/**
 * Translate one transcript. The document is complete in memory before the
 * output directory or file is touched.
 */
export function translateFile(
    inputPath: string,
    config: Config,
    onProgress?: (message: string) => void
): TranslateFileResult {
    const result = translateTranscript(readText(inputPath), {
        maxLineLength: config.maxLineLength,
        tactic: config.tactic,
        hypothesisName: config.hypothesisName,
        onProgress,
    });

    const outputPath = outputPathFor(inputPath, config.outputDir);
    fs.mkdirSync(path.dirname(outputPath), { recursive: true });
    fs.writeFileSync(outputPath, result.document);
    return { ...result, outputPath };
}

export interface GenerateFileResult extends GenerationReport {
    outputDir: string;
    written: string[];
}

export function generateFromProofs(
    proofsPath: string,
    equationsDir: string,
    outputDir: string = problemDirectoryFor(proofsPath)
): GenerateFileResult {
    const proofs = readText(proofsPath);
    if (!fs.existsSync(equationsDir)) {
        throw createIoError(`Equations directory ${equationsDir} does not exist`, equationsDir);
    }
    const report = generateProblems(proofs, loadEquationIndex(equationsDir));
    const written = writeProblems(report, outputDir);
    return { ...report, outputDir, written };
}

export function summarizeLogs(logDir: string): DirectorySummary {
    if (!fs.existsSync(logDir)) {
        throw createIoError(`Log directory ${logDir} does not exist`, logDir);
    }
    return summarizeLogDirectory(logDir);
}
