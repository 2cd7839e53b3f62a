/**
 * Formatting utilities
 */
import type { DirectorySummary, Summary, SummaryStats } from '../stats/summarize.js';
import type { TranslationError } from '../types/errors.js';

function formatStats(label: string, stats: SummaryStats): string[] {
    return [
        `${label}:`,
        `  Count: ${stats.count}`,
        `  Avg Vampire:   ${stats.avgVampire.toFixed(2)}`,
        `  Avg Minimized: ${stats.avgMinimized.toFixed(2)}`,
    ];
}

/**
 * Format one summary section as human-readable text
 */
export function formatSummary(title: string, summary: Summary, threshold: number): string {
    return [
        `=== ${title} ===`,
        ...formatStats('ALL', summary.all),
        ...formatStats(`VAMPIRE >= ${threshold}`, summary.aboveThreshold),
    ].join('\n');
}

export function formatDirectorySummary(report: DirectorySummary): string {
    const sections = report.files.map(f => formatSummary(f.file, f.summary, report.threshold));
    sections.push(formatSummary('OVERALL SUMMARY (ALL FILES)', report.overall, report.threshold));
    return sections.map(s => `\n${s}`).join('\n');
}

/**
 * One-line diagnostic with location, followed by the suggestion if any
 */
export function formatTranslationError(error: TranslationError): string {
    const where = error.span ? ` (offset ${error.span.start})` : '';
    const lines = [`[${error.code}] ${error.message}${where}`];
    if (error.context) {
        lines.push(`  at: ${error.context}`);
    }
    if (error.suggestion) {
        lines.push(`  hint: ${error.suggestion}`);
    }
    return lines.join('\n');
}
