/**
 * Prover log statistics
 *
 * Averages the proof lengths reported as `Vampire: <n> Minimized: <m>`,
 * over every entry and over the entries at or above a length threshold.
 */
import fs from 'fs';
import path from 'path';
import { DEFAULTS } from '../types/options.js';

const LOG_LINE = /Vampire:\s+(\d+)\s+Minimized:\s+(N\/A|\d+)/;

export interface LogEntry {
    vampire: number;
    /** Equal to `vampire` when the log reports N/A */
    minimized: number;
}

export interface SummaryStats {
    count: number;
    avgVampire: number;
    avgMinimized: number;
}

export interface Summary {
    all: SummaryStats;
    aboveThreshold: SummaryStats;
}

export interface FileSummary {
    file: string;
    summary: Summary;
}

export interface DirectorySummary {
    threshold: number;
    files: FileSummary[];
    overall: Summary;
}

export function parseLogLine(line: string): LogEntry | undefined {
    const match = LOG_LINE.exec(line);
    if (!match) {
        return undefined;
    }
    const vampire = Number(match[1]);
    return { vampire, minimized: match[2] === 'N/A' ? vampire : Number(match[2]) };
}

export function parseLog(text: string): LogEntry[] {
    const entries: LogEntry[] = [];
    for (const line of text.split(/\r?\n/)) {
        const entry = parseLogLine(line);
        if (entry) {
            entries.push(entry);
        }
    }
    return entries;
}

function stats(entries: LogEntry[]): SummaryStats {
    if (entries.length === 0) {
        return { count: 0, avgVampire: 0, avgMinimized: 0 };
    }
    const sum = (f: (e: LogEntry) => number) => entries.reduce((acc, e) => acc + f(e), 0);
    return {
        count: entries.length,
        avgVampire: sum(e => e.vampire) / entries.length,
        avgMinimized: sum(e => e.minimized) / entries.length,
    };
}

export function summarize(entries: LogEntry[], threshold: number = DEFAULTS.summaryThreshold): Summary {
    return {
        all: stats(entries),
        aboveThreshold: stats(entries.filter(e => e.vampire >= threshold)),
    };
}

/**
 * Summarize every `.log` file of a directory, in file name order
 */
export function summarizeLogDirectory(dir: string, threshold: number = DEFAULTS.summaryThreshold): DirectorySummary {
    const files: FileSummary[] = [];
    const everything: LogEntry[] = [];

    for (const file of fs.readdirSync(dir).filter(f => f.endsWith('.log')).sort()) {
        const entries = parseLog(fs.readFileSync(path.join(dir, file), 'utf-8'));
        everything.push(...entries);
        files.push({ file, summary: summarize(entries, threshold) });
    }

    return { threshold, files, overall: summarize(everything, threshold) };
}
