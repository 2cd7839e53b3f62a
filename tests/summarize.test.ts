/**
 * Prover log statistics
 */

import { parseLog, parseLogLine, summarize } from '../src/stats/summarize.js';
import { formatDirectorySummary, formatSummary } from '../src/utils/formatting.js';

describe('parseLogLine', () => {
    test('reads both counts', () => {
        expect(parseLogLine('Equation1: Vampire: 20 Minimized: 12')).toEqual({ vampire: 20, minimized: 12 });
    });

    test('uses the prover count when minimization is N/A', () => {
        expect(parseLogLine('Vampire: 7 Minimized: N/A')).toEqual({ vampire: 7, minimized: 7 });
    });

    test('ignores other lines', () => {
        expect(parseLogLine('timeout')).toBeUndefined();
    });
});

describe('summarize', () => {
    const entries = parseLog('Vampire: 20 Minimized: 12\nVampire: 10 Minimized: 10\nnoise\nVampire: 30 Minimized: N/A');

    test('averages all entries', () => {
        const { all } = summarize(entries);
        expect(all.count).toBe(3);
        expect(all.avgVampire).toBe(20);
        expect(all.avgMinimized).toBeCloseTo(17.333, 3);
    });

    test('averages entries at or above the threshold', () => {
        expect(summarize(entries, 15).aboveThreshold).toEqual({ count: 2, avgVampire: 25, avgMinimized: 21 });
        expect(summarize(entries, 10).aboveThreshold.count).toBe(3);
    });

    test('reports zeros for no entries', () => {
        expect(summarize([])).toEqual({
            all: { count: 0, avgVampire: 0, avgMinimized: 0 },
            aboveThreshold: { count: 0, avgVampire: 0, avgMinimized: 0 },
        });
    });

    test('formats a section', () => {
        expect(formatSummary('a.log', summarize(entries, 15), 15)).toBe([
            '=== a.log ===',
            'ALL:',
            '  Count: 3',
            '  Avg Vampire:   20.00',
            '  Avg Minimized: 17.33',
            'VAMPIRE >= 15:',
            '  Count: 2',
            '  Avg Vampire:   25.00',
            '  Avg Minimized: 21.00',
        ].join('\n'));
    });

    test('formats a directory report with the overall section last', () => {
        const summary = summarize(entries, 15);
        const text = formatDirectorySummary({
            threshold: 15,
            files: [{ file: 'a.log', summary }],
            overall: summary,
        });
        expect(text.startsWith('\n=== a.log ===\n')).toBe(true);
        expect(text).toContain('\n\n=== OVERALL SUMMARY (ALL FILES) ===\nALL:\n  Count: 3\n');
    });
});
