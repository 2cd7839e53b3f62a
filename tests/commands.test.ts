/**
 * File-level commands
 */

import fs from 'fs';
import os from 'os';
import path from 'path';
import { generateFromProofs, outputPathFor, summarizeLogs, translateFile } from '../src/commands.js';
import { loadConfig } from '../src/config.js';
import { CONJECTURE_FOF, SINGLE_STEP } from './fixtures.js';

describe('commands', () => {
    let dir: string;

    beforeEach(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'trace2lean-'));
    });

    afterEach(() => {
        fs.rmSync(dir, { recursive: true, force: true });
    });

    test('outputPathFor swaps the extension and directory', () => {
        expect(outputPathFor('runs/Equation3_implies_Equation8.out', '/tmp/lean'))
            .toBe(path.resolve('/tmp/lean', 'Equation3_implies_Equation8.lean'));
    });

    test('outputPathFor resolves a relative directory against the working directory', () => {
        expect(outputPathFor('runs/Equation3_implies_Equation8.out', 'lean/Proof'))
            .toBe(path.join(process.cwd(), 'lean', 'Proof', 'Equation3_implies_Equation8.lean'));
    });

    test('translateFile writes the document', () => {
        const input = path.join(dir, 'Equation1_implies_Equation2.out');
        fs.writeFileSync(input, SINGLE_STEP);
        const outputDir = path.join(dir, 'lean', 'Proof');

        const result = translateFile(input, { ...loadConfig({}), outputDir });

        expect(result.outputPath).toBe(path.resolve(outputDir, 'Equation1_implies_Equation2.lean'));
        expect(fs.readFileSync(result.outputPath, 'utf-8')).toBe(result.document);
    });

    test('translateFile leaves nothing behind on failure', () => {
        const input = path.join(dir, 'broken.out');
        fs.writeFileSync(input, SINGLE_STEP.replace(CONJECTURE_FOF, ''));
        const outputDir = path.join(dir, 'out');

        expect(() => translateFile(input, { ...loadConfig({}), outputDir })).toThrow('Missing conjecture in TPTP input');
        expect(fs.existsSync(outputDir)).toBe(false);
    });

    test('translateFile reports a missing input', () => {
        const input = path.join(dir, 'absent.out');
        expect(() => translateFile(input, loadConfig({}))).toThrow(`Input file ${input} does not exist`);
    });

    test('generateFromProofs writes one problem per known theorem', () => {
        const equations = path.join(dir, 'Equations');
        fs.mkdirSync(equations);
        fs.writeFileSync(path.join(equations, 'Eqns1.lean'), 'equation 1 := x = x\nequation 2 := x ◇ y = y ◇ x\n');
        fs.writeFileSync(path.join(equations, 'notes.lean'), 'equation 9 := x = y\n');
        const proofs = path.join(dir, 'Proofs5.lean');
        fs.writeFileSync(proofs, 'theorem Equation2_implies_Equation1 : True := trivial\ntheorem Equation2_implies_Equation9 : True := trivial\n');
        const out = path.join(dir, 'problems');

        const result = generateFromProofs(proofs, equations, out);

        expect(result.written).toEqual([path.join(out, 'Equation2_implies_Equation1.p')]);
        expect(result.skipped).toEqual(['Equation2_implies_Equation9']);
        expect(fs.readFileSync(path.join(out, 'Equation2_implies_Equation1.p'), 'utf-8')).toBe([
            'fof(a1, axiom,',
            '    ! [X0, X1] :',
            '        (op(X0,X1) = op(X1,X0))',
            ').',
            '',
            'fof(conjecture0, conjecture,',
            '    ! [X0, X1] :',
            '        (X0 = X0)',
            ').',
            '',
        ].join('\n'));
    });

    test('generateFromProofs requires the equations directory', () => {
        const proofs = path.join(dir, 'Proofs1.lean');
        fs.writeFileSync(proofs, '');
        const equations = path.join(dir, 'missing');
        expect(() => generateFromProofs(proofs, equations, dir)).toThrow(`Equations directory ${equations} does not exist`);
    });

    test('summarizeLogs reads every log file in name order', () => {
        fs.writeFileSync(path.join(dir, 'b.log'), 'Vampire: 20 Minimized: 10\n');
        fs.writeFileSync(path.join(dir, 'a.log'), 'Vampire: 4 Minimized: N/A\nskipped line\n');
        fs.writeFileSync(path.join(dir, 'notes.txt'), 'Vampire: 99 Minimized: 99\n');

        const report = summarizeLogs(dir);

        expect(report.files.map(f => [f.file, f.summary.all.count])).toEqual([['a.log', 1], ['b.log', 1]]);
        expect(report.overall.all).toEqual({ count: 2, avgVampire: 12, avgMinimized: 7 });
        expect(report.overall.aboveThreshold).toEqual({ count: 1, avgVampire: 20, avgMinimized: 10 });
    });
});
