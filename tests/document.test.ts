/**
 * Lean document pieces
 */

import { renderRetainedAxiom, renderSchema } from '../src/translator/document.js';
import {
    binder,
    haveTemplate,
    quantified,
    showTemplate,
    tacticProof,
    theoremHeaderTemplate,
} from '../src/translator/templates.js';
import { parseExpression } from '../src/parser/term.js';

const layout = { maxLineLength: 80, tactic: 'duper', hypothesisName: 'op_law' };

describe('templates', () => {
    test('omits quantifier and binder for an empty scope', () => {
        expect(quantified([], 'b')).toBe('b');
        expect(binder([])).toBe('');
        expect(showTemplate([], tacticProof('duper', []))).toBe('  show _ by\n    duper [*]\n');
    });

    test('lists tactic dependencies', () => {
        expect(tacticProof('duper', ['lemma_1', 'op_law'])).toBe('    duper [lemma_1, op_law]');
    });

    test('renders a have block', () => {
        expect(haveTemplate('lemma_3', ['x0'], '(x0 ◇ x0) = x0', '    duper [*]'))
            .toBe('  have lemma_3 (x0 : G) :\n    (x0 ◇ x0) = x0 := by\n    duper [*]\n');
    });

    test('names the theorem after both schemas', () => {
        expect(theoremHeaderTemplate('Eq3', 'Eq8', 'h')).toBe(
            'theorem Equation_Eq3_implies_Equation_Eq8 (G : Type _) [Magma G]\n'
            + '    (h : Equation_Eq3 G) : Equation_Eq8 G :=\n'
        );
    });
});

describe('renderSchema', () => {
    test('strips quantifiers and normalizes variables', () => {
        const schema = renderSchema({ name: 'e7', role: 'axiom', formula: '! [Y,X] : (op(Y, X) = Y)', line: 1 });
        expect(schema).toBe('abbrev Equation_e7 (G : Type _) [Magma G] :=\n  ∀ x0 x1 : G, (x1 ◇ x0) = x1\n');
    });

    test('reports the record line on a parse error', () => {
        expect(() => renderSchema({ name: 'bad', role: 'conjecture', formula: 'op(X) = X', line: 4 }))
            .toThrow("Line 4: Expected ',' in op(...) at pos 4");
    });
});

describe('renderRetainedAxiom', () => {
    test('breaks a long body after the equals sign', () => {
        const axiom = { sourceName: 'single_lemma_1', name: 'axiom2', expression: parseExpression('op(X, Y) = op(Y, X)') };
        expect(renderRetainedAxiom(axiom, { ...layout, maxLineLength: 10 })).toBe(
            'axiom axiom2 (G : Type _) [Magma G] :\n  ∀ x0 x1 : G, (x0 ◇ x1) =\n      (x1 ◇ x0)\n'
        );
    });
});
