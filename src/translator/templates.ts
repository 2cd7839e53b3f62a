/**
 * Lean Templates
 *
 * Fixed text of the emitted proof script. Bodies passed in are already
 * renamed, rendered and wrapped.
 */

export const PREAMBLE = `import Mathlib.Tactic.NthRewrite
import Duper
open Lean Grind

class Magma (α : Type _) where
  op : α → α → α

infix:65 " ◇ " => Magma.op
`;

/**
 * `∀ x0 x1 : G, body`, or the bare body when nothing is quantified
 */
export function quantified(variables: string[], body: string): string {
    return variables.length > 0 ? `∀ ${variables.join(' ')} : G, ${body}` : body;
}

export function binder(variables: string[]): string {
    return variables.length > 0 ? ` (${variables.join(' ')} : G)` : '';
}

export function schemaName(name: string): string {
    return `Equation_${name}`;
}

export function abbrevTemplate(name: string, variables: string[], body: string): string {
    return `abbrev ${schemaName(name)} (G : Type _) [Magma G] :=
  ${quantified(variables, body)}
`;
}

export function axiomTemplate(name: string, variables: string[], body: string): string {
    return `axiom ${name} (G : Type _) [Magma G] :
  ${quantified(variables, body)}
`;
}

export function theoremHeaderTemplate(hypothesis: string, conjecture: string, hypothesisName: string): string {
    return `theorem ${schemaName(hypothesis)}_implies_${schemaName(conjecture)} (G : Type _) [Magma G]
    (${hypothesisName} : ${schemaName(hypothesis)} G) : ${schemaName(conjecture)} G :=
`;
}

export function haveTemplate(name: string, variables: string[], body: string, proof: string): string {
    return `  have ${name}${binder(variables)} :
    ${body} := by
${proof}
`;
}

export function showTemplate(variables: string[], proof: string): string {
    const intros = variables.length > 0 ? `    intros ${variables.join(' ')}\n` : '';
    return `  show _ by
${intros}${proof}
`;
}

export function calcProof(calcBlock: string): string {
    return `    calc
      ${calcBlock}`;
}

export function tacticProof(tactic: string, dependencies: string[]): string {
    const deps = dependencies.length > 0 ? `[${dependencies.join(', ')}]` : '[*]';
    return `    ${tactic} ${deps}`;
}
