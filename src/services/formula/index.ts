import type { Bindings } from '@/types/formulaTypes';
import { containsComparison, collectIdentifiers } from './ast';
import { ALLOWED_VARIABLES, withValAliases } from './bindings';
import { FormulaError } from './errors';
import { evaluate } from './evaluator';
import { parseEquation } from './parser';

export { parseEquation, LIST_LITERAL_MESSAGE } from './parser';
export { evaluate, compare } from './evaluator';
export { ALLOWED_VARIABLES, VariableMap, aliasOf, withValAliases } from './bindings';
export { FormulaError, FormulaSyntaxError, FormulaValueError, errorMessage } from './errors';
export { parsePlotEquation, evaluatePlotEquation } from './plot';
export { containsComparison, collectIdentifiers, walkFormula } from './ast';



/** Parse, fill ref/val aliases, evaluate. Throws FormulaError. */
export function evaluateToleranceEquation(text: string | null | undefined, vars: Bindings): number {
   return evaluate(parseEquation(text), withValAliases(vars));
}

/** Identifiers in first-occurrence order. Unparsable → []. */
export function listVariables(text: string | null | undefined): string[] {
   try {
      return collectIdentifiers(parseEquation(text));
   } catch (e) {
      if (e instanceof FormulaError) return [];
      throw e;
   }
}

export function validateEquationVariables(text: string | null | undefined): { ok: boolean; unknown: string[] } {
   const unknown = listVariables(text).filter((name) => !ALLOWED_VARIABLES.has(name));
   return { ok: unknown.length === 0, unknown };
}

/** Save gate for equation tolerances: must parse and compare something. */
export function equationHasPassFailCondition(text: string | null | undefined): boolean {
   try {
      return containsComparison(parseEquation(text));
   } catch (e) {
      if (e instanceof FormulaError) return false;
      throw e;
   }
}
