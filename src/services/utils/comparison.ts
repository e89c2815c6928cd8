import type { Bindings } from "@/types/formulaTypes";
import type { ComparisonParts } from "@/types/calibrationTypes";
import { compare, evaluate, parseEquation, withValAliases, errorMessage } from "@/services/formula";
import { logger } from "@/lib/logger";



/**
 * `lhs op rhs` of a single top-level comparison, each side evaluated on its own
 * with the same bindings. Anything else (a band formula, a chain, an error) → null.
 */
export function equationToleranceDisplay(equation: string | null | undefined, vars: Bindings): ComparisonParts | null {
   if (!(equation ?? "").trim()) return null;
   try {
      const body = parseEquation(equation);
      if (body.kind !== "comparison" || body.links.length !== 1) return null;
      const [{ operator, right }] = body.links;
      const v = withValAliases(vars);
      const lhs = evaluate(body.left, v);
      const rhs = evaluate(right, v);
      return { lhs, operator, rhs, pass: compare(operator, lhs, rhs) };
   } catch (e) {
      logger.debug("TOL", `no decomposition for "${equation}":`, errorMessage(e));
      return null;
   }
}
