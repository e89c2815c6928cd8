/** Base class for every formula failure; `position` is the offset in the source text, when known. */
export class FormulaError extends Error {
   readonly position?: number;

   constructor(message: string, position?: number) {
      super(message);
      this.name = 'FormulaError';
      this.position = position;
   }
}

/** Malformed grammar: the text is not a formula at all (e.g. `"1 +"`). */
export class FormulaSyntaxError extends FormulaError {
   constructor(message: string, position?: number) {
      super(message, position);
      this.name = 'FormulaSyntaxError';
   }
}

/**
 * Syntactically valid but cannot run: empty text, disallowed construct, unknown
 * function, missing variable, division by zero, bad arity or argument shape.
 */
export class FormulaValueError extends FormulaError {
   constructor(message: string, position?: number) {
      super(message, position);
      this.name = 'FormulaValueError';
   }
}

export const errorMessage = (e: unknown): string => (e instanceof Error ? e.message : String(e));
