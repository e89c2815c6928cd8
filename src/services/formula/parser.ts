import type {
   ArithmeticOperator,
   CallArgument,
   CallNode,
   ComparisonLink,
   ComparisonOperator,
   FormulaNode,
   ListNode,
   Token,
   TokenKind,
} from '@/types/formulaTypes';
import { FormulaError, FormulaSyntaxError, FormulaValueError } from './errors';
import { FUNCTIONS, isFunctionName } from './functions';
import { tokenize } from './tokenizer';



const COMPARISON_OPERATORS: readonly ComparisonOperator[] = ['<=', '>=', '==', '<', '>'];
const ADDITIVE: readonly ArithmeticOperator[] = ['+', '-'];
const MULTIPLICATIVE: readonly ArithmeticOperator[] = ['*', '/', '//', '%'];
const SIGNS = ['+', '-'] as const;

// words that would start a construct outside the formula language
const RESERVED = new Set([
   'lambda', 'and', 'or', 'not', 'if', 'else', 'for', 'in', 'is', 'None',
   'def', 'class', 'import', 'return', 'yield', 'await',
]);

export const LIST_LITERAL_MESSAGE =
   'List literals are only allowed inside LINEST, INTERCEPT, RSQ, CORREL, STDEV, STDEVP, MEDIAN and PLOT';


/**
 * Recursive descent over the allow-listed grammar:
 *
 *    formula    := additive (cmp additive)*
 *    additive   := term (('+' | '-') term)*
 *    term       := unary (('*' | '/' | '//' | '%') unary)*
 *    unary      := ('+' | '-') unary | power
 *    power      := atom ('**' unary)?
 *    atom       := number | bool | name | name '(' args ')' | '(' formula ')'
 *
 * Anything else is rejected where it is met, so no node outside the union above
 * can ever be produced.
 */
class Parser {
   private pos = 0;

   constructor(private readonly tokens: Token[]) {}

   parseFormula(): FormulaNode {
      const node = this.comparison();
      const t = this.peek();
      if (t.kind !== 'eof') throw this.unexpected(t);
      return node;
   }

   private peek(): Token {
      return this.tokens[this.pos];
   }

   private next(): Token {
      const t = this.tokens[this.pos];
      if (t.kind !== 'eof') this.pos++;
      return t;
   }

   private takeOperator<T extends string>(ops: readonly T[]): T | undefined {
      const t = this.peek();
      if (t.kind !== 'operator') return undefined;
      const op = ops.find((o) => o === t.text);
      if (op !== undefined) this.pos++;
      return op;
   }

   private expect(kind: TokenKind, what: string): Token {
      const t = this.peek();
      if (t.kind !== kind) throw this.unexpected(t, what);
      return this.next();
   }

   private unexpected(t: Token, expected?: string): FormulaError {
      switch (t.kind) {
         case 'eof':
            return new FormulaSyntaxError(
               `Unexpected end of formula${expected ? `, expected ${expected}` : ''}`, t.position
            );
         case 'dot':
            return new FormulaValueError('Attribute access is not allowed', t.position);
         case 'lbracket':
            return new FormulaValueError(LIST_LITERAL_MESSAGE, t.position);
         case 'lbrace':
            return new FormulaValueError('Dict and set literals are not allowed', t.position);
         case 'string':
            return new FormulaValueError('Only numeric constants allowed', t.position);
         case 'operator':
            if (t.text === '!=') return new FormulaValueError('Disallowed comparison: !=', t.position);
            break;
         case 'identifier':
            if (RESERVED.has(t.text)) {
               return new FormulaValueError(`'${t.text}' is not allowed in formulas`, t.position);
            }
            break;
      }
      return new FormulaSyntaxError(
         `Unexpected '${t.text}' at position ${t.position}${expected ? `, expected ${expected}` : ''}`,
         t.position
      );
   }

   private comparison(): FormulaNode {
      const left = this.additive();
      const links: ComparisonLink[] = [];
      for (let op = this.takeOperator(COMPARISON_OPERATORS); op; op = this.takeOperator(COMPARISON_OPERATORS)) {
         links.push({ operator: op, right: this.additive() });
      }
      return links.length ? { kind: 'comparison', left, links } : left;
   }

   private additive(): FormulaNode {
      let left = this.term();
      for (let op = this.takeOperator(ADDITIVE); op; op = this.takeOperator(ADDITIVE)) {
         left = { kind: 'binary', operator: op, left, right: this.term() };
      }
      return left;
   }

   private term(): FormulaNode {
      let left = this.unary();
      for (let op = this.takeOperator(MULTIPLICATIVE); op; op = this.takeOperator(MULTIPLICATIVE)) {
         left = { kind: 'binary', operator: op, left, right: this.unary() };
      }
      return left;
   }

   private unary(): FormulaNode {
      const sign = this.takeOperator(SIGNS);
      if (sign) return { kind: 'unary', operator: sign, operand: this.unary() };
      return this.power();
   }

   // right-associative; binds tighter than a leading sign (-2**2 == -4)
   private power(): FormulaNode {
      const base = this.postfix();
      if (this.takeOperator(['**'])) {
         return { kind: 'binary', operator: '**', left: base, right: this.unary() };
      }
      return base;
   }

   private postfix(): FormulaNode {
      const node = this.atom();
      const t = this.peek();
      if (t.kind === 'lbracket') throw new FormulaValueError('Subscripts are not allowed', t.position);
      if (t.kind === 'lparen') throw new FormulaValueError('Only simple function calls allowed', t.position);
      if (t.kind === 'dot') throw this.unexpected(t);
      return node;
   }

   private atom(): FormulaNode {
      const t = this.peek();
      switch (t.kind) {
         case 'number': {
            this.next();
            return { kind: 'number', value: Number(t.text) };
         }
         case 'identifier': {
            if (RESERVED.has(t.text)) throw this.unexpected(t);
            this.next();
            const lower = t.text.toLowerCase();
            if (lower === 'true' || lower === 'false') return { kind: 'boolean', value: lower === 'true' };
            if (this.peek().kind === 'lparen') return this.call(t);
            return { kind: 'identifier', name: t.text };
         }
         case 'lparen': {
            this.next();
            const inner = this.comparison();
            this.expect('rparen', "')'");
            return inner;
         }
         default:
            throw this.unexpected(t);
      }
   }

   private call(nameToken: Token): CallNode {
      const lower = nameToken.text.toLowerCase();
      if (!isFunctionName(lower)) {
         throw new FormulaValueError(`Disallowed function: ${nameToken.text}`, nameToken.position);
      }
      const takesLists = FUNCTIONS[lower].kind !== 'scalar';
      this.expect('lparen', "'('");
      const args: CallArgument[] = [];
      if (this.peek().kind !== 'rparen') {
         args.push(this.argument(takesLists));
         while (this.peek().kind === 'comma') {
            this.next();
            args.push(this.argument(takesLists));
         }
      }
      this.expect('rparen', "')'");
      return { kind: 'call', callee: lower, args };
   }

   private argument(allowList: boolean): CallArgument {
      const t = this.peek();
      if (t.kind !== 'lbracket') return this.comparison();
      if (!allowList) throw new FormulaValueError(LIST_LITERAL_MESSAGE, t.position);
      this.next();
      const list: ListNode = { kind: 'list', items: [] };
      if (this.peek().kind !== 'rbracket') {
         list.items.push(this.comparison());
         while (this.peek().kind === 'comma') {
            this.next();
            list.items.push(this.comparison());
         }
      }
      this.expect('rbracket', "']'");
      return list;
   }
}


/**
 * Parses formula text (Excel-like: `^` is power, function names in any case).
 *
 * @throws FormulaValueError on empty text or a disallowed construct
 * @throws FormulaSyntaxError on malformed text (e.g. `"val1 + "`)
 */
export function parseEquation(text: string | null | undefined): FormulaNode {
   const src = (text ?? '').trim();
   if (!src) throw new FormulaValueError('Equation is empty');
   return new Parser(tokenize(src)).parseFormula();
}
