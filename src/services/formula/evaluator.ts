import type {
   ArithmeticOperator,
   Bindings,
   CallArgument,
   CallNode,
   ComparisonOperator,
   FormulaNode,
   ListNode,
} from '@/types/formulaTypes';
import { FormulaValueError } from './errors';
import { FUNCTIONS } from './functions';



export const compare = (op: ComparisonOperator, a: number, b: number): boolean => {
   switch (op) {
      case '<': return a < b;
      case '>': return a > b;
      case '<=': return a <= b;
      case '>=': return a >= b;
      case '==': return a === b;
      default: {
         const never: never = op;
         throw new FormulaValueError(`Disallowed comparison: ${String(never)}`);
      }
   }
};

const divisor = (b: number): number => {
   if (b === 0) throw new FormulaValueError('Division by zero');
   return b;
};

const arithmetic = (op: ArithmeticOperator, a: number, b: number): number => {
   switch (op) {
      case '+': return a + b;
      case '-': return a - b;
      case '*': return a * b;
      case '/': return a / divisor(b);
      case '//': return Math.floor(a / divisor(b));
      case '%': return a - divisor(b) * Math.floor(a / b);     // sign follows the divisor
      case '**':
         if (a === 0 && b < 0) throw new FormulaValueError('Division by zero');
         return a ** b;
      default: {
         const never: never = op;
         throw new FormulaValueError(`Disallowed operator: ${String(never)}`);
      }
   }
};

const finite = (value: number, what: string): number => {
   if (!Number.isFinite(value)) throw new FormulaValueError(`${what} is not a finite number`);
   return value;
};

const isList = (arg: CallArgument): arg is ListNode => arg.kind === 'list';


const applyCall = (node: CallNode, vars: Bindings): number => {
   const spec = FUNCTIONS[node.callee];
   const name = node.callee.toUpperCase();

   switch (spec.kind) {
      case 'scalar': {
         const count = node.args.length;
         if (count < spec.minArgs || count > spec.maxArgs) {
            const expected = spec.minArgs === spec.maxArgs
               ? `exactly ${spec.minArgs}`
               : spec.maxArgs === Infinity ? `at least ${spec.minArgs}` : `${spec.minArgs} to ${spec.maxArgs}`;
            throw new FormulaValueError(`${name} takes ${expected} argument(s), got ${count}`);
         }
         const values = node.args.map((arg) => {
            if (isList(arg)) throw new FormulaValueError(`${name} does not take a list argument`);
            return evaluate(arg, vars);
         });
         return spec.apply(values);
      }
      case 'list': {
         if (node.args.length !== spec.lists) {
            throw new FormulaValueError(`${name} requires ${spec.lists === 1 ? 'one argument' : 'two arguments'}: ${spec.usage}`);
         }
         const lists = node.args.map((arg) => {
            if (!isList(arg)) throw new FormulaValueError(`${name} arguments must be lists: ${spec.usage}`);
            return arg.items.map((item) => evaluate(item, vars));
         });
         return spec.apply(lists);
      }
      case 'plot':
         throw new FormulaValueError('PLOT describes chart data and has no numeric value');
   }
};


/**
 * Walks a parsed formula. Comparisons give 1.0 / 0.0, so a bare condition can
 * serve as a pass/fail formula.
 *
 * @throws FormulaValueError for an unsupplied variable, division by zero, a
 *         non-finite result, or a bad function call
 */
export function evaluate(node: FormulaNode, vars: Bindings): number {
   switch (node.kind) {
      case 'number':
         return node.value;
      case 'boolean':
         return node.value ? 1 : 0;
      case 'identifier': {
         const v = Object.hasOwn(vars, node.name) ? vars[node.name] : undefined;
         if (v === undefined || Number.isNaN(v)) {
            throw new FormulaValueError(`Variable '${node.name}' not provided`);
         }
         return v;
      }
      case 'unary': {
         const v = evaluate(node.operand, vars);
         return node.operator === '-' ? -v : v;
      }
      case 'binary': {
         const a = evaluate(node.left, vars);
         const b = evaluate(node.right, vars);
         return finite(arithmetic(node.operator, a, b), `Result of '${node.operator}'`);
      }
      case 'comparison': {
         let left = evaluate(node.left, vars);
         for (const link of node.links) {
            const right = evaluate(link.right, vars);
            if (!compare(link.operator, left, right)) return 0;
            left = right;
         }
         return 1;
      }
      case 'call':
         return finite(applyCall(node, vars), `Result of ${node.callee.toUpperCase()}`);
      default: {
         const never: never = node;
         throw new FormulaValueError(`Unsupported expression: ${JSON.stringify(never)}`);
      }
   }
}
