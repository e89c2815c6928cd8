import type { Bindings, CallArgument, PlotSeries } from '@/types/formulaTypes';
import { ENGINE } from '@/lib/config';
import { ALLOWED_VARIABLES, withValAliases } from './bindings';
import { FormulaValueError } from './errors';
import { parseEquation } from './parser';



const SHAPE = 'Plot must be PLOT([x1, x2, ...], [y1, y2, ...])';

const namesOf = (arg: CallArgument): string[] => {
   if (arg.kind !== 'list') {
      throw new FormulaValueError('PLOT arguments must be lists, e.g. PLOT([val1, val2], [val3, val4])');
   }
   return arg.items.map((item) => {
      if (item.kind !== 'identifier') {
         throw new FormulaValueError('PLOT lists must contain only variable names (val1, val2, ...)');
      }
      return item.name;
   });
};


/**
 * Structural check of `PLOT([x...], [y...])`. The chart itself is drawn elsewhere;
 * this only guarantees two equal-length lists of known variable names.
 */
export function parsePlotEquation(text: string | null | undefined): PlotSeries<string> {
   if (!(text ?? '').trim()) throw new FormulaValueError('Plot equation is empty');
   const body = parseEquation(text);
   if (body.kind !== 'call' || body.callee !== 'plot') throw new FormulaValueError(SHAPE);
   if (body.args.length !== 2) throw new FormulaValueError('PLOT requires two arguments: [x values], [y values]');

   const x = namesOf(body.args[0]);
   const y = namesOf(body.args[1]);
   if (x.length !== y.length) throw new FormulaValueError('PLOT X and Y lists must have the same length');
   const total = x.length + y.length;
   if (total === 0) throw new FormulaValueError('PLOT must have at least one point');
   if (total > ENGINE.PLOT_MAX_VARIABLES) {
      throw new FormulaValueError(`PLOT allows at most ${ENGINE.PLOT_MAX_VARIABLES} variables total (x count + y count)`);
   }
   const unknown = [...x, ...y].find((n) => !ALLOWED_VARIABLES.has(n));
   if (unknown) throw new FormulaValueError(`Unknown variable in PLOT: ${unknown}. Use val1..val12 or ref1..ref12.`);
   return { x, y };
}

/** Coordinates for the chart renderer. */
export function evaluatePlotEquation(text: string | null | undefined, vars: Bindings = {}): PlotSeries<number> {
   const v = withValAliases(vars);
   const { x, y } = parsePlotEquation(text);
   const valueOf = (name: string) => {
      const value = Object.hasOwn(v, name) ? v[name] : undefined;
      if (value === undefined) throw new FormulaValueError(`Variable '${name}' not provided for plot`);
      return value;
   };
   return { x: x.map(valueOf), y: y.map(valueOf) };
}
