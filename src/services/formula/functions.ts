import type { FunctionName } from '@/types/formulaTypes';
import { FormulaValueError } from './errors';



/* ---------- statistics (degenerate input → 0, like the spreadsheet they mimic) ---------- */
const sum = (xs: number[]) => xs.reduce((acc, x) => acc + x, 0);
const mean = (xs: number[]) => sum(xs) / xs.length;
const pairable = (ys: number[], xs: number[]) => ys.length > 0 && ys.length === xs.length;

/** Least-squares slope of y = mx + b. */
export const linest = (ys: number[], xs: number[]): number => {
   if (!pairable(ys, xs)) return 0;
   const n = ys.length;
   const sumX = sum(xs);
   const sumY = sum(ys);
   const sumXX = sum(xs.map((x) => x * x));
   const sumXY = sum(xs.map((x, i) => x * ys[i]));
   const denominator = n * sumXX - sumX * sumX;
   if (denominator === 0) return 0;
   return (n * sumXY - sumX * sumY) / denominator;
};

export const intercept = (ys: number[], xs: number[]): number => {
   if (!pairable(ys, xs)) return 0;
   return mean(ys) - linest(ys, xs) * mean(xs);
};

/** Coefficient of determination; a flat y series fits perfectly (1). */
export const rsq = (ys: number[], xs: number[]): number => {
   if (!pairable(ys, xs)) return 0;
   const meanY = mean(ys);
   const slope = linest(ys, xs);
   const b = intercept(ys, xs);
   const ssTot = sum(ys.map((y) => (y - meanY) ** 2));
   if (ssTot === 0) return 1;
   const ssRes = sum(ys.map((y, i) => (y - (slope * xs[i] + b)) ** 2));
   return 1 - ssRes / ssTot;
};

/** Pearson correlation. */
export const correl = (ys: number[], xs: number[]): number => {
   if (!pairable(ys, xs)) return 0;
   const n = ys.length;
   const sumX = sum(xs);
   const sumY = sum(ys);
   const sumXX = sum(xs.map((x) => x * x));
   const sumYY = sum(ys.map((y) => y * y));
   const sumXY = sum(xs.map((x, i) => x * ys[i]));
   const denom = (n * sumXX - sumX * sumX) * (n * sumYY - sumY * sumY);
   if (denom <= 0) return 0;
   return (n * sumXY - sumX * sumY) / Math.sqrt(denom);
};

/** Sample standard deviation (n − 1). */
export const stdev = (values: number[]): number => {
   if (values.length < 2) return 0;
   const m = mean(values);
   return Math.sqrt(sum(values.map((x) => (x - m) ** 2)) / (values.length - 1));
};

/** Population standard deviation (n). */
export const stdevp = (values: number[]): number => {
   if (values.length === 0) return 0;
   const m = mean(values);
   return Math.sqrt(sum(values.map((x) => (x - m) ** 2)) / values.length);
};

export const median = (values: number[]): number => {
   if (values.length === 0) return 0;
   const sorted = [...values].sort((a, b) => a - b);
   const mid = Math.floor(sorted.length / 2);
   return sorted.length % 2 === 1 ? sorted[mid] : (sorted[mid - 1] + sorted[mid]) / 2;
};


/* ---------- scalar helpers ---------- */
export const average = (values: number[]): number => (values.length ? mean(values) : 0);

/** Half-to-even rounding, optionally to `digits` decimals. */
export const roundHalfEven = (value: number, digits = 0): number => {
   const factor = 10 ** digits;
   const scaled = value * factor;
   const isHalf = Math.abs(scaled % 1) === 0.5;
   const rounded = isHalf ? 2 * Math.round(scaled / 2) : Math.round(scaled);
   return rounded / factor;
};




/* ---------- registry ---------- */
type ScalarFunction = {
   kind: 'scalar';
   minArgs: number;
   maxArgs: number;
   apply: (args: number[]) => number;
};
type ListFunction = {
   kind: 'list';
   lists: 1 | 2;
   usage: string;                            // shown in argument errors
   apply: (lists: number[][]) => number;
};
type PlotFunction = {
   kind: 'plot';
};
export type FunctionSpec = ScalarFunction | ListFunction | PlotFunction;

const twoLists = (fn: (ys: number[], xs: number[]) => number) => (lists: number[][]) => fn(lists[0], lists[1]);
const oneList = (fn: (values: number[]) => number) => (lists: number[][]) => fn(lists[0]);

export const FUNCTIONS: Readonly<Record<FunctionName, FunctionSpec>> = {
   abs:       { kind: 'scalar', minArgs: 1, maxArgs: 1, apply: ([x]) => Math.abs(x) },
   min:       { kind: 'scalar', minArgs: 1, maxArgs: Infinity, apply: (xs) => Math.min(...xs) },
   max:       { kind: 'scalar', minArgs: 1, maxArgs: Infinity, apply: (xs) => Math.max(...xs) },
   round:     { kind: 'scalar', minArgs: 1, maxArgs: 2, apply: ([x, digits = 0]) => {
      if (!Number.isInteger(digits)) throw new FormulaValueError('ROUND digits must be a whole number');
      return roundHalfEven(x, digits);
   } },
   average:   { kind: 'scalar', minArgs: 0, maxArgs: Infinity, apply: average },
   linest:    { kind: 'list', lists: 2, usage: "[known_y's], [known_x's], e.g. LINEST([val1,val2], [ref1,ref2])", apply: twoLists(linest) },
   intercept: { kind: 'list', lists: 2, usage: "[known_y's], [known_x's]", apply: twoLists(intercept) },
   rsq:       { kind: 'list', lists: 2, usage: "[known_y's], [known_x's]", apply: twoLists(rsq) },
   correl:    { kind: 'list', lists: 2, usage: "[known_y's], [known_x's]", apply: twoLists(correl) },
   stdev:     { kind: 'list', lists: 1, usage: '[val1, val2, ...], e.g. STDEV([val1, val2, val3])', apply: oneList(stdev) },
   stdevp:    { kind: 'list', lists: 1, usage: '[val1, val2, ...]', apply: oneList(stdevp) },
   median:    { kind: 'list', lists: 1, usage: '[val1, val2, ...]', apply: oneList(median) },
   plot:      { kind: 'plot' },
};

export const isFunctionName = (name: string): name is FunctionName => Object.hasOwn(FUNCTIONS, name);
