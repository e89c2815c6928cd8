import type { LookupPayload } from './calibrationTypes';



export type ApiOk<T> = {
   ok: true;
   data: T
};
export type ApiErr = {
   ok: false;
   error: string
};
export type ApiResponse<T> = ApiOk<T> | ApiErr;



// Tolerances
export type TolFixed = {
   kind: 'fixed';
   tolerance: number
};
export type TolPercent = {
   kind: 'percent';
   percent: number
};
export type TolEquation = {
   kind: 'equation';
   equation: string
};
export type TolLookup = {
   kind: 'lookup';
   table: LookupPayload
};
export type TolBool = {
   kind: 'bool';
   passWhen: boolean
};
export type ToleranceSpec = TolFixed | TolPercent | TolEquation | TolLookup | TolBool;
