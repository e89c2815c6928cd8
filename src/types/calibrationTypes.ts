import type { FieldId } from './templateTypes';







/* ──────────────────────────────────────────────────────────────────────────────
   Record values
────────────────────────────────────────────────────────────────────────────── */
/** Always text: bool "0"/"1", dates ISO, numbers possibly unit-suffixed. */
export interface CalibrationValue {
   fieldId: FieldId;
   valueText: string;
}

/** External instrument registry, used by reference_cal_date fields. */
export interface InstrumentLookup {
   lastCalDate(idOrTag: string): string | null | undefined;
}





/* ──────────────────────────────────────────────────────────────────────────────
   Lookup tables
────────────────────────────────────────────────────────────────────────────── */
export interface LookupRange {
   rangeLow: number;
   rangeHigh: number;
   tolerance: number;
}

/** Stored JSON text (`[{"range_low", "range_high", "tolerance"}]`) or already-parsed rows. */
export type LookupPayload = string | readonly unknown[] | null | undefined;





/* ──────────────────────────────────────────────────────────────────────────────
   Results
────────────────────────────────────────────────────────────────────────────── */
export type Verdict = 'pass' | 'fail';

export interface ToleranceResult {
   pass: boolean;
   toleranceUsed: number;
   explanation: string;
}

export interface ComparisonParts {
   lhs: number;
   operator: string;
   rhs: number;
   pass: boolean;
}

export type VerdictSource = 'computed' | 'custom' | 'bool' | 'measured' | 'tolerance';

export type FieldVerdict = ToleranceResult & {
   fieldId: FieldId;
   name: string;
   label: string;
   source: VerdictSource;
};

export interface RecordEvaluation {
   computed: CalibrationValue[];                         // caller writes these back
   verdicts: FieldVerdict[];
   finalVerdict: Verdict;
   generatedAt: string;
}
