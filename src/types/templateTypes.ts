import type { LookupPayload } from './calibrationTypes';



export type FieldId = number;

export type DataType =
   | 'text'
   | 'number'
   | 'bool'
   | 'date'
   | 'signature'
   | 'reference'
   | 'reference_cal_date'            // last cal date of the instrument named by ref1
   | 'tolerance'                     // read-only pass/fail display
   | 'convert'                       // unit conversion from refs
   | 'stat'                          // LINEST, STDEV, ... over refs
   | 'plot'                          // PLOT([x...], [y...]) for the chart renderer
   | 'field_header';

export type ToleranceType = 'none' | 'fixed' | 'percent' | 'equation' | 'lookup' | 'bool';

export type CalcType =
   | 'ABS_DIFF'
   | 'PCT_ERROR'
   | 'PCT_DIFF'
   | 'MIN_OF'
   | 'MAX_OF'
   | 'RANGE_OF'
   | 'CUSTOM_EQUATION';

export const AGGREGATE_CALC_TYPES: readonly CalcType[] = [
   'ABS_DIFF', 'PCT_ERROR', 'PCT_DIFF', 'MIN_OF', 'MAX_OF', 'RANGE_OF',
];


/** One configured column of a calibration template. Read-only to the engine. */
export interface TemplateField {
   id: FieldId;
   name: string;                                         // variable-binding key
   label: string;
   dataType: DataType;
   unit?: string | null;
   groupName?: string | null;
   sortOrder?: number;
   required?: boolean;

   toleranceType?: ToleranceType | null;                 // null → legacy fixed
   toleranceFixed?: number | null;                       // band, or percent for 'percent'
   toleranceEquation?: string | null;                    // formula, or 'true'/'false' for 'bool'
   toleranceLookup?: LookupPayload;                      // JSON text or parsed rows
   nominalValue?: string | null;

   calcType?: CalcType | null;
   calcRefs?: ReadonlyArray<string | null | undefined>;  // [calc_ref1 .. calc_ref12]
   sigFigs?: number | null;                              // 0..4
}
