import dayjs from "@/lib/dayjs-setup";
import { ENGINE } from "@/lib/config";


export const nowIso = (d?: Date | number | string) => dayjs(d).toISOString();

export const clamp = (value: number, min: number, max: number): number => Math.min(max, Math.max(min, value));



const DATE_FORMATS = ["YYYY-MM-DD", "DD/MM/YYYY", "D/M/YYYY"];

/** Stored date text → "YYYY-MM-DD", or "" when it is not a date. */
export function toIsoDate(value: string | null | undefined): string {
   const text = (value ?? "").trim();
   if (!text) return "";
   const strict = dayjs(text, DATE_FORMATS, true);
   if (strict.isValid()) return strict.format("YYYY-MM-DD");
   // full timestamps ("2024-03-01T08:00:00Z") keep their calendar day in UTC
   const loose = dayjs.utc(text);
   return loose.isValid() ? loose.format("YYYY-MM-DD") : "";
}



export type DisplayPrecision = { decimals: number } | { sigFigs?: number };

/**
 * `toFixed` with exact binary ties (0.0625, 2.5) rounded half to even, so 0.0625
 * at 3 decimals is "0.062" as in records already on file, not "0.063".
 */
export function toFixedHalfEven(value: number, decimals: number): string {
   const fixed = value.toFixed(decimals);
   if (Math.abs(value) >= 1e21) return fixed;
   const exact = Math.abs(value).toFixed(100);
   const dot = exact.indexOf(".");
   if (!/^50*$/.test(exact.slice(dot + 1 + decimals))) return fixed;

   // a tie: toFixed went away from zero, which is right only when the kept digit was odd
   const down = decimals ? exact.slice(0, dot + 1 + decimals) : exact.slice(0, dot);
   if (Number(down[down.length - 1]) % 2 === 1) return fixed;
   return value < 0 && /[1-9]/.test(down) ? `-${down}` : down;
}

/**
 * `{ decimals: 2 }` → "50.00"; `{ sigFigs: 3 }` → "0.00123". Zero is "0" in sig-fig mode.
 */
export function formatCalculationDisplay(value: number, precision: DisplayPrecision = {}): string {
   if (!Number.isFinite(value)) return String(value);
   if ("decimals" in precision) {
      return toFixedHalfEven(value, clamp(Math.trunc(precision.decimals), 0, 20));
   }
   if (value === 0) return "0";
   const digits = clamp(Math.trunc(precision.sigFigs || ENGINE.DEFAULT_DECIMALS), 1, 21);
   return String(Number(value.toPrecision(digits)));
}
