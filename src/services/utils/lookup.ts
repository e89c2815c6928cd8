import type { LookupPayload, LookupRange } from "@/types/calibrationTypes";
import { parseNumber } from "./measurement";



const isRecord = (v: unknown): v is Record<string, unknown> =>
   typeof v === "object" && v !== null && !Array.isArray(v);

// absent key → open bound; present but not numeric → null (row dropped)
const numberField = (row: Record<string, unknown>, key: string, fallback: number): number | null => {
   const raw = row[key];
   if (raw === undefined || raw === null) return fallback;
   if (typeof raw === "number") return Number.isNaN(raw) ? null : raw;
   if (typeof raw === "string") return parseNumber(raw);
   return null;
};

const rowsOf = (payload: LookupPayload): readonly unknown[] => {
   if (Array.isArray(payload)) return payload;
   if (typeof payload !== "string" || !payload.trim()) return [];
   try {
      const parsed: unknown = JSON.parse(payload);
      return Array.isArray(parsed) ? parsed : [];
   } catch {
      return [];
   }
};

/** Usable rows in stored order. Bad JSON or bad rows are dropped, never thrown. */
export function parseLookupRanges(payload: LookupPayload): LookupRange[] {
   const ranges: LookupRange[] = [];
   for (const row of rowsOf(payload)) {
      if (!isRecord(row)) continue;
      const rangeLow = numberField(row, "range_low", -Infinity);
      const rangeHigh = numberField(row, "range_high", Infinity);
      const tolerance = numberField(row, "tolerance", 0);
      if (rangeLow === null || rangeHigh === null || tolerance === null) continue;
      ranges.push({ rangeLow, rangeHigh, tolerance });
   }
   return ranges;
}

/**
 * First range (stored order) with low ≤ nominal ≤ high wins; |tolerance| of that row.
 * Overlaps are not narrowed: authors list the narrow ranges first. No match → 0.
 */
export function resolveLookupTolerance(payload: LookupPayload, nominal: number): number {
   const hit = parseLookupRanges(payload).find((r) => r.rangeLow <= nominal && nominal <= r.rangeHigh);
   return hit ? Math.abs(hit.tolerance) : 0;
}
