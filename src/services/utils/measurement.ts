const NUMERIC = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/** Decimal text → number; anything else (blank, "12 V", "abc") → null. */
export const parseNumber = (text: string | null | undefined): number | null => {
   const s = (text ?? "").trim();
   if (!NUMERIC.test(s)) return null;
   const n = Number(s);
   return Number.isFinite(n) ? n : null;
};

/**
 * Stored values may carry the field's unit: `"122.0 °F"` with unit `"°F"` → 122.
 * Only the configured unit is stripped, and only as a suffix.
 */
export function toNumberStrippingUnit(text: string | null | undefined, unit?: string | null): number | null {
   let s = (text ?? "").trim();
   if (!s) return null;
   const u = (unit ?? "").trim();
   if (u && s.endsWith(u)) s = s.slice(0, -u.length).trim();
   return parseNumber(s);
}

const TRUTHY = new Set(["1", "true", "yes", "on"]);

/** "1"/"true"/"yes"/"on" (any case) or any non-zero number → true. */
export function toBool(value: string | number | boolean | null | undefined): boolean {
   if (typeof value === "boolean") return value;
   if (typeof value === "number") return value !== 0 && !Number.isNaN(value);
   const s = (value ?? "").trim().toLowerCase();
   if (TRUTHY.has(s)) return true;
   const n = parseNumber(s);
   return n !== null && n !== 0;
}

/** nominal_value text → number; blank or unparsable → 0. */
export const parseNominal = (text: string | null | undefined): number => parseNumber(text) ?? 0;

export const withinTolerance = (reading: number, nominal: number, tolerance: number): boolean =>
   Math.abs(reading - nominal) <= tolerance;
