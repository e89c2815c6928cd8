import type { CalibrationValue } from "@/types/calibrationTypes";
import type { DataType, FieldId, TemplateField } from "@/types/templateTypes";
import { ENGINE } from "@/lib/config";
import { VariableMap, listVariables } from "@/services/formula";
import { parseNominal, toNumberStrippingUnit } from "./measurement";



export type SiblingValues = ReadonlyMap<FieldId, string>;

export type SiblingValue = {
   field: TemplateField;
   text: string;
   unit: string;
};

export interface SiblingLookup {
   /** Field named by a calc ref, with its current value text. */
   find(ref: string | null | undefined): SiblingValue | undefined;
}

// display-only kinds never bind to a variable
const UNBOUND: ReadonlySet<DataType> = new Set<DataType>(["field_header", "tolerance", "plot"]);

export const valuesById = (values: readonly CalibrationValue[]): Map<FieldId, string> =>
   new Map(values.map((v) => [v.fieldId, v.valueText]));

/** Same group as the target; stat/plot formulas see the whole template. */
export function fieldsInScope(target: TemplateField, fields: readonly TemplateField[]): TemplateField[] {
   const wide = target.dataType === "stat" || target.dataType === "plot";
   const group = target.groupName ?? "";
   return fields.filter((f) => !UNBOUND.has(f.dataType) && (wide || (f.groupName ?? "") === group));
}

/**
 * Ref → sibling resolution for one target field: exact name first, then name
 * ignoring case, then label ignoring case.
 */
export function createSiblingLookup(
   target: TemplateField,
   fields: readonly TemplateField[],
   values: SiblingValues,
): SiblingLookup {
   const scope = fieldsInScope(target, fields);
   const exact = new Map<string, TemplateField>();
   const byName = new Map<string, TemplateField>();
   const byLabel = new Map<string, TemplateField>();
   for (const f of scope) {
      const name = f.name.trim();
      const label = f.label.trim().toLowerCase();
      if (name && !exact.has(name)) exact.set(name, f);
      if (name && !byName.has(name.toLowerCase())) byName.set(name.toLowerCase(), f);
      if (label && !byLabel.has(label)) byLabel.set(label, f);
   }

   return {
      find(ref) {
         const key = (ref ?? "").trim();
         if (!key) return undefined;
         const field = exact.get(key) ?? byName.get(key.toLowerCase()) ?? byLabel.get(key.toLowerCase());
         if (!field) return undefined;
         return { field, text: values.get(field.id) ?? "", unit: (field.unit ?? "").trim() };
      },
   };
}



export type ResolveOptions = {
   reading?: number;
   nominal?: number;
};

/** `calcRefs[i]` names the sibling bound to ref(i+1)/val(i+1). */
export const refNameAt = (field: TemplateField, slot: number): string =>
   (field.calcRefs?.[slot - 1] ?? "").trim();

/**
 * Bindings for one field's formula. Refs whose value is blank or not a number
 * stay unbound, so "not yet computable" differs from "computed to zero".
 */
export function resolveVariables(field: TemplateField, lookup: SiblingLookup, opts: ResolveOptions = {}): VariableMap {
   const vars = new VariableMap();
   vars.set("nominal", opts.nominal ?? parseNominal(field.nominalValue));

   for (let slot = 1; slot <= ENGINE.REF_SLOTS; slot++) {
      const hit = lookup.find(refNameAt(field, slot));
      if (!hit) continue;
      const n = toNumberStrippingUnit(hit.text, hit.unit);
      if (n !== null) vars.set(`ref${slot}`, n);
   }

   let reading = opts.reading;
   if (reading === undefined && listVariables(field.toleranceEquation).includes("reading")) {
      reading = vars.get("ref1");
   }
   vars.set("reading", reading ?? 0);
   return vars;
}

export const missingVariables = (text: string | null | undefined, vars: VariableMap): string[] =>
   listVariables(text).filter((name) => !vars.has(name));

export const isComputable = (text: string | null | undefined, vars: VariableMap): boolean =>
   missingVariables(text, vars).length === 0;
