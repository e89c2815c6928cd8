import type { Bindings } from '@/types/formulaTypes';
import { ENGINE } from '@/lib/config';



const SLOT = /^(ref|val)(\d{1,2})$/;

/** `ref3` ↔ `val3`; undefined for names outside ref1..ref12 / val1..val12. */
export const aliasOf = (name: string): string | undefined => {
   const m = SLOT.exec(name);
   if (!m) return undefined;
   const n = Number(m[2]);
   if (n < 1 || n > ENGINE.REF_SLOTS) return undefined;
   return `${m[1] === 'ref' ? 'val' : 'ref'}${n}`;
};

export const ALLOWED_VARIABLES: ReadonlySet<string> = new Set([
   'nominal',
   'reading',
   'ref',
   'value',
   'abs_nominal',
   ...Array.from({ length: ENGINE.REF_SLOTS }, (_, i) => `ref${i + 1}`),
   ...Array.from({ length: ENGINE.REF_SLOTS }, (_, i) => `val${i + 1}`),
]);


/**
 * Name → value bindings for one evaluation. Setting `refN` also sets `valN`
 * and the other way round.
 */
export class VariableMap {
   private readonly values = new Map<string, number>();

   constructor(initial?: Bindings) {
      if (!initial) return;
      for (const [name, value] of Object.entries(initial)) this.values.set(name, value);
      // fill the missing half of each pair; both given → both kept
      for (const [name, value] of Object.entries(initial)) {
         const alias = aliasOf(name);
         if (alias && !this.values.has(alias)) this.values.set(alias, value);
      }
   }

   set(name: string, value: number): this {
      this.values.set(name, value);
      const alias = aliasOf(name);
      if (alias) this.values.set(alias, value);
      return this;
   }

   get(name: string): number | undefined {
      return this.values.get(name);
   }

   has(name: string): boolean {
      return this.values.has(name);
   }

   /** Slots 1..12 that hold a value. */
   filledSlots(): number[] {
      return Array.from({ length: ENGINE.REF_SLOTS }, (_, i) => i + 1).filter((n) => this.values.has(`ref${n}`));
   }

   toBindings(): Bindings {
      return Object.fromEntries(this.values);
   }
}

export const withValAliases = (vars: Bindings): Bindings => new VariableMap(vars).toBindings();
