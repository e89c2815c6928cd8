import { setup, assign } from 'xstate';

import type { TemplateField } from '@/types/templateTypes';
import type { ToleranceResult } from '@/types/calibrationTypes';
import { FormulaError, evaluateToleranceEquation } from '@/services/formula';
import { evaluatePassFail } from '@utils/tolerances';
import { validateFieldFormula, type FormulaCheck } from './validation';



/* ---------- Preview ---------- */
export type Sample = {
   nominal: number;
   reading: number;
};

export type FormulaPreview =
   | { kind: 'empty' }
   | { kind: 'error'; message: string }
   | { kind: 'ok'; value: number; result: ToleranceResult };

const NO_PREVIEW = new Set(['plot', 'reference_cal_date']);

// the "test equation" panel: raw value plus the verdict an equation tolerance would give
export function previewFormula(field: TemplateField, equation: string, sample: Sample): FormulaPreview {
   const text = equation.trim();
   if (!text || NO_PREVIEW.has(field.dataType)) return { kind: 'empty' };
   try {
      const value = evaluateToleranceEquation(text, sample);
      const result = evaluatePassFail({ kind: 'equation', equation: text }, sample);
      return { kind: 'ok', value, result };
   } catch (e) {
      if (e instanceof FormulaError) return { kind: 'error', message: e.message };
      throw e;
   }
}




/* ---------- XState machine ---------- */
type EditEvt = {
   type: 'EDIT';
   equation: string
};
type SampleEvt = {
   type: 'SET_SAMPLE';
   nominal?: number;
   reading?: number
};
type SaveEvt = {
   type: 'SAVE'
};

export type FormulaEditorEvent = EditEvt | SampleEvt | SaveEvt;
export type FormulaEditorContext = {
   field: TemplateField;
   equation: string;
   sample: Sample;
   check: FormulaCheck;
   preview: FormulaPreview;
   rejection: string | null;                    // last refused SAVE
};
type FormulaEditorInput = {
   field: TemplateField;
   sample?: Partial<Sample>;
};
export type FormulaEditorOutput = {
   toleranceEquation: string;
};

const refresh = (field: TemplateField, equation: string, sample: Sample): FormulaEditorContext => ({
   field,
   equation,
   sample,
   check: validateFieldFormula({ ...field, toleranceEquation: equation }),
   preview: previewFormula(field, equation, sample),
   rejection: null,
});


export const formulaEditorMachine = setup({
   types: {
      context: {} as FormulaEditorContext,
      events: {} as FormulaEditorEvent,
      input: {} as FormulaEditorInput,
      output: {} as FormulaEditorOutput,
   },
   guards: {
      canSave: ({ context }) => context.check.ok,
   },
   actions: {
      editAction: assign(({ context, event }) => {
         if (event.type !== 'EDIT') return {};
         return refresh(context.field, event.equation, context.sample);
      }),
      sampleAction: assign(({ context, event }) => {
         if (event.type !== 'SET_SAMPLE') return {};
         const sample = {
            nominal: event.nominal ?? context.sample.nominal,
            reading: event.reading ?? context.sample.reading,
         };
         return { sample, preview: previewFormula(context.field, context.equation, sample) };
      }),
      rejectAction: assign(({ context }) => ({
         rejection: context.check.ok ? null : context.check.error,
      })),
   },
}).createMachine({
   id: 'formulaEditor',
   context: ({ input }) =>
      refresh(input.field, input.field.toleranceEquation ?? '', {
         nominal: input.sample?.nominal ?? 0,
         reading: input.sample?.reading ?? 0,
      }),
   initial: 'editing',
   states: {
      editing: {
         on: {
            EDIT: { actions: 'editAction' },
            SET_SAMPLE: { actions: 'sampleAction' },
            SAVE: [
               { guard: 'canSave', target: 'saved' },
               { actions: 'rejectAction' },
            ],
         },
      },
      saved: {
         type: 'final',
      },
   },
   output: ({ context }) => ({ toleranceEquation: context.equation.trim() }),
});
