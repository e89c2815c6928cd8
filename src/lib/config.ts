// ENGINE SETTINGS

const envFlag = (name: string): boolean => {
   const v = (process.env[name] ?? '').trim().toLowerCase();
   return v === '1' || v === 'true';
};


export const ENGINE = {
   DEFAULT_DECIMALS: 3,          // computed values without a sig_figs override
   MIN_SIG_FIGS: 0,
   MAX_SIG_FIGS: 4,
   REF_SLOTS: 12,                // ref1..ref12 / val1..val12
   CONDITION_THRESHOLD: 0.5,     // equation result >= this counts as PASS
   PLOT_MAX_VARIABLES: 12,       // x count + y count
   VERBOSE_LOGS: envFlag('CALIB_ENGINE_VERBOSE'),
} as const;
