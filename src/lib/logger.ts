import { ENGINE } from '@/lib/config';

export type LogTag = 'FORMULA' | 'TOL' | 'CALC' | 'RECORD';

// debug/info only when CALIB_ENGINE_VERBOSE is set; warn always
export const logger = {
   debug: (tag: LogTag, ...args: unknown[]) => {
      if (ENGINE.VERBOSE_LOGS) console.debug(`[${tag}]`, ...args);
   },
   info: (tag: LogTag, ...args: unknown[]) => {
      if (ENGINE.VERBOSE_LOGS) console.info(`[${tag}]`, ...args);
   },
   warn: (tag: LogTag, ...args: unknown[]) => {
      console.warn(`[${tag}]`, ...args);
   },
};
