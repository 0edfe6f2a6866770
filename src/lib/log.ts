// Diagnostics console. Everything goes to stderr so stdout only ever carries
// the report; debug lines are printed when COMPANY_INTEL_DEBUG is set.

import { Console } from "node:console";

const stderrConsole = new Console({ stdout: process.stderr, stderr: process.stderr });

const debugEnabled = (): boolean => Boolean(process.env.COMPANY_INTEL_DEBUG);

export const log = {
  debug: (...args: unknown[]): void => {
    if (debugEnabled()) stderrConsole.log(...args);
  },
  info: (...args: unknown[]): void => stderrConsole.log(...args),
  warn: (...args: unknown[]): void => stderrConsole.warn(...args),
  error: (...args: unknown[]): void => stderrConsole.error(...args),
};
