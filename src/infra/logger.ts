const prefix = () => `[${new Date().toISOString()}]`;

const debugEnabled = () => (process.env.LOG_LEVEL ?? "").trim().toLowerCase() === "debug";

export const logger = {
  debug(...args: unknown[]) {
    if (!debugEnabled()) return;
    console.debug(prefix(), ...args);
  },
  info(...args: unknown[]) {
    console.log(prefix(), ...args);
  },
  warn(...args: unknown[]) {
    console.warn(prefix(), ...args);
  },
  error(...args: unknown[]) {
    console.error(prefix(), ...args);
  },
};

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
