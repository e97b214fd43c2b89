import { config } from "./config.js";

/**
 * Scoped console logger. Lines are prefixed `[seqflow:<scope>]`.
 *
 * `debug` output is gated on the `debug` config flag (or `SEQFLOW_DEBUG=1`)
 * and evaluated on every call, so flipping the flag takes effect immediately.
 * `warn` always prints.
 */
export interface Logger {
  readonly scope: string;
  readonly enabled: () => boolean;
  debug(message: string | (() => string)): void;
  warn(message: string): void;
}

export function createLogger(scope: string): Logger {
  const prefix = `[seqflow:${scope}]`;
  const enabled = (): boolean => config.getBoolean("debug", false);

  return {
    scope,
    enabled,
    debug(message) {
      if (!enabled()) return;
      console.debug(`${prefix} ${typeof message === "function" ? message() : message}`);
    },
    warn(message) {
      console.warn(`${prefix} ${message}`);
    },
  };
}
