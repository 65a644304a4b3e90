import debug, { type Debugger } from "debug";

const DEFAULT_PREFIX = "keyward";

/**
 * Create a namespaced debug logger that shares the global enable/disable switch.
 * Set `DEBUG=keyward:*` to see the output.
 */
export const createLogger = (namespace: string, options?: { prefix?: string }): Debugger => {
  const prefix = options?.prefix ?? DEFAULT_PREFIX;
  return debug(`${prefix}:${namespace}`);
};

export const extendLogger = (logger: Debugger, suffix: string): Debugger => {
  return typeof logger.extend === "function" ? logger.extend(suffix) : createLogger(`${logger.namespace}:${suffix}`);
};
