import type { Logger } from "../../modules/warnings/types.js";

export function createNoopLogger(): Logger {
  return {
    info() {},
    warn() {},
    error() {}
  };
}

/** Console logger that prefixes the component and JSON-encodes the context. */
export function createLogger(component: string): Logger {
  const prefix = `[${component}]`;
  return {
    info(message: string, context?: Record<string, unknown>) {
      console.log(prefix, message, context ? JSON.stringify(context) : "");
    },
    warn(message: string, context?: Record<string, unknown>) {
      console.warn(prefix, message, context ? JSON.stringify(context) : "");
    },
    error(message: string, context?: Record<string, unknown>) {
      console.error(prefix, message, context ? JSON.stringify(context) : "");
    }
  };
}
