import { AsyncLocalStorage } from "node:async_hooks";
import crypto from "node:crypto";
import pino from "pino";

import { getConfig } from "@/lib/config";

type LogContext = Record<string, unknown>;

type LogLevel = "debug" | "info" | "warn" | "error";

interface RequestScope {
  requestId?: string;
}

const storage = new AsyncLocalStorage<RequestScope>();

export interface Logger {
  debug: (context: LogContext, message: string) => void;
  info: (context: LogContext, message: string) => void;
  warn: (context: LogContext, message: string) => void;
  error: (context: LogContext, message: string) => void;
  createChild: (context: LogContext) => Logger;
}

const baseLogger = (() => {
  try {
    const config = getConfig();
    return pino({
      level: config.LOG_LEVEL,
      base: {
        service: "product-mix"
      },
      transport:
        config.NODE_ENV === "development"
          ? {
              target: "pino-pretty",
              options: {
                colorize: true,
                translateTime: "SYS:standard"
              }
            }
          : undefined
    });
  } catch {
    return null;
  }
})();

function withBaseContext(context: LogContext): LogContext {
  const requestId = storage.getStore()?.requestId;
  return requestId ? { requestId, ...context } : context;
}

function emit(level: LogLevel, context: LogContext, message: string) {
  const payload = withBaseContext(context);

  if (baseLogger) {
    baseLogger[level](payload, message);
    return;
  }

  const line = `[${level.toUpperCase()}] ${message}`;
  switch (level) {
    case "debug":
      console.debug(line, payload);
      break;
    case "warn":
      console.warn(line, payload);
      break;
    case "error":
      console.error(line, payload);
      break;
    default:
      console.info(line, payload);
  }
}

function createLogger(context: LogContext = {}): Logger {
  return {
    debug(additionalContext, message) {
      emit("debug", { ...context, ...additionalContext }, message);
    },
    info(additionalContext, message) {
      emit("info", { ...context, ...additionalContext }, message);
    },
    warn(additionalContext, message) {
      emit("warn", { ...context, ...additionalContext }, message);
    },
    error(additionalContext, message) {
      emit("error", { ...context, ...additionalContext }, message);
    },
    createChild(childContext) {
      return createLogger({ ...context, ...childContext });
    }
  };
}

export function withRequestContext<T>(fn: () => Promise<T>, requestId?: string): Promise<T> {
  return storage.run({ requestId: requestId ?? crypto.randomUUID() }, fn);
}

export const logger = createLogger();
