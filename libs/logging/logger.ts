import pino from "pino";
import { TraceContext } from "../context/traceContext.js";
import { PrincipalContext } from "../context/identity.js";

import { REDACT_KEYS, REDACT_CENSOR } from "./redactionConfig.js";

export const loggerOptions: pino.LoggerOptions = {
  level: process.env.LOG_LEVEL ?? "info",
  base: {
    system: "audit-gateway"
  },
  redact: {
    paths: REDACT_KEYS,
    censor: REDACT_CENSOR
  },
  // Call sites log failures as { error }; pino only serializes `err` by default.
  serializers: {
    error: pino.stdSerializers.err
  },
  // Correlates every line emitted inside a request scope with its trace id.
  mixin() {
    const traceId = TraceContext.current();
    return traceId ? { traceId } : {};
  }
};

export const logger = pino(loggerOptions);

/**
 * Returns a child logger with principal context attached.
 */
export function getContextLogger(context: PrincipalContext) {
  return logger.child({
    principal: context.name,
    roles: context.roles
  });
}
