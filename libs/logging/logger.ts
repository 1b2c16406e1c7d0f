import { pino } from "pino";
import { RequestContext } from "../context/requestContext.js";

import { REDACT_KEYS, REDACT_CENSOR } from "./redactionConfig.js";

export const logger = pino({
  level: process.env.LOG_LEVEL ?? "info",
  base: {
    system: "credential-manager"
  },
  redact: {
    paths: REDACT_KEYS,
    censor: REDACT_CENSOR
  }
});

/**
 * Returns a child logger bound to the active request scope, or the root
 * logger when called outside one.
 */
export function getContextLogger() {
  const scope = RequestContext.current();
  if (!scope) {
    return logger;
  }

  return logger.child({
    requestId: scope.requestId,
    caller: scope.caller?.principal,
    principal: scope.principal
  });
}
