/**
 * Hono application: request tracing, global error handling and routes.
 *
 * Every request log line and every unhandled error carries the session id
 * and broker state of the running integration.
 */
import { type ErrorHandler, Hono, type MiddlewareHandler } from "hono";

import { routes } from "./api/routes.js";
import { config } from "./config.js";
import { getIntegration } from "./integration/index.js";
import { createLogger } from "./logger.js";

const log = createLogger("middleware");

/**
 * Session fields for log lines; empty without an integration.
 */
function sessionContext(): { sessionId?: string; brokerConnected?: boolean } {
  const integration = getIntegration();
  if (!integration) return {};
  return {
    sessionId: integration.sessionId,
    brokerConnected: integration.gateway.connected,
  };
}

/**
 * Propagates an incoming x-request-id or generates one, and logs the
 * request with its session context.
 */
export const requestContext: MiddlewareHandler = async (c, next) => {
  const incoming = c.req.header("x-request-id")?.trim();
  const requestId = incoming ? incoming : crypto.randomUUID();

  c.set("requestId", requestId);
  c.header("x-request-id", requestId);

  const start = Date.now();
  await next();

  log.debug(
    {
      requestId,
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      durationMs: Date.now() - start,
      ...sessionContext(),
    },
    `${c.req.method} ${c.req.path} ${c.res.status}`,
  );
};

/**
 * Logs unhandled route errors; the message stays in the log in production.
 */
export const errorHandler: ErrorHandler = (error, c) => {
  const requestId = c.get("requestId") ?? "unknown";

  log.error(
    {
      requestId,
      method: c.req.method,
      path: c.req.path,
      error: error.message,
      stack: error.stack,
      ...sessionContext(),
    },
    "❌ Unhandled error",
  );

  const message =
    config.NODE_ENV === "production" ? "Internal server error" : error.message;

  return c.json({ error: message, requestId }, 500);
};

export function createApp(): Hono {
  const app = new Hono();

  app.use("*", requestContext);
  app.onError(errorHandler);
  app.route("/", routes);

  return app;
}

declare module "hono" {
  interface ContextVariableMap {
    requestId: string;
  }
}
