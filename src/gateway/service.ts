/**
 * Gateway Module - Service Layer
 *
 * Wires transport → decoder → caller callbacks. Owns no zone state.
 */
import { type Result, err, ok } from "neverthrow";

import { createLogger, logOperationFailed } from "../logger.js";
import { ZONE_TOPICS } from "../mqtt/index.js";
import { createZoneStateHandler } from "../zone-state/index.js";
import { type GatewayError, alreadyStarted } from "./errors.js";
import type { Gateway, GatewayOptions } from "./schema.js";

const log = createLogger("gateway");

/**
 * Create the gateway over a transport.
 */
export function createGateway(options: GatewayOptions): Gateway {
  const { transport } = options;
  let unsubscribers: Array<() => void> = [];
  let started = false;

  function unsubscribeAll(): void {
    for (const unsubscribe of unsubscribers) unsubscribe();
    unsubscribers = [];
  }

  return {
    async start(callbacks): Promise<Result<void, GatewayError>> {
      if (started) {
        const error = alreadyStarted();
        log.warn(error.message);
        return err(error);
      }
      started = true;

      const handler = createZoneStateHandler(callbacks);
      // Both topics carry the same message shape
      unsubscribers = ZONE_TOPICS.map((topic) =>
        transport.subscribe(topic, handler),
      );

      const connected = await transport.connect();
      if (connected.isErr()) {
        logOperationFailed(log, "gateway start", new Error(connected.error.message));
        unsubscribeAll();
        await transport.disconnect();
        started = false;
        return err(connected.error);
      }

      log.info({ connected: transport.isConnected() }, "Gateway started");
      return ok(undefined);
    },

    async stop() {
      if (!started) return;
      started = false;
      unsubscribeAll();
      await transport.disconnect();
      log.info("Gateway stopped");
    },

    get connected() {
      return transport.isConnected();
    },
  };
}
