/**
 * SSE Service Tests
 *
 * Tests SSE client management and zone event broadcasting.
 */
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";

// Mock logger
vi.mock("../../logger.js", () => ({
  createLogger: () => ({
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  }),
}));

// Import after mocks
import {
  broadcast,
  broadcastConnection,
  broadcastZoneRemoved,
  broadcastZoneState,
  createSseStream,
  disconnectAllClients,
  getClientCount,
  sendToClient,
  toZoneStateEvent,
} from "../service.js";

const decoder = new TextDecoder();

async function readText(reader: ReadableStreamDefaultReader<Uint8Array>): Promise<string> {
  const { value } = await reader.read();
  return decoder.decode(value);
}

const snapshot = {
  uniqueId: "entry1_zone_z1_motion",
  zoneId: "z1",
  name: "Hallway",
  motion: true,
  device: { identifier: "entry1_z1", name: "Zone (Hallway)", viaDevice: "entry1" },
};

describe("SSE Service", () => {
  beforeEach(() => {
    disconnectAllClients();
  });

  afterEach(() => {
    disconnectAllClients();
  });

  // ===========================================================================
  // Client Management
  // ===========================================================================

  describe("getClientCount", () => {
    test("returns 0 when no clients connected", () => {
      expect(getClientCount()).toBe(0);
    });

    test("returns correct count after clients connect", () => {
      createSseStream();
      createSseStream();
      createSseStream();

      expect(getClientCount()).toBe(3);
    });
  });

  describe("createSseStream", () => {
    test("increments client ID for each new client", () => {
      const client1 = createSseStream();
      const client2 = createSseStream();

      expect(client1.stream).toBeInstanceOf(ReadableStream);
      expect(client2.clientId).toBeGreaterThan(client1.clientId);
    });

    test("sends connected event on stream start", async () => {
      const { stream, clientId } = createSseStream();
      const reader = stream.getReader();

      const text = await readText(reader);
      reader.releaseLock();

      expect(text).toBe(`event: connected\ndata: {"clientId":${clientId}}\n\n`);
    });

    test("cancelling the stream removes the client", async () => {
      const { stream } = createSseStream();
      expect(getClientCount()).toBe(1);

      await stream.cancel();

      expect(getClientCount()).toBe(0);
    });
  });

  // ===========================================================================
  // Broadcasting
  // ===========================================================================

  describe("broadcast", () => {
    test("sends event to all connected clients", async () => {
      const reader1 = createSseStream().stream.getReader();
      const reader2 = createSseStream().stream.getReader();
      await reader1.read();
      await reader2.read();

      broadcast({ type: "zone_removed", zoneId: "z1" });

      const expected = 'event: zone_removed\ndata: {"type":"zone_removed","zoneId":"z1"}\n\n';
      expect(await readText(reader1)).toBe(expected);
      expect(await readText(reader2)).toBe(expected);

      reader1.releaseLock();
      reader2.releaseLock();
    });

    test("does nothing when no clients connected", () => {
      expect(() => {
        broadcastConnection(false);
      }).not.toThrow();
    });
  });

  describe("zone events", () => {
    test("maps a sensor snapshot to a zone_state event", () => {
      expect(toZoneStateEvent(snapshot)).toEqual({
        type: "zone_state",
        zoneId: "z1",
        name: "Hallway",
        motion: true,
      });
    });

    test("broadcastZoneState encodes the zone's state", async () => {
      const reader = createSseStream().stream.getReader();
      await reader.read();

      broadcastZoneState({ ...snapshot, motion: null });

      expect(await readText(reader)).toBe(
        'event: zone_state\ndata: {"type":"zone_state","zoneId":"z1","name":"Hallway","motion":null}\n\n',
      );
      reader.releaseLock();
    });

    test("broadcastZoneRemoved and broadcastConnection", async () => {
      const reader = createSseStream().stream.getReader();
      await reader.read();

      broadcastZoneRemoved("z9");
      broadcastConnection(true);

      expect(await readText(reader)).toBe(
        'event: zone_removed\ndata: {"type":"zone_removed","zoneId":"z9"}\n\n',
      );
      expect(await readText(reader)).toBe(
        'event: connection\ndata: {"type":"connection","connected":true}\n\n',
      );
      reader.releaseLock();
    });
  });

  // ===========================================================================
  // sendToClient
  // ===========================================================================

  describe("sendToClient", () => {
    test("sends event to the given client", async () => {
      const { stream, clientId } = createSseStream();
      const reader = stream.getReader();
      await reader.read();

      const sent = sendToClient(clientId, { type: "connection", connected: false });

      expect(sent).toBe(true);
      expect(await readText(reader)).toBe(
        'event: connection\ndata: {"type":"connection","connected":false}\n\n',
      );
      reader.releaseLock();
    });

    test("returns false for non-existent client", () => {
      expect(sendToClient(99999, { type: "connection", connected: true })).toBe(false);
    });
  });

  describe("disconnectAllClients", () => {
    test("disconnects all connected clients", () => {
      createSseStream();
      createSseStream();

      disconnectAllClients();

      expect(getClientCount()).toBe(0);
    });
  });
});
