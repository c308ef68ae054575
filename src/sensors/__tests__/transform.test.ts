/**
 * Sensors Module - Transform Tests
 */
import { describe, expect, it } from "vitest";

import {
  buildDeviceInfo,
  deviceDisplayName,
  hubDeviceIdentifier,
  sensorUniqueId,
  zoneDeviceIdentifier,
} from "../transform.js";

describe("derived identifiers", () => {
  it("builds the sensor unique id", () => {
    expect(sensorUniqueId("entry1", "z1")).toBe("entry1_zone_z1_motion");
  });

  it("uses the session id as hub identifier", () => {
    expect(hubDeviceIdentifier("entry1")).toBe("entry1");
  });

  it("builds the zone device identifier", () => {
    expect(zoneDeviceIdentifier("entry1", "z1")).toBe("entry1_z1");
  });
});

describe("deviceDisplayName", () => {
  it("wraps the zone name in the prefix", () => {
    expect(deviceDisplayName("Zone", "Hallway")).toBe("Zone (Hallway)");
  });
});

describe("buildDeviceInfo", () => {
  it("links the zone device to the hub", () => {
    const info = buildDeviceInfo(
      { sessionId: "entry1", deviceNamePrefix: "Zone" },
      { id: "z1", name: "Hallway" },
    );

    expect(info).toEqual({
      identifier: "entry1_z1",
      name: "Zone (Hallway)",
      viaDevice: "entry1",
    });
  });
});
