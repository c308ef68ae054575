/**
 * Zones Transform Tests
 */
import { describe, expect, test } from "vitest";

import { dedupeRoster, diffRoster, isEmptyDiff } from "../transform.js";

describe("dedupeRoster", () => {
  test("keeps a clean roster as is", () => {
    const { zones, duplicates } = dedupeRoster([
      { id: "a", name: "Attic" },
      { id: "b", name: "Bedroom" },
    ]);

    expect([...zones.keys()]).toEqual(["a", "b"]);
    expect(duplicates).toEqual([]);
  });

  test("last occurrence wins at the first position", () => {
    const { zones, duplicates } = dedupeRoster([
      { id: "a", name: "Attic" },
      { id: "b", name: "Bedroom" },
      { id: "a", name: "Loft" },
    ]);

    expect([...zones.values()]).toEqual([
      { id: "a", name: "Loft" },
      { id: "b", name: "Bedroom" },
    ]);
    expect(duplicates).toEqual(["a"]);
  });
});

describe("diffRoster", () => {
  const known = new Map([
    ["a", "Attic"],
    ["b", "Bedroom"],
    ["c", "Cellar"],
  ]);

  test("splits a roster into added, removed and renamed", () => {
    const { zones } = dedupeRoster([
      { id: "d", name: "Den" },
      { id: "b", name: "Guest Room" },
      { id: "c", name: "Cellar" },
    ]);

    expect(diffRoster(known, zones)).toEqual({
      added: [{ id: "d", name: "Den" }],
      removed: ["a"],
      renamed: [{ id: "b", name: "Guest Room" }],
    });
  });

  test("an empty roster removes every known zone", () => {
    const diff = diffRoster(known, new Map());

    expect(diff.removed).toEqual(["a", "b", "c"]);
    expect(diff.added).toEqual([]);
    expect(diff.renamed).toEqual([]);
  });

  test("an identical roster is an empty diff", () => {
    const { zones } = dedupeRoster([
      { id: "a", name: "Attic" },
      { id: "b", name: "Bedroom" },
      { id: "c", name: "Cellar" },
    ]);

    expect(isEmptyDiff(diffRoster(known, zones))).toBe(true);
  });

  test("name comparison is exact", () => {
    const { zones } = dedupeRoster([{ id: "a", name: "attic" }]);

    expect(diffRoster(new Map([["a", "Attic"]]), zones).renamed).toEqual([
      { id: "a", name: "attic" },
    ]);
  });
});
