/**
 * Zones Module - Pure Transformations
 *
 * Roster set-diff. The roster is always the complete current set.
 */
import type { ZoneInfo } from "../zone-state/index.js";
import type { RosterDiff } from "./schema.js";

/**
 * Collapse duplicate ids; the last occurrence wins, first position is kept.
 *
 * @returns Zones keyed by id plus the ids that appeared more than once
 */
export function dedupeRoster(roster: ReadonlyArray<ZoneInfo>): {
  zones: ReadonlyMap<string, ZoneInfo>;
  duplicates: ReadonlyArray<string>;
} {
  const zones = new Map<string, ZoneInfo>();
  const duplicates = new Set<string>();

  for (const zone of roster) {
    if (zones.has(zone.id)) duplicates.add(zone.id);
    zones.set(zone.id, zone);
  }

  return { zones, duplicates: [...duplicates] };
}

/**
 * Diff a roster against the names currently known per zone id.
 *
 * @param known - Zone id → name of every zone in the table
 * @param roster - Deduplicated roster
 */
export function diffRoster(
  known: ReadonlyMap<string, string>,
  roster: ReadonlyMap<string, ZoneInfo>,
): RosterDiff {
  const added: ZoneInfo[] = [];
  const renamed: ZoneInfo[] = [];

  for (const zone of roster.values()) {
    const knownName = known.get(zone.id);
    if (knownName === undefined) {
      added.push(zone);
    } else if (knownName !== zone.name) {
      renamed.push(zone);
    }
  }

  const removed = [...known.keys()].filter((zoneId) => !roster.has(zoneId));

  return { added, removed, renamed };
}

/**
 * True when a diff would change nothing.
 */
export function isEmptyDiff(diff: RosterDiff): boolean {
  return (
    diff.added.length === 0 &&
    diff.removed.length === 0 &&
    diff.renamed.length === 0
  );
}
