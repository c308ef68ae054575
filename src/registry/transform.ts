/**
 * Registry Module - Pure Transformations
 */

/**
 * Lowercase slug of letters, digits and single underscores.
 */
export function slugify(value: string): string {
  const slug = value
    .normalize("NFKD")
    .replace(/[\u0300-\u036f]/g, "")
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "_")
    .replace(/^_+|_+$/g, "");
  return slug === "" ? "unnamed" : slug;
}

/**
 * Entity id for a zone motion sensor, suffixed until it is free.
 */
export function allocateEntityId(
  zoneName: string,
  taken: (entityId: string) => boolean,
): string {
  const base = `binary_sensor.${slugify(zoneName)}_motion`;
  if (!taken(base)) return base;

  let suffix = 2;
  while (taken(`${base}_${suffix}`)) suffix++;
  return `${base}_${suffix}`;
}
