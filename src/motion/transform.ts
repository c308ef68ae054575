/**
 * Motion Module - Pure Transformations
 */

/**
 * A motion value is delivered only when it differs from the stored one.
 * An unset state (null) always differs.
 */
export function shouldDeliverMotion(
  current: boolean | null,
  next: boolean,
): boolean {
  return current !== next;
}
