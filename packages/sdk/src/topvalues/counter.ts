/**
 * Value counting for `topvalues()`
 */

import type { TopValue } from "../types.js";
import { canonicalKey } from "../format.js";
import type { Counted } from "./table.js";

/**
 * Count values by structural identity and keep the `topnbr` most frequent,
 * highest first. Ties keep first-seen order.
 */
export function topCounts(
  items: Iterable<Counted>,
  topnbr: number,
  output: (value: unknown) => unknown = (value) => value
): TopValue[] {
  const counts = new Map<string, { value: unknown; count: number }>();
  for (const [value, weight] of items) {
    const key = canonicalKey(value);
    const entry = counts.get(key);
    if (entry) {
      entry.count += weight;
    } else {
      counts.set(key, { value, count: weight });
    }
  }
  return [...counts.values()]
    .sort((a, b) => b.count - a.count)
    .slice(0, Math.max(0, topnbr))
    .map(({ value, count }) => ({ value: output(value), count }));
}
