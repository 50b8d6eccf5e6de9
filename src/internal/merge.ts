/**
 * Internal set utilities for height bookkeeping.
 *
 * @since 0.1.0
 * @internal
 */

import { Array, pipe } from "effect"

/**
 * Union of two sets as a fresh set. Neither input is mutated.
 *
 * @internal
 */
export const mergeSets = <A>(a: ReadonlySet<A>, b: ReadonlySet<A>): Set<A> => {
  const result = new Set(a)

  pipe(
    Array.fromIterable(b),
    Array.forEach((item) => {
      result.add(item)
    })
  )

  return result
}

/**
 * Copies a map with one entry set. The input map is not mutated.
 *
 * @internal
 */
export const setEntry = <K, V>(map: ReadonlyMap<K, V>, key: K, value: V): Map<K, V> => {
  const result = new Map(map)
  result.set(key, value)
  return result
}
