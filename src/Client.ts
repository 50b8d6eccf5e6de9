/**
 * Light-client record.
 *
 * A client is the local record of the heights of one counterparty chain that
 * have been verified and accepted. Its height set behaves like a grow-only
 * set: heights are added by union and never removed.
 *
 * A client with an empty height set is the absent client. It is what the
 * registry hands out for identifiers that were never allocated.
 *
 * @since 0.1.0
 */
import * as Array from "effect/Array"
import * as Option from "effect/Option"
import * as Schema from "effect/Schema"
import { mergeSets } from "./internal/merge.js"
import { type Height, HeightOrder, HeightSchema } from "./LightClient.js"

// =============================================================================
// Models
// =============================================================================

/**
 * A tracked counterparty chain.
 *
 * @since 0.1.0
 * @category models
 */
export interface Client {
  readonly heights: ReadonlySet<Height>
}

// =============================================================================
// Constructors
// =============================================================================

/**
 * The absent client. Every call returns a fresh record.
 *
 * @since 0.1.0
 * @category constructors
 */
export const absent = (): Client => ({ heights: new Set<Height>() })

/**
 * Creates a client anchored at a single height.
 *
 * @since 0.1.0
 * @category constructors
 */
export const make = (height: Height): Client => ({ heights: new Set([height]) })

/**
 * Copies a client so that the result shares no set with `self`.
 *
 * @since 0.1.0
 * @category constructors
 */
export const copy = (self: Client): Client => ({ heights: new Set(self.heights) })

// =============================================================================
// Getters
// =============================================================================

/**
 * A client exists iff it has accepted at least one height.
 *
 * @since 0.1.0
 * @category getters
 */
export const exists = (self: Client): boolean => self.heights.size > 0

/**
 * Greatest accepted height, `None` for the absent client.
 *
 * @example
 * ```ts
 * import * as Client from "light-client-registry/Client"
 * import { Height } from "light-client-registry/LightClient"
 *
 * const client = Client.recordHeight(Client.make(Height(100)), Height(150))
 * Client.latestHeight(client) // Option.some(150)
 * Client.latestHeight(Client.absent()) // Option.none()
 * ```
 *
 * @since 0.1.0
 * @category getters
 */
export const latestHeight = (self: Client): Option.Option<Height> => {
  const heights = Array.fromIterable(self.heights)
  return Array.isNonEmptyReadonlyArray(heights)
    ? Option.some(Array.max(heights, HeightOrder))
    : Option.none()
}

/**
 * Accepted heights in ascending order.
 *
 * @since 0.1.0
 * @category getters
 */
export const sortedHeights = (self: Client): ReadonlyArray<Height> =>
  Array.sort(self.heights, HeightOrder)

// =============================================================================
// Operations
// =============================================================================

/**
 * Adds a height to the client by set union.
 *
 * Does not check monotonicity; the registry decides whether a height is
 * accepted before calling this.
 *
 * @since 0.1.0
 * @category operations
 */
export const recordHeight = (self: Client, height: Height): Client => ({
  heights: mergeSets(self.heights, new Set([height]))
})

// =============================================================================
// Schemas
// =============================================================================

/**
 * Schema for a client record. Heights encode as an array.
 *
 * @since 0.1.0
 * @category schemas
 */
export const ClientSchema = Schema.Struct({
  heights: Schema.ReadonlySet(HeightSchema)
}).pipe(
  Schema.annotations({
    identifier: "Client",
    title: "Light Client",
    description: "Accepted heights of one counterparty chain"
  })
)
