/**
 * Core light-client types and identifiers.
 *
 * Provides the branded identifiers and heights shared by every module of the
 * client registry. A client tracks the progress of one counterparty chain, and
 * heights are the points of progress (block numbers) it has accepted.
 *
 * @since 0.1.0
 */
import * as Brand from "effect/Brand"
import * as Option from "effect/Option"
import * as Order from "effect/Order"
import * as Schema from "effect/Schema"

// =============================================================================
// Models
// =============================================================================

/**
 * Identifier of a client in the registry.
 *
 * Identifiers are allocated sequentially and are never reused.
 *
 * @since 0.1.0
 * @category models
 */
export type ClientId = Brand.Branded<number, "ClientId">

/**
 * Height of a counterparty chain, already verified by the caller.
 *
 * @since 0.1.0
 * @category models
 */
export type Height = Brand.Branded<number, "Height">

const isNonNegativeSafeInteger = (n: number): boolean => Number.isSafeInteger(n) && n >= 0

// =============================================================================
// Constructors
// =============================================================================

/**
 * Creates a client identifier from a non-negative safe integer.
 *
 * @example
 * ```ts
 * import { ClientId } from "light-client-registry/LightClient"
 *
 * const id = ClientId(0)
 * ClientId.option(-1) // Option.none()
 * ```
 *
 * @since 0.1.0
 * @category constructors
 */
export const ClientId = Brand.refined<ClientId>(
  isNonNegativeSafeInteger,
  (n) => Brand.error(`Expected ${n} to be a non-negative integer client identifier`)
)

/**
 * Creates a height from a non-negative safe integer.
 *
 * @example
 * ```ts
 * import { Height } from "light-client-registry/LightClient"
 *
 * const h = Height(100)
 * Height.either(1.5) // Either.left(...)
 * ```
 *
 * @since 0.1.0
 * @category constructors
 */
export const Height = Brand.refined<Height>(
  isNonNegativeSafeInteger,
  (n) => Brand.error(`Expected ${n} to be a non-negative integer height`)
)

// =============================================================================
// Orders
// =============================================================================

/**
 * @since 0.1.0
 * @category orders
 */
export const ClientIdOrder: Order.Order<ClientId> = Order.number

/**
 * @since 0.1.0
 * @category orders
 */
export const HeightOrder: Order.Order<Height> = Order.number

// =============================================================================
// Identifiers
// =============================================================================

/**
 * Client type used when none is configured.
 *
 * @since 0.1.0
 * @category constants
 */
export const DEFAULT_CLIENT_TYPE = "07-tendermint"

/**
 * Renders a client identifier the way counterparties exchange it,
 * `{clientType}-{n}`.
 *
 * @example
 * ```ts
 * import { ClientId, formatClientId } from "light-client-registry/LightClient"
 *
 * formatClientId("07-tendermint", ClientId(3)) // "07-tendermint-3"
 * ```
 *
 * @since 0.1.0
 * @category identifiers
 */
export const formatClientId = (clientType: string, clientId: ClientId): string => `${clientType}-${clientId}`

/**
 * Parses a textual identifier produced by {@link formatClientId}.
 *
 * Returns `None` when the prefix does not match `clientType` or the suffix is
 * not a canonical decimal number.
 *
 * @since 0.1.0
 * @category identifiers
 */
export const parseClientId = (clientType: string, text: string): Option.Option<ClientId> => {
  const prefix = `${clientType}-`
  if (!text.startsWith(prefix)) {
    return Option.none()
  }
  const suffix = text.slice(prefix.length)
  // no sign, no leading zeros
  if (!/^(0|[1-9][0-9]*)$/.test(suffix)) {
    return Option.none()
  }
  return ClientId.option(Number(suffix))
}

// =============================================================================
// Schemas
// =============================================================================

/**
 * Schema for ClientId serialization/deserialization.
 *
 * @since 0.1.0
 * @category schemas
 */
export const ClientIdSchema = Schema.Number.pipe(Schema.fromBrand(ClientId))

/**
 * Schema for Height serialization/deserialization.
 *
 * @since 0.1.0
 * @category schemas
 */
export const HeightSchema = Schema.Number.pipe(Schema.fromBrand(Height))
