/**
 * Registry outcomes.
 *
 * Every registry operation that can be rejected reports a value from this
 * closed enumeration. Rejections (`ClientNotFound`,
 * `HeaderVerificationFailure`) are ordinary results the caller branches on.
 * Internal invariant violations are not outcomes: they are raised as
 * `ModelError` defects by the registry.
 *
 * @since 0.1.0
 */
import * as Data from "effect/Data"
import * as Schema from "effect/Schema"
import type { ClientId, Height } from "./LightClient.js"

// =============================================================================
// Models
// =============================================================================

/**
 * Recoverable outcome of a registry operation.
 *
 * @since 0.1.0
 * @category models
 */
export type Outcome = Data.TaggedEnum<{
  CreateOK: {
    readonly clientId: ClientId
    readonly height: Height
  }
  UpdateOK: {
    readonly clientId: ClientId
    readonly height: Height
  }
  ClientNotFound: {
    readonly clientId: ClientId
    readonly height: Height
  }
  HeaderVerificationFailure: {
    readonly clientId: ClientId
    readonly height: Height
    readonly latestHeight: Height
  }
}>

/**
 * Constructors, guards and matcher for {@link Outcome}.
 *
 * @example
 * ```ts
 * import { Outcome } from "light-client-registry/Outcome"
 * import { ClientId, Height } from "light-client-registry/LightClient"
 *
 * const outcome = Outcome.UpdateOK({ clientId: ClientId(0), height: Height(150) })
 * Outcome.$is("UpdateOK")(outcome) // true
 * ```
 *
 * @since 0.1.0
 * @category constructors
 */
export const Outcome = Data.taggedEnum<Outcome>()

/**
 * @since 0.1.0
 * @category models
 */
export type CreateOK = Data.TaggedEnum.Value<Outcome, "CreateOK">

/**
 * Outcomes `updateClient` can report.
 *
 * @since 0.1.0
 * @category models
 */
export type UpdateOutcome = Data.TaggedEnum.Value<
  Outcome,
  "UpdateOK" | "ClientNotFound" | "HeaderVerificationFailure"
>

/**
 * Every tag a registry operation can end with, the fatal `ModelError`
 * included.
 *
 * @since 0.1.0
 * @category models
 */
export type OutcomeTag = Outcome["_tag"] | "ModelError"

// =============================================================================
// Guards
// =============================================================================

/**
 * True for outcomes that changed the registry.
 *
 * @since 0.1.0
 * @category guards
 */
export const isAccepted = (self: Outcome): self is Data.TaggedEnum.Value<Outcome, "CreateOK" | "UpdateOK"> =>
  self._tag === "CreateOK" || self._tag === "UpdateOK"

/**
 * True for protocol rejections. The registry is unchanged after these.
 *
 * @since 0.1.0
 * @category guards
 */
export const isRejected = (
  self: Outcome
): self is Data.TaggedEnum.Value<Outcome, "ClientNotFound" | "HeaderVerificationFailure"> => !isAccepted(self)

// =============================================================================
// Schemas
// =============================================================================

/**
 * Schema of the outcome tags, for callers that report outcomes on a wire.
 *
 * @since 0.1.0
 * @category schemas
 */
export const OutcomeTagSchema: Schema.Schema<OutcomeTag> = Schema.Literal(
  "CreateOK",
  "UpdateOK",
  "ClientNotFound",
  "HeaderVerificationFailure",
  "ModelError"
)
