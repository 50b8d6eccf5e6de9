/**
 * Client registry service.
 *
 * Owns the mapping from client identifiers to clients and the identifier
 * counter. The whole state lives in a single `TRef`, and every operation is
 * one STM transaction over it. Creates and updates are linearizable:
 * concurrent fibers never observe the same `nextClientId` or the same stale
 * height set. No operation performs I/O or waits on anything but the
 * transaction itself.
 *
 * Recoverable rejections (`ClientNotFound`, `HeaderVerificationFailure`) are
 * returned as outcomes. A `ModelError` is raised as a defect and logged at
 * FATAL level on its way out.
 *
 * @since 0.1.0
 */

import type * as ConfigError from "effect/ConfigError"
import * as Context from "effect/Context"
import * as Effect from "effect/Effect"
import * as Either from "effect/Either"
import { dual, pipe } from "effect/Function"
import * as Layer from "effect/Layer"
import type * as Option from "effect/Option"
import type * as ParseResult from "effect/ParseResult"
import type { Pipeable } from "effect/Pipeable"
import * as Schema from "effect/Schema"
import * as STM from "effect/STM"
import * as TRef from "effect/TRef"
import type { Mutable } from "effect/Types"
import type * as Client from "./Client.js"
import { ClientRegistryConfig, defaults } from "./ClientRegistryConfig.js"
import { hasTypeId, makeProtoBase } from "./internal/proto.js"
import { type ClientId, formatClientId, type Height } from "./LightClient.js"
import type { CreateOK, UpdateOutcome } from "./Outcome.js"
import * as RegistryState from "./RegistryState.js"

// =============================================================================
// Symbols
// =============================================================================

/**
 * Client registry type identifier.
 *
 * @since 0.1.0
 * @category symbols
 */
export const ClientRegistryTypeId: unique symbol = Symbol.for("light-client-registry/ClientRegistry")

/**
 * Client registry type identifier type.
 *
 * @since 0.1.0
 * @category symbols
 */
export type ClientRegistryTypeId = typeof ClientRegistryTypeId

// =============================================================================
// Models
// =============================================================================

/**
 * A transactional client registry.
 *
 * Every member is an STM transaction, so registry steps compose with each
 * other (and with other STM code) into a single atomic transaction.
 *
 * @since 0.1.0
 * @category models
 */
export interface ClientRegistry extends Pipeable {
  readonly [ClientRegistryTypeId]: ClientRegistryTypeId

  /** Prefix of the textual identifiers used in logs. */
  readonly clientType: string

  /** Snapshot of the whole state. */
  readonly query: STM.STM<RegistryState.RegistryState>

  readonly clientExists: (clientId: ClientId) => STM.STM<boolean>

  /** The stored client, or the absent client. */
  readonly getClient: (clientId: ClientId) => STM.STM<Client.Client>

  readonly findClient: (clientId: ClientId) => STM.STM<Option.Option<Client.Client>>

  readonly latestHeight: (clientId: ClientId) => STM.STM<Option.Option<Height>>

  /** Dies with `ModelError` if the allocated identifier is already taken. */
  readonly createClient: (height: Height) => STM.STM<CreateOK>

  readonly updateClient: (clientId: ClientId, height: Height) => STM.STM<UpdateOutcome>
}

/**
 * Options accepted by the registry constructors.
 *
 * @since 0.1.0
 * @category models
 */
export interface Options {
  readonly clientType?: string
  readonly idOrigin?: ClientId
}

// =============================================================================
// Tags
// =============================================================================

/**
 * Client registry service tag for dependency injection.
 *
 * @example
 * ```ts
 * import * as ClientRegistry from "light-client-registry/ClientRegistry"
 * import { Height } from "light-client-registry/LightClient"
 * import * as Effect from "effect/Effect"
 *
 * const program = Effect.gen(function* () {
 *   const registry = yield* ClientRegistry.ClientRegistry
 *   const created = yield* ClientRegistry.createClient(registry, Height(100))
 *   return yield* ClientRegistry.updateClient(registry, created.clientId, Height(150))
 * })
 *
 * Effect.runPromise(program.pipe(Effect.provide(ClientRegistry.layer())))
 * ```
 *
 * @since 0.1.0
 * @category tags
 */
export const ClientRegistry: Context.Tag<ClientRegistry, ClientRegistry> = Context.GenericTag<ClientRegistry>(
  "light-client-registry/ClientRegistry"
)

// =============================================================================
// Type Guards
// =============================================================================

const hasClientRegistryTypeId = hasTypeId(ClientRegistryTypeId)

/**
 * @since 0.1.0
 * @category guards
 */
export const isClientRegistry = (u: unknown): u is ClientRegistry => hasClientRegistryTypeId(u)

// =============================================================================
// Proto Objects
// =============================================================================

/** @internal */
const ProtoClientRegistry = {
  ...makeProtoBase(ClientRegistryTypeId),
  toJSON(this: ClientRegistry) {
    return {
      _id: "ClientRegistry",
      clientType: this.clientType
    }
  }
}

// =============================================================================
// Constructors
// =============================================================================

/**
 * Internal constructor for the registry.
 *
 * @internal
 */
const makeClientRegistry = (
  clientType: string,
  stateRef: TRef.TRef<RegistryState.RegistryState>
): ClientRegistry => {
  const registry: Mutable<ClientRegistry> = Object.create(ProtoClientRegistry)
  registry.clientType = clientType

  registry.query = TRef.get(stateRef)

  registry.clientExists = (clientId) =>
    STM.map(TRef.get(stateRef), (state) => RegistryState.clientExists(state, clientId))

  registry.getClient = (clientId) => STM.map(TRef.get(stateRef), (state) => RegistryState.getClient(state, clientId))

  registry.findClient = (clientId) =>
    STM.map(TRef.get(stateRef), (state) => RegistryState.findClient(state, clientId))

  registry.latestHeight = (clientId) =>
    STM.map(TRef.get(stateRef), (state) => RegistryState.latestHeight(state, clientId))

  registry.createClient = (height) =>
    pipe(
      TRef.get(stateRef),
      STM.flatMap((state) =>
        Either.match(RegistryState.createClient(state, height), {
          onLeft: (error) => STM.die(error),
          onRight: ([outcome, next]) => pipe(TRef.set(stateRef, next), STM.as(outcome))
        })
      )
    )

  registry.updateClient = (clientId, height) =>
    TRef.modify(stateRef, (state) => RegistryState.updateClient(state, clientId, height))

  return registry
}

/**
 * Creates a registry over an existing state.
 *
 * The state is trusted as given; decode untrusted snapshots with
 * {@link restore}.
 *
 * @since 0.1.0
 * @category constructors
 */
export const fromState = (
  state: RegistryState.RegistryState,
  options: Pick<Options, "clientType"> = {}
): Effect.Effect<ClientRegistry> =>
  Effect.map(STM.commit(TRef.make(state)), (stateRef) =>
    makeClientRegistry(options.clientType ?? defaults.clientType, stateRef))

/**
 * Creates an empty registry.
 *
 * @example
 * ```ts
 * import * as ClientRegistry from "light-client-registry/ClientRegistry"
 * import { ClientId } from "light-client-registry/LightClient"
 * import * as Effect from "effect/Effect"
 *
 * const program = Effect.gen(function* () {
 *   const registry = yield* ClientRegistry.make({ idOrigin: ClientId(10) })
 *   // first client gets identifier 10
 * })
 * ```
 *
 * @since 0.1.0
 * @category constructors
 */
export const make = (options: Options = {}): Effect.Effect<ClientRegistry> =>
  fromState(RegistryState.empty(options.idOrigin ?? defaults.idOrigin), options)

/**
 * Decodes an encoded snapshot and creates a registry over it.
 *
 * Fails with `ParseError` when the snapshot is malformed or breaks the
 * registry invariants.
 *
 * @since 0.1.0
 * @category constructors
 */
export const restore = (
  snapshot: unknown,
  options: Pick<Options, "clientType"> = {}
): Effect.Effect<ClientRegistry, ParseResult.ParseError> =>
  pipe(
    Schema.decodeUnknown(RegistryState.RegistryStateSchema)(snapshot),
    Effect.flatMap((state) => fromState(state, options)),
    Effect.tap((registry) =>
      Effect.logDebug("Client registry restored").pipe(Effect.annotateLogs("clientType", registry.clientType))
    )
  )

// =============================================================================
// Operations
// =============================================================================

const describeUpdate = (outcome: UpdateOutcome): string => {
  switch (outcome._tag) {
    case "UpdateOK":
      return "Client updated"
    case "ClientNotFound":
      return "Client update rejected: client not found"
    case "HeaderVerificationFailure":
      return `Client update rejected: height is not above latest height ${outcome.latestHeight}`
  }
}

/**
 * Creates a client anchored at `height`, which the caller has already
 * verified against the counterparty chain.
 *
 * A `ModelError` defect means the registry state is corrupt; it is logged and
 * never recovered here.
 *
 * @example
 * ```ts
 * import * as ClientRegistry from "light-client-registry/ClientRegistry"
 * import { Height } from "light-client-registry/LightClient"
 * import * as Effect from "effect/Effect"
 * import { pipe } from "effect/Function"
 *
 * const program = Effect.gen(function* () {
 *   const registry = yield* ClientRegistry.ClientRegistry
 *
 *   // Data-first
 *   const first = yield* ClientRegistry.createClient(registry, Height(100))
 *
 *   // Data-last (with pipe)
 *   const second = yield* pipe(registry, ClientRegistry.createClient(Height(20)))
 *
 *   console.log(first.clientId, second.clientId) // 0 1
 * })
 * ```
 *
 * @since 0.1.0
 * @category operations
 */
export const createClient: {
  (height: Height): (self: ClientRegistry) => Effect.Effect<CreateOK>
  (self: ClientRegistry, height: Height): Effect.Effect<CreateOK>
} = dual(
  2,
  (self: ClientRegistry, height: Height): Effect.Effect<CreateOK> =>
    pipe(
      STM.commit(self.createClient(height)),
      Effect.tap((outcome) =>
        Effect.logDebug("Client created").pipe(
          Effect.annotateLogs({
            clientId: formatClientId(self.clientType, outcome.clientId),
            outcome: outcome._tag
          })
        )
      ),
      Effect.tapDefect((cause) => Effect.logFatal("Client registry invariant violated", cause)),
      Effect.annotateLogs("height", height),
      Effect.withLogSpan("ClientRegistry.createClient")
    )
)

/**
 * Records a newly verified `height` against an existing client.
 *
 * Accepted only when `height` is strictly greater than the client's latest
 * height; otherwise the registry is left unchanged and the rejection is
 * returned as an outcome.
 *
 * @since 0.1.0
 * @category operations
 */
export const updateClient: {
  (clientId: ClientId, height: Height): (self: ClientRegistry) => Effect.Effect<UpdateOutcome>
  (self: ClientRegistry, clientId: ClientId, height: Height): Effect.Effect<UpdateOutcome>
} = dual(
  3,
  (self: ClientRegistry, clientId: ClientId, height: Height): Effect.Effect<UpdateOutcome> =>
    pipe(
      STM.commit(self.updateClient(clientId, height)),
      Effect.tap((outcome) =>
        Effect.logDebug(describeUpdate(outcome)).pipe(Effect.annotateLogs("outcome", outcome._tag))
      ),
      Effect.annotateLogs({
        clientId: formatClientId(self.clientType, clientId),
        height
      }),
      Effect.withLogSpan("ClientRegistry.updateClient")
    )
)

// =============================================================================
// Getters
// =============================================================================

/**
 * @since 0.1.0
 * @category getters
 */
export const clientExists: {
  (clientId: ClientId): (self: ClientRegistry) => STM.STM<boolean>
  (self: ClientRegistry, clientId: ClientId): STM.STM<boolean>
} = dual(2, (self: ClientRegistry, clientId: ClientId): STM.STM<boolean> => self.clientExists(clientId))

/**
 * Returns a copy of the stored client, or the absent client (empty height set)
 * for an identifier that was never allocated. Check {@link clientExists} before
 * trusting its heights.
 *
 * @since 0.1.0
 * @category getters
 */
export const getClient: {
  (clientId: ClientId): (self: ClientRegistry) => STM.STM<Client.Client>
  (self: ClientRegistry, clientId: ClientId): STM.STM<Client.Client>
} = dual(2, (self: ClientRegistry, clientId: ClientId): STM.STM<Client.Client> => self.getClient(clientId))

/**
 * @since 0.1.0
 * @category getters
 */
export const findClient: {
  (clientId: ClientId): (self: ClientRegistry) => STM.STM<Option.Option<Client.Client>>
  (self: ClientRegistry, clientId: ClientId): STM.STM<Option.Option<Client.Client>>
} = dual(
  2,
  (self: ClientRegistry, clientId: ClientId): STM.STM<Option.Option<Client.Client>> => self.findClient(clientId)
)

/**
 * @since 0.1.0
 * @category getters
 */
export const latestHeight: {
  (clientId: ClientId): (self: ClientRegistry) => STM.STM<Option.Option<Height>>
  (self: ClientRegistry, clientId: ClientId): STM.STM<Option.Option<Height>>
} = dual(
  2,
  (self: ClientRegistry, clientId: ClientId): STM.STM<Option.Option<Height>> => self.latestHeight(clientId)
)

/**
 * Get the current state of a registry.
 *
 * @since 0.1.0
 * @category getters
 */
export const query = (self: ClientRegistry): STM.STM<RegistryState.RegistryState> => self.query

/**
 * Encodes the current state for a persistence layer.
 *
 * @since 0.1.0
 * @category getters
 */
export const snapshot = (
  self: ClientRegistry
): Effect.Effect<RegistryState.RegistryStateEncoded, ParseResult.ParseError> =>
  pipe(STM.commit(self.query), Effect.flatMap(Schema.encode(RegistryState.RegistryStateSchema)))

// =============================================================================
// Layers
// =============================================================================

/**
 * Creates a live layer with an empty registry.
 *
 * State is held in memory; persisting it is up to the caller (see
 * {@link snapshot} and {@link restore}).
 *
 * @since 0.1.0
 * @category layers
 */
export const layer = (options: Options = {}): Layer.Layer<ClientRegistry> =>
  Layer.effect(ClientRegistry, make(options))

/**
 * Creates a layer whose options are read from {@link ClientRegistryConfig}.
 *
 * @example
 * ```ts
 * import * as ClientRegistry from "light-client-registry/ClientRegistry"
 * import * as ConfigProvider from "effect/ConfigProvider"
 * import * as Effect from "effect/Effect"
 *
 * const provider = ConfigProvider.fromMap(new Map([["CLIENT_REGISTRY.ID_ORIGIN", "5"]]))
 *
 * const program = Effect.gen(function* () {
 *   const registry = yield* ClientRegistry.ClientRegistry
 *   // ...
 * }).pipe(Effect.provide(ClientRegistry.layerConfig), Effect.withConfigProvider(provider))
 * ```
 *
 * @since 0.1.0
 * @category layers
 */
export const layerConfig: Layer.Layer<ClientRegistry, ConfigError.ConfigError> = Layer.effect(
  ClientRegistry,
  Effect.flatMap(ClientRegistryConfig, (config) => make(config))
)

/**
 * Creates a layer over an already loaded state.
 *
 * @since 0.1.0
 * @category layers
 */
export const layerFromState = (
  state: RegistryState.RegistryState,
  options: Pick<Options, "clientType"> = {}
): Layer.Layer<ClientRegistry> => Layer.effect(ClientRegistry, fromState(state, options))
