/**
 * Pure client-registry state and its transitions.
 *
 * The registry state is a partial mapping from client identifiers to clients
 * plus the next identifier to allocate. Every transition is a pure function
 * `(state, request) -> (outcome, state)`; rejected requests return the input
 * state unchanged (the same reference).
 *
 * Invariants held by every state reachable through these transitions:
 * - every stored client has a non-empty height set;
 * - `nextClientId` is greater than every stored identifier;
 * - a client's heights only grow, and each accepted height is greater than
 *   every height accepted before it.
 *
 * @since 0.1.0
 */
import * as Data from "effect/Data"
import * as Either from "effect/Either"
import * as Option from "effect/Option"
import * as Schema from "effect/Schema"
import * as Client from "./Client.js"
import { setEntry } from "./internal/merge.js"
import { ClientId, ClientIdSchema, type Height } from "./LightClient.js"
import { type CreateOK, Outcome, type UpdateOutcome } from "./Outcome.js"

// =============================================================================
// Models
// =============================================================================

/**
 * Snapshot of the whole registry.
 *
 * @since 0.1.0
 * @category models
 */
export interface RegistryState {
  readonly clients: ReadonlyMap<ClientId, Client.Client>
  readonly nextClientId: ClientId
}

/**
 * A request to the registry.
 *
 * @since 0.1.0
 * @category models
 */
export type ClientRequest = Data.TaggedEnum<{
  CreateClient: { readonly height: Height }
  UpdateClient: { readonly clientId: ClientId; readonly height: Height }
}>

/**
 * @since 0.1.0
 * @category constructors
 */
export const ClientRequest = Data.taggedEnum<ClientRequest>()

// =============================================================================
// Errors
// =============================================================================

/**
 * Raised when the allocator and the client map disagree, or when the
 * identifier space is exhausted. Never a protocol outcome: callers treat it as
 * a fatal defect.
 *
 * @since 0.1.0
 * @category errors
 */
export class ModelError extends Data.TaggedError("ModelError")<{
  readonly message: string
  readonly clientId: ClientId
}> {}

// =============================================================================
// Constructors
// =============================================================================

/**
 * Creates an empty registry whose first allocated identifier is `origin`.
 *
 * @since 0.1.0
 * @category constructors
 */
export const empty = (origin: ClientId = ClientId(0)): RegistryState => ({
  clients: new Map(),
  nextClientId: origin
})

// =============================================================================
// Getters
// =============================================================================

const lookup = (self: RegistryState, clientId: ClientId): Option.Option<Client.Client> =>
  Option.fromNullable(self.clients.get(clientId))

/**
 * Looks up a stored client. The result is a copy of the stored record.
 *
 * @since 0.1.0
 * @category getters
 */
export const findClient = (self: RegistryState, clientId: ClientId): Option.Option<Client.Client> =>
  Option.map(lookup(self, clientId), Client.copy)

/**
 * Returns a copy of the client for `clientId`, or a fresh absent client if
 * none is stored.
 *
 * @since 0.1.0
 * @category getters
 */
export const getClient = (self: RegistryState, clientId: ClientId): Client.Client =>
  Option.getOrElse(findClient(self, clientId), Client.absent)

/**
 * @since 0.1.0
 * @category getters
 */
export const clientExists = (self: RegistryState, clientId: ClientId): boolean =>
  Option.exists(lookup(self, clientId), Client.exists)

/**
 * @since 0.1.0
 * @category getters
 */
export const latestHeight = (self: RegistryState, clientId: ClientId): Option.Option<Height> =>
  Option.flatMap(lookup(self, clientId), Client.latestHeight)

// =============================================================================
// Transitions
// =============================================================================

/**
 * Allocates `nextClientId` for a new client anchored at `height`.
 *
 * Fails with `ModelError`, leaving no new state, when the identifier is
 * already taken or cannot be followed by another safe integer.
 *
 * @example
 * ```ts
 * import * as RegistryState from "light-client-registry/RegistryState"
 * import { Height } from "light-client-registry/LightClient"
 * import * as Either from "effect/Either"
 *
 * const [outcome, next] = Either.getOrThrow(RegistryState.createClient(RegistryState.empty(), Height(100)))
 * outcome.clientId // 0
 * next.nextClientId // 1
 * ```
 *
 * @since 0.1.0
 * @category transitions
 */
export const createClient = (
  self: RegistryState,
  height: Height
): Either.Either<readonly [CreateOK, RegistryState], ModelError> => {
  const clientId = self.nextClientId
  if (clientExists(self, clientId)) {
    return Either.left(
      new ModelError({ message: `Client identifier ${clientId} is already allocated`, clientId })
    )
  }
  if (clientId >= Number.MAX_SAFE_INTEGER) {
    return Either.left(new ModelError({ message: "Client identifier space is exhausted", clientId }))
  }
  const next: RegistryState = {
    clients: setEntry(self.clients, clientId, Client.make(height)),
    nextClientId: ClientId(clientId + 1)
  }
  return Either.right([Outcome.CreateOK({ clientId, height }), next] as const)
}

/**
 * Records `height` against an existing client if it is strictly greater than
 * the client's latest height.
 *
 * @since 0.1.0
 * @category transitions
 */
export const updateClient = (
  self: RegistryState,
  clientId: ClientId,
  height: Height
): readonly [UpdateOutcome, RegistryState] => {
  const client = Option.getOrElse(lookup(self, clientId), Client.absent)
  return Option.match(Client.latestHeight(client), {
    // absent client
    onNone: () => [Outcome.ClientNotFound({ clientId, height }), self] as const,
    onSome: (latest) =>
      latest < height
        ? [
          Outcome.UpdateOK({ clientId, height }),
          { ...self, clients: setEntry(self.clients, clientId, Client.recordHeight(client, height)) }
        ] as const
        : [Outcome.HeaderVerificationFailure({ clientId, height, latestHeight: latest }), self] as const
  })
}

/**
 * Applies one request.
 *
 * @since 0.1.0
 * @category transitions
 */
export const transition = (
  self: RegistryState,
  request: ClientRequest
): Either.Either<readonly [Outcome, RegistryState], ModelError> =>
  ClientRequest.$match(request, {
    CreateClient: ({ height }) => createClient(self, height),
    UpdateClient: ({ clientId, height }) => Either.right(updateClient(self, clientId, height))
  })

/**
 * Applies requests in order, stopping at the first `ModelError`.
 *
 * @since 0.1.0
 * @category transitions
 */
export const transitionAll = (
  self: RegistryState,
  requests: Iterable<ClientRequest>
): Either.Either<readonly [ReadonlyArray<Outcome>, RegistryState], ModelError> => {
  const outcomes: Outcome[] = []
  let state = self
  for (const request of requests) {
    const result = transition(state, request)
    if (Either.isLeft(result)) {
      return Either.left(result.left)
    }
    const [outcome, next] = result.right
    outcomes.push(outcome)
    state = next
  }
  return Either.right([outcomes, state] as const)
}

// =============================================================================
// Schemas
// =============================================================================

const checkInvariants = (state: RegistryState): true | string => {
  for (const [clientId, client] of state.clients) {
    if (!Client.exists(client)) {
      return `Client ${clientId} has no heights`
    }
    if (clientId >= state.nextClientId) {
      return `Client ${clientId} is not below nextClientId ${state.nextClientId}`
    }
  }
  return true
}

const ClientMapSchema = Schema.ReadonlyMap({ key: ClientIdSchema, value: Client.ClientSchema })

const findDuplicateId = (entries: ReadonlyArray<readonly [number, unknown]>): Option.Option<number> => {
  const seen = new Set<number>()
  for (const [clientId] of entries) {
    if (seen.has(clientId)) {
      return Option.some(clientId)
    }
    seen.add(clientId)
  }
  return Option.none()
}

// A map decode keeps only the last of repeated keys; reject them on the wire.
const ClientEntriesSchema = Schema.encodedSchema(ClientMapSchema).pipe(
  Schema.filter((entries) =>
    Option.match(findDuplicateId(entries), {
      onNone: () => true,
      onSome: (clientId) => `Client ${clientId} appears more than once`
    })
  ),
  Schema.compose(ClientMapSchema)
)

/**
 * Schema for registry snapshots handed to a persistence layer.
 *
 * Decoding rejects snapshots that break the registry invariants.
 *
 * @since 0.1.0
 * @category schemas
 */
export const RegistryStateSchema = Schema.Struct({
  clients: ClientEntriesSchema,
  nextClientId: ClientIdSchema
}).pipe(
  Schema.filter(checkInvariants),
  Schema.annotations({
    identifier: "RegistryState",
    title: "Client Registry State",
    description: "Snapshot of every tracked client and the next identifier to allocate"
  })
)

/**
 * Encoded (JSON-safe) form of a snapshot.
 *
 * @since 0.1.0
 * @category schemas
 */
export type RegistryStateEncoded = Schema.Schema.Encoded<typeof RegistryStateSchema>
