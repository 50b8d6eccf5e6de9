/**
 * Example: a relayer keeping a client in step with a counterparty chain.
 *
 * Heights arrive out of order from several relayer fibers. The registry
 * accepts each height only if it advances the client, and the rejected ones
 * are reported as outcomes.
 *
 * @since 0.1.0
 */

import * as Console from "effect/Console"
import * as Effect from "effect/Effect"
import * as Logger from "effect/Logger"
import * as LogLevel from "effect/LogLevel"
import * as STM from "effect/STM"
import * as Client from "../src/Client.js"
import * as ClientRegistry from "../src/ClientRegistry.js"
import { ClientId, formatClientId, Height } from "../src/LightClient.js"

// Example 1: create, advance, and get rejected
const singleClient = Effect.gen(function* () {
  yield* Console.log("=== Single client ===")

  const registry = yield* ClientRegistry.ClientRegistry

  const created = yield* ClientRegistry.createClient(registry, Height(100))
  yield* Console.log("Created", formatClientId(registry.clientType, created.clientId))

  for (const height of [150, 150, 90, 200]) {
    const outcome = yield* ClientRegistry.updateClient(registry, created.clientId, Height(height))
    yield* Console.log(`update(${height}) ->`, outcome._tag)
  }

  const unknown = yield* ClientRegistry.updateClient(registry, ClientId(7), Height(200))
  yield* Console.log("update on unknown client ->", unknown._tag)

  const client = yield* ClientRegistry.getClient(registry, created.clientId)
  yield* Console.log("Accepted heights:", Client.sortedHeights(client))
})

// Example 2: concurrent relayers racing on the same client
const racingRelayers = Effect.gen(function* () {
  yield* Console.log("\n=== Racing relayers ===")

  const registry = yield* ClientRegistry.make()
  const { clientId } = yield* ClientRegistry.createClient(registry, Height(1))

  const heights = [12, 5, 30, 18, 30, 25, 40]
  const outcomes = yield* Effect.forEach(
    heights,
    (height) => ClientRegistry.updateClient(registry, clientId, Height(height)),
    { concurrency: "unbounded" }
  )

  const accepted = outcomes.filter((outcome) => outcome._tag === "UpdateOK").length
  yield* Console.log(`${accepted} of ${heights.length} updates accepted`)

  const latest = yield* STM.commit(registry.latestHeight(clientId))
  yield* Console.log("Latest height:", latest)
})

// Example 3: hand the state to a persistence layer and bring it back
const snapshotRoundTrip = Effect.gen(function* () {
  yield* Console.log("\n=== Snapshot ===")

  const registry = yield* ClientRegistry.make()
  yield* ClientRegistry.createClient(registry, Height(10))
  yield* ClientRegistry.createClient(registry, Height(20))

  const encoded = yield* ClientRegistry.snapshot(registry)
  yield* Console.log("Encoded:", JSON.stringify(encoded))

  const restored = yield* ClientRegistry.restore(JSON.parse(JSON.stringify(encoded)))
  const next = yield* ClientRegistry.createClient(restored, Height(30))
  yield* Console.log("Next identifier after restore:", next.clientId)
})

const program = Effect.gen(function* () {
  yield* singleClient.pipe(Effect.provide(ClientRegistry.layer()))
  yield* racingRelayers
  yield* snapshotRoundTrip
}).pipe(Logger.withMinimumLogLevel(LogLevel.Debug))

Effect.runPromise(program).catch(console.error)
