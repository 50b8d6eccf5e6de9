/**
 * Unit tests for the client registry service.
 *
 * @since 0.1.0
 */

import { describe, it, expect } from "vitest"
import * as Array from "effect/Array"
import * as Cause from "effect/Cause"
import * as ConfigProvider from "effect/ConfigProvider"
import * as Effect from "effect/Effect"
import * as Either from "effect/Either"
import * as Exit from "effect/Exit"
import * as Logger from "effect/Logger"
import * as LogLevel from "effect/LogLevel"
import * as Option from "effect/Option"
import * as STM from "effect/STM"
import * as Client from "./Client.js"
import * as ClientRegistry from "./ClientRegistry.js"
import { ClientId, Height } from "./LightClient.js"
import * as RegistryState from "./RegistryState.js"

describe("ClientRegistry", () => {
  it("should create the first client at identifier 0", async () => {
    const program = Effect.gen(function* () {
      const registry = yield* ClientRegistry.make()
      const outcome = yield* ClientRegistry.createClient(registry, Height(100))
      const state = yield* ClientRegistry.query(registry)
      return { outcome, state }
    })

    const result = await Effect.runPromise(program)
    expect(result.outcome._tag).toBe("CreateOK")
    expect(result.outcome.clientId).toBe(0)
    expect(result.state.nextClientId).toBe(1)
    expect(Client.sortedHeights(RegistryState.getClient(result.state, ClientId(0)))).toEqual([100])
  })

  it("should accept, then reject repeated and lower heights", async () => {
    const program = Effect.gen(function* () {
      const registry = yield* ClientRegistry.make()
      const { clientId } = yield* ClientRegistry.createClient(registry, Height(100))

      const accepted = yield* ClientRegistry.updateClient(registry, clientId, Height(150))
      const repeated = yield* ClientRegistry.updateClient(registry, clientId, Height(150))
      const lower = yield* ClientRegistry.updateClient(registry, clientId, Height(90))
      const client = yield* ClientRegistry.getClient(registry, clientId)

      return { accepted, repeated, lower, heights: Client.sortedHeights(client) }
    })

    const result = await Effect.runPromise(program)
    expect(result.accepted._tag).toBe("UpdateOK")
    expect(result.repeated._tag).toBe("HeaderVerificationFailure")
    expect(result.lower._tag).toBe("HeaderVerificationFailure")
    expect(result.heights).toEqual([100, 150])
  })

  it("should report ClientNotFound for a client that was never created", async () => {
    const program = Effect.gen(function* () {
      const registry = yield* ClientRegistry.make()
      const before = yield* ClientRegistry.query(registry)
      const outcome = yield* ClientRegistry.updateClient(registry, ClientId(7), Height(200))
      const after = yield* ClientRegistry.query(registry)
      const exists = yield* ClientRegistry.clientExists(registry, ClientId(7))
      return { outcome, unchanged: before === after, exists }
    })

    const result = await Effect.runPromise(program)
    expect(result.outcome._tag).toBe("ClientNotFound")
    expect(result.unchanged).toBe(true)
    expect(result.exists).toBe(false)
  })

  it("should allocate sequential identifiers with independent heights", async () => {
    const program = Effect.gen(function* () {
      const registry = yield* ClientRegistry.make()
      const first = yield* ClientRegistry.createClient(registry, Height(10))
      const second = yield* ClientRegistry.createClient(registry, Height(20))
      const firstClient = yield* ClientRegistry.getClient(registry, first.clientId)
      const secondClient = yield* ClientRegistry.getClient(registry, second.clientId)
      return {
        ids: [first.clientId, second.clientId],
        firstHeights: Client.sortedHeights(firstClient),
        secondHeights: Client.sortedHeights(secondClient)
      }
    })

    const result = await Effect.runPromise(program)
    expect(result.ids).toEqual([0, 1])
    expect(result.firstHeights).toEqual([10])
    expect(result.secondHeights).toEqual([20])
  })

  it("should be recognised by its type guard", async () => {
    const registry = await Effect.runPromise(ClientRegistry.make())

    expect(ClientRegistry.isClientRegistry(registry)).toBe(true)
    expect(ClientRegistry.isClientRegistry({ clientType: "07-tendermint" })).toBe(false)
    expect(registry.clientType).toBe("07-tendermint")
  })

  it("should support data-last calls", async () => {
    const program = Effect.gen(function* () {
      const registry = yield* ClientRegistry.make()
      const created = yield* registry.pipe(ClientRegistry.createClient(Height(5)))
      const updated = yield* registry.pipe(ClientRegistry.updateClient(created.clientId, Height(6)))
      const latest = yield* registry.pipe(ClientRegistry.latestHeight(created.clientId))
      return { updated, latest }
    })

    const result = await Effect.runPromise(program)
    expect(result.updated._tag).toBe("UpdateOK")
    expect(Option.getOrNull(result.latest)).toBe(6)
  })

  it("should not change state when reading", async () => {
    const program = Effect.gen(function* () {
      const registry = yield* ClientRegistry.make()
      const { clientId } = yield* ClientRegistry.createClient(registry, Height(100))
      const before = yield* ClientRegistry.query(registry)

      const reads = yield* Effect.forEach(Array.range(1, 5), () =>
        Effect.all([
          ClientRegistry.clientExists(registry, clientId),
          ClientRegistry.findClient(registry, clientId),
          ClientRegistry.getClient(registry, ClientId(9))
        ]))

      const after = yield* ClientRegistry.query(registry)
      return { before, after, reads }
    })

    const result = await Effect.runPromise(program)
    expect(result.after).toBe(result.before)
    for (const [exists, found, missing] of result.reads) {
      expect(exists).toBe(true)
      expect(Option.map(found, Client.sortedHeights).pipe(Option.getOrNull)).toEqual([100])
      expect(Client.exists(missing)).toBe(false)
    }
  })

  describe("concurrency", () => {
    it("should never hand out the same identifier twice", async () => {
      const program = Effect.gen(function* () {
        const registry = yield* ClientRegistry.make()
        const outcomes = yield* Effect.forEach(
          Array.range(1, 50),
          (height) => ClientRegistry.createClient(registry, Height(height)),
          { concurrency: "unbounded" }
        )
        const state = yield* ClientRegistry.query(registry)
        return { ids: outcomes.map((outcome) => outcome.clientId), state }
      })

      const result = await Effect.runPromise(program)
      expect([...result.ids].sort((a, b) => a - b)).toEqual(Array.range(0, 49))
      expect(result.state.nextClientId).toBe(50)
      expect(result.state.clients.size).toBe(50)
    })

    it("should keep heights strictly increasing under racing updates", async () => {
      const heights = [12, 5, 30, 18, 30, 25, 40]

      const program = Effect.gen(function* () {
        const registry = yield* ClientRegistry.make()
        const { clientId } = yield* ClientRegistry.createClient(registry, Height(1))
        const outcomes = yield* Effect.forEach(
          heights,
          (height) => ClientRegistry.updateClient(registry, clientId, Height(height)),
          { concurrency: "unbounded" }
        )
        const client = yield* ClientRegistry.getClient(registry, clientId)
        return { outcomes, client }
      })

      const result = await Effect.runPromise(program)
      const accepted = result.outcomes.filter((outcome) => outcome._tag === "UpdateOK")
      expect(Option.getOrNull(Client.latestHeight(result.client))).toBe(40)
      expect(result.client.heights.size).toBe(accepted.length + 1)
      const expected = [1, ...accepted.map((outcome) => outcome.height)].sort((a, b) => a - b)
      expect(Client.sortedHeights(result.client)).toEqual(expected)
    })

    it("should commit composed transactions atomically", async () => {
      const program = Effect.gen(function* () {
        const registry = yield* ClientRegistry.make()
        const [first, second] = yield* STM.commit(
          STM.all([registry.createClient(Height(1)), registry.createClient(Height(2))])
        )
        return [first.clientId, second.clientId]
      })

      const result = await Effect.runPromise(program)
      expect(result).toEqual([0, 1])
    })
  })

  describe("ModelError", () => {
    const corrupt: RegistryState.RegistryState = {
      clients: new Map([[ClientId(0), Client.make(Height(5))]]),
      nextClientId: ClientId(0)
    }

    it("should die with ModelError and leave the state unchanged", async () => {
      const program = Effect.gen(function* () {
        const registry = yield* ClientRegistry.fromState(corrupt)
        const exit = yield* Effect.exit(ClientRegistry.createClient(registry, Height(100)))
        const state = yield* ClientRegistry.query(registry)
        return { exit, state }
      }).pipe(Logger.withMinimumLogLevel(LogLevel.None))

      const result = await Effect.runPromise(program)
      expect(result.state).toBe(corrupt)
      expect(Exit.isFailure(result.exit)).toBe(true)
      if (Exit.isFailure(result.exit)) {
        const defect = Option.getOrNull(Cause.dieOption(result.exit.cause))
        expect(defect).toBeInstanceOf(RegistryState.ModelError)
        expect(Cause.isFailType(result.exit.cause)).toBe(false)
      }
    })

    it("should not be recoverable through the error channel", async () => {
      const program = Effect.gen(function* () {
        const registry = yield* ClientRegistry.fromState(corrupt)
        return yield* ClientRegistry.createClient(registry, Height(100)).pipe(
          Effect.map(() => "created"),
          Effect.catchAll(() => Effect.succeed("recovered"))
        )
      }).pipe(Logger.withMinimumLogLevel(LogLevel.None))

      const exit = await Effect.runPromiseExit(program)
      expect(Exit.isFailure(exit)).toBe(true)
    })

    it("should log the defect at FATAL before it propagates", async () => {
      const entries: { level: string; message: unknown; cause: Cause.Cause<unknown>; annotations: Record<string, unknown> }[] =
        []
      const logger = Logger.make(({ annotations, cause, logLevel, message }) => {
        entries.push({ level: logLevel.label, message, cause, annotations: Object.fromEntries(annotations) })
      })

      const program = Effect.gen(function* () {
        const registry = yield* ClientRegistry.fromState(corrupt)
        return yield* Effect.exit(ClientRegistry.createClient(registry, Height(100)))
      })

      const exit = await Effect.runPromise(
        program.pipe(
          Effect.provide(Logger.replace(Logger.defaultLogger, logger)),
          Logger.withMinimumLogLevel(LogLevel.Debug)
        )
      )

      expect(Exit.isFailure(exit)).toBe(true)
      expect(entries.map(({ level, message }) => [level, message])).toEqual([
        ["FATAL", "Client registry invariant violated"]
      ])
      const [entry] = entries
      expect(entry.cause._tag).toBe("Die")
      expect(Option.getOrNull(Cause.dieOption(entry.cause))).toBeInstanceOf(RegistryState.ModelError)
      expect(entry.annotations).toEqual({ height: 100 })
    })
  })

  describe("snapshots", () => {
    it("should encode the state for persistence", async () => {
      const program = Effect.gen(function* () {
        const registry = yield* ClientRegistry.make()
        yield* ClientRegistry.createClient(registry, Height(10))
        yield* ClientRegistry.createClient(registry, Height(20))
        return yield* ClientRegistry.snapshot(registry)
      })

      const result = await Effect.runPromise(program)
      expect(result).toEqual({
        clients: [
          [0, { heights: [10] }],
          [1, { heights: [20] }]
        ],
        nextClientId: 2
      })
    })

    it("should restore a snapshot and continue allocating after it", async () => {
      const program = Effect.gen(function* () {
        const registry = yield* ClientRegistry.restore(
          { clients: [[0, { heights: [10] }], [1, { heights: [20] }]], nextClientId: 2 },
          { clientType: "06-solomachine" }
        )
        const created = yield* ClientRegistry.createClient(registry, Height(30))
        const stale = yield* ClientRegistry.updateClient(registry, ClientId(1), Height(20))
        return { created, stale, clientType: registry.clientType }
      })

      const result = await Effect.runPromise(program)
      expect(result.created.clientId).toBe(2)
      expect(result.stale._tag).toBe("HeaderVerificationFailure")
      expect(result.clientType).toBe("06-solomachine")
    })

    it("should refuse a snapshot that breaks the invariants", async () => {
      const program = ClientRegistry.restore({ clients: [[4, { heights: [1] }]], nextClientId: 2 }).pipe(
        Effect.flip
      )

      const error = await Effect.runPromise(program)
      expect(error._tag).toBe("ParseError")
    })
  })

  describe("layers", () => {
    it("should provide the registry through its tag", async () => {
      const program = Effect.gen(function* () {
        const registry = yield* ClientRegistry.ClientRegistry
        return yield* ClientRegistry.createClient(registry, Height(1))
      })

      const result = await Effect.runPromise(
        program.pipe(Effect.provide(ClientRegistry.layer({ idOrigin: ClientId(3) })))
      )
      expect(result.clientId).toBe(3)
    })

    it("should provide a registry over a loaded state", async () => {
      const [, state] = Either.getOrThrow(RegistryState.createClient(RegistryState.empty(), Height(42)))

      const program = Effect.gen(function* () {
        const registry = yield* ClientRegistry.ClientRegistry
        return yield* ClientRegistry.latestHeight(registry, ClientId(0))
      })

      const result = await Effect.runPromise(program.pipe(Effect.provide(ClientRegistry.layerFromState(state))))
      expect(Option.getOrNull(result)).toBe(42)
    })

    it("should read its options from configuration", async () => {
      const provider = ConfigProvider.fromMap(
        new Map([
          ["CLIENT_REGISTRY.CLIENT_TYPE", "06-solomachine"],
          ["CLIENT_REGISTRY.ID_ORIGIN", "5"]
        ])
      )

      const program = Effect.gen(function* () {
        const registry = yield* ClientRegistry.ClientRegistry
        const created = yield* ClientRegistry.createClient(registry, Height(1))
        return { clientId: created.clientId, clientType: registry.clientType }
      })

      const result = await Effect.runPromise(
        program.pipe(Effect.provide(ClientRegistry.layerConfig), Effect.withConfigProvider(provider))
      )
      expect(result).toEqual({ clientId: 5, clientType: "06-solomachine" })
    })

    it("should fall back to defaults when configuration is missing", async () => {
      const program = Effect.gen(function* () {
        const registry = yield* ClientRegistry.ClientRegistry
        const created = yield* ClientRegistry.createClient(registry, Height(1))
        return { clientId: created.clientId, clientType: registry.clientType }
      })

      const result = await Effect.runPromise(
        program.pipe(
          Effect.provide(ClientRegistry.layerConfig),
          Effect.withConfigProvider(ConfigProvider.fromMap(new Map()))
        )
      )
      expect(result).toEqual({ clientId: 0, clientType: "07-tendermint" })
    })

    it("should fail on an invalid identifier origin", async () => {
      const provider = ConfigProvider.fromMap(new Map([["CLIENT_REGISTRY.ID_ORIGIN", "-3"]]))

      const exit = await Effect.runPromiseExit(
        Effect.void.pipe(Effect.provide(ClientRegistry.layerConfig), Effect.withConfigProvider(provider))
      )
      expect(Exit.isFailure(exit)).toBe(true)
    })
  })

  describe("logging", () => {
    it("should annotate logs with the client, height and outcome", async () => {
      const entries: { level: string; annotations: Record<string, unknown> }[] = []
      const logger = Logger.make(({ annotations, logLevel }) => {
        entries.push({ level: logLevel.label, annotations: Object.fromEntries(annotations) })
      })

      const program = Effect.gen(function* () {
        const registry = yield* ClientRegistry.make()
        const { clientId } = yield* ClientRegistry.createClient(registry, Height(100))
        yield* ClientRegistry.updateClient(registry, clientId, Height(90))
      })

      await Effect.runPromise(
        program.pipe(
          Effect.provide(Logger.replace(Logger.defaultLogger, logger)),
          Logger.withMinimumLogLevel(LogLevel.Debug)
        )
      )

      expect(entries).toEqual([
        {
          level: "DEBUG",
          annotations: { height: 100, clientId: "07-tendermint-0", outcome: "CreateOK" }
        },
        {
          level: "DEBUG",
          annotations: { height: 90, clientId: "07-tendermint-0", outcome: "HeaderVerificationFailure" }
        }
      ])
    })
  })
})
