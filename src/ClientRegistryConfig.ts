/**
 * Configuration of a client registry.
 *
 * Read from the `CLIENT_REGISTRY` namespace of the active `ConfigProvider`
 * (environment variables `CLIENT_REGISTRY_CLIENT_TYPE` and
 * `CLIENT_REGISTRY_ID_ORIGIN` by default).
 *
 * @since 0.1.0
 */
import * as Config from "effect/Config"
import { ClientId, DEFAULT_CLIENT_TYPE } from "./LightClient.js"

/**
 * @since 0.1.0
 * @category models
 */
export interface ClientRegistryConfig {
  /** Prefix of textual client identifiers, e.g. `07-tendermint`. */
  readonly clientType: string
  /** First identifier the registry allocates. */
  readonly idOrigin: ClientId
}

/**
 * @since 0.1.0
 * @category constants
 */
export const defaults: ClientRegistryConfig = {
  clientType: DEFAULT_CLIENT_TYPE,
  idOrigin: ClientId(0)
}

/**
 * @since 0.1.0
 * @category config
 */
export const ClientRegistryConfig: Config.Config<ClientRegistryConfig> = Config.all({
  clientType: Config.string("CLIENT_TYPE").pipe(
    Config.validate({
      message: "Expected a non-empty client type",
      validation: (clientType: string) => clientType.length > 0
    }),
    Config.withDefault(defaults.clientType)
  ),
  idOrigin: Config.integer("ID_ORIGIN").pipe(
    Config.validate({
      message: "Expected a non-negative integer client identifier",
      validation: ClientId.is
    }),
    Config.withDefault(defaults.idOrigin)
  )
}).pipe(Config.nested("CLIENT_REGISTRY"))
