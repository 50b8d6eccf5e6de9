/**
 * @since 0.1.0
 */

/**
 * Light-client record: accepted heights of one counterparty chain.
 *
 * @since 0.1.0
 */
export * as Client from "./Client.js"

/**
 * Transactional client registry service.
 *
 * @since 0.1.0
 */
export * as ClientRegistry from "./ClientRegistry.js"

/**
 * Configuration of the client registry.
 *
 * @since 0.1.0
 */
export * as ClientRegistryConfig from "./ClientRegistryConfig.js"

/**
 * Branded client identifiers and heights.
 *
 * @since 0.1.0
 */
export * as LightClient from "./LightClient.js"

/**
 * Outcomes of registry operations.
 *
 * @since 0.1.0
 */
export * as Outcome from "./Outcome.js"

/**
 * Pure registry state and transitions.
 *
 * @since 0.1.0
 */
export * as RegistryState from "./RegistryState.js"
