/**
 * Shared Proto object utilities.
 *
 * Provides the Inspectable and Pipeable protocols for the registry service
 * objects.
 *
 * @since 0.1.0
 * @internal
 */

import { format, type Inspectable, NodeInspectSymbol } from "effect/Inspectable"
import { pipeArguments } from "effect/Pipeable"
import * as Predicate from "effect/Predicate"

/**
 * Type guard for objects built on a proto carrying `typeId`.
 *
 * @internal
 */
export const hasTypeId = <Id extends symbol>(typeId: Id) => (u: unknown): u is { readonly [K in Id]: Id } =>
  Predicate.hasProperty(u, typeId)

/**
 * Creates common Proto object methods. The concrete proto supplies `toJSON`.
 *
 * - NodeInspectSymbol (uses toJSON)
 * - toString (uses format)
 * - pipe (uses pipeArguments)
 *
 * @internal
 */
export const makeProtoBase = <Id extends symbol>(typeId: Id) => ({
  [typeId]: typeId,
  [NodeInspectSymbol](this: Inspectable) {
    return this.toJSON()
  },
  toString(this: Inspectable) {
    return format(this.toJSON())
  },
  pipe() {
    return pipeArguments(this, arguments)
  }
})
