import * as Either from "effect/Either"

import type { TooDeep } from "./errors.js"
import { tooDeep } from "./errors.js"
import type { JsonValue } from "./json.js"
import type { JsonNode } from "./node.js"
import { nodeToValue } from "./node-to-value.js"
import { valueToNode } from "./value-to-node.js"

// CHANGE: bound the recursive converters by an explicit nesting limit
// WHY: turn stack exhaustion on hostile input into a reportable TooDeep
// REF: req-depth-1
// SOURCE: n/a
// FORMAT THEOREM: ∀t,m: depth(t) ≤ m → bounded(t,m) = Right(convert(t))
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: depth is measured with a heap-allocated work stack, never by recursion
// COMPLEXITY: O(n) time, O(n) heap

const measureDepth = <A>(root: A, children: (tree: A) => Iterable<A> | undefined): number => {
  let deepest = 0
  const pending: Array<readonly [A, number]> = [[root, 0]]
  let next = pending.pop()
  while (next !== undefined) {
    const [tree, depth] = next
    const nested = children(tree)
    if (nested !== undefined) {
      const inner = depth + 1
      deepest = Math.max(deepest, inner)
      for (const child of nested) {
        pending.push([child, inner])
      }
    }
    next = pending.pop()
  }
  return deepest
}

const valueChildren = (value: JsonValue): Iterable<JsonValue> | undefined => {
  if (value._tag === "Array") {
    return value.values
  }
  return value._tag === "Object" ? value.fields.values() : undefined
}

const nodeChildren = (node: JsonNode): Iterable<JsonNode> | undefined => {
  if (node._tag === "ArrayNode") {
    return node.elements
  }
  return node._tag === "ObjectNode" ? node.fields.values() : undefined
}

/**
 * Nesting depth of a value tree: 0 for a scalar, +1 per enclosing container.
 *
 * @pure true
 * @complexity O(n)
 */
export const valueDepth = (value: JsonValue): number => measureDepth(value, valueChildren)

export const nodeDepth = (node: JsonNode): number => measureDepth(node, nodeChildren)

export const checkValueDepth = (value: JsonValue, maxDepth: number): Either.Either<JsonValue, TooDeep> => {
  const depth = valueDepth(value)
  return depth > maxDepth ? Either.left(tooDeep(depth, maxDepth)) : Either.right(value)
}

export const checkNodeDepth = (node: JsonNode, maxDepth: number): Either.Either<JsonNode, TooDeep> => {
  const depth = nodeDepth(node)
  return depth > maxDepth ? Either.left(tooDeep(depth, maxDepth)) : Either.right(node)
}

/**
 * Convert a value tree unless it nests deeper than `maxDepth`.
 *
 * @pure true
 * @invariant Left(TooDeep) is returned before any recursive descent starts
 * @complexity O(n)
 */
export const valueToNodeBounded = (value: JsonValue, maxDepth: number): Either.Either<JsonNode, TooDeep> =>
  Either.map(checkValueDepth(value, maxDepth), valueToNode)

/**
 * Convert a node tree unless it nests deeper than `maxDepth`.
 *
 * @pure true
 * @complexity O(n)
 */
export const nodeToValueBounded = (node: JsonNode, maxDepth: number): Either.Either<JsonValue, TooDeep> =>
  Either.map(checkNodeDepth(node, maxDepth), nodeToValue)
