import * as Option from "effect/Option"

import { toNodeDecimal } from "./decimal.js"
import type { JsonValue } from "./json.js"
import { fromBigDecimal, fromBigInt, fromBoolean, fromFields, fromString, fromValues, jsonNull } from "./json.js"
import type { FloatingPointNode, JsonNode, NumericNode } from "./node.js"
import { asText, bigIntegerValue, isFloatingPointNumber, isNumericNode } from "./node.js"

// CHANGE: convert node trees back into value trees
// WHY: floating-point nodes are re-read from their text so no binary rounding leaks in
// REF: req-node-to-value-1
// SOURCE: n/a
// FORMAT THEOREM: ∀n ∈ FloatingPointNode: nodeToValue(n) = BigDecimal(asText(n))
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: unknown node kinds map to Null
// COMPLEXITY: O(n) time, O(depth) stack

const floatingPointToValue = (node: FloatingPointNode): JsonValue =>
  Option.match(toNodeDecimal(asText(node)), {
    onNone: (): JsonValue => jsonNull,
    onSome: fromBigDecimal
  })

const numericToValue = (node: NumericNode): JsonValue =>
  isFloatingPointNumber(node) ? floatingPointToValue(node) : fromBigInt(bigIntegerValue(node))

/**
 * Convert a node tree into a value tree.
 *
 * Numbers branch on floating-point versus integral only; a non-finite double
 * has no decimal reading and becomes Null.
 *
 * @param node - Node tree.
 * @returns Value tree with the same shape and key order.
 *
 * @pure true
 * @complexity O(n)
 */
export const nodeToValue = (node: JsonNode): JsonValue => {
  if (isNumericNode(node)) {
    return numericToValue(node)
  }
  switch (node._tag) {
    case "BooleanNode":
      return fromBoolean(node.value)
    case "TextNode":
      return fromString(node.value)
    case "ArrayNode":
      return fromValues(node.elements.map((element) => nodeToValue(element)))
    case "ObjectNode":
      return fromFields([...node.fields].map(([key, element]) => [key, nodeToValue(element)] as const))
    default:
      return jsonNull
  }
}
