import * as Option from "effect/Option"

import { toNodeDecimal } from "./decimal.js"
import type { JsonNumberValue, JsonValue } from "./json.js"
import { isNegativeZero, numberToText, toBigDecimal } from "./json-number.js"
import type { JsonNode } from "./node.js"
import {
  arrayNode,
  booleanNode,
  decimalNode,
  doubleNode,
  floatNode,
  longNode,
  nullNode,
  objectNode,
  textNode
} from "./node.js"

// CHANGE: convert value trees into node trees with an explicit numeric policy
// WHY: numbers the node model cannot encode degrade to text instead of failing
// REF: req-value-to-node-1
// SOURCE: n/a
// FORMAT THEOREM: ∀v: shape(valueToNode(v)) = shape(v) ∧ keys(valueToNode(v)) = keys(v) in order
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: the conversion never throws on a well-formed value tree
// COMPLEXITY: O(n) time, O(depth) stack

/**
 * Numeric policy, in priority order: negative zero, arbitrary-precision
 * decimals, then the fixed-width kinds, then decimal text.
 *
 * @pure true
 * @invariant a decimal whose scale leaves 32 bits becomes a TextNode with its canonical text
 * @complexity O(n) where n = digit count
 */
export const numberToNode = (json: JsonNumberValue): JsonNode => {
  if (isNegativeZero(json.value)) {
    return doubleNode(-0)
  }
  const numeric = json.value
  switch (numeric._tag) {
    case "JsonBigDecimal":
    case "JsonBiggerDecimal":
      return Option.match(toBigDecimal(numeric), {
        onNone: (): JsonNode => textNode(numberToText(numeric)),
        onSome: decimalNode
      })
    case "JsonLong":
      return longNode(numeric.value)
    case "JsonDouble":
      return doubleNode(numeric.value)
    case "JsonFloat":
      return floatNode(numeric.value)
    case "JsonDecimal":
      return Option.match(toNodeDecimal(numeric.input), {
        onNone: (): JsonNode => textNode(numeric.input),
        onSome: decimalNode
      })
  }
}

/**
 * Convert a value tree into a node tree.
 *
 * Recursion depth equals nesting depth; use `valueToNodeBounded` for input
 * that is not trusted to be shallow.
 *
 * @param value - Value tree.
 * @returns Node tree with the same shape and key order.
 *
 * @pure true
 * @complexity O(n)
 */
export const valueToNode = (value: JsonValue): JsonNode => {
  switch (value._tag) {
    case "Null":
      return nullNode
    case "Bool":
      return booleanNode(value.value)
    case "String":
      return textNode(value.value)
    case "Number":
      return numberToNode(value)
    case "Array":
      return arrayNode(value.values.map((item) => valueToNode(item)))
    case "Object":
      return objectNode([...value.fields].map(([key, item]) => [key, valueToNode(item)] as const))
  }
}
