import type * as BigDecimal from "effect/BigDecimal"

import { formatDecimal, formatDouble, formatFloat } from "./decimal.js"

// CHANGE: model the node tree with the toolkit's node kinds
// WHY: number nodes report floating-point versus integral independently of their sub-kind
// REF: req-node-model-1
// SOURCE: n/a
// FORMAT THEOREM: ∀n ∈ NumericNode: isFloatingPointNumber(n) ⊕ isIntegralNumber(n)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: IntNode fits in 32 bits, LongNode in 64 bits, FloatNode holds a single-precision value
// COMPLEXITY: O(1)/O(1)

export interface NullNode {
  readonly _tag: "NullNode"
}

export interface MissingNode {
  readonly _tag: "MissingNode"
}

export interface BooleanNode {
  readonly _tag: "BooleanNode"
  readonly value: boolean
}

export interface TextNode {
  readonly _tag: "TextNode"
  readonly value: string
}

export interface BinaryNode {
  readonly _tag: "BinaryNode"
  readonly value: Uint8Array
}

export interface IntNode {
  readonly _tag: "IntNode"
  readonly value: number
}

export interface LongNode {
  readonly _tag: "LongNode"
  readonly value: bigint
}

export interface BigIntegerNode {
  readonly _tag: "BigIntegerNode"
  readonly value: bigint
}

export interface FloatNode {
  readonly _tag: "FloatNode"
  readonly value: number
}

export interface DoubleNode {
  readonly _tag: "DoubleNode"
  readonly value: number
}

export interface DecimalNode {
  readonly _tag: "DecimalNode"
  readonly value: BigDecimal.BigDecimal
}

export interface ArrayNode {
  readonly _tag: "ArrayNode"
  readonly elements: ReadonlyArray<JsonNode>
}

export interface ObjectNode {
  readonly _tag: "ObjectNode"
  readonly fields: ReadonlyMap<string, JsonNode>
}

export type IntegralNode = IntNode | LongNode | BigIntegerNode

export type FloatingPointNode = FloatNode | DoubleNode | DecimalNode

export type NumericNode = IntegralNode | FloatingPointNode

export type JsonNode =
  | NullNode
  | MissingNode
  | BooleanNode
  | TextNode
  | BinaryNode
  | NumericNode
  | ArrayNode
  | ObjectNode

export type JsonNodeType = "NULL" | "MISSING" | "BOOLEAN" | "STRING" | "BINARY" | "NUMBER" | "ARRAY" | "OBJECT"

export const nullNode: NullNode = { _tag: "NullNode" }

export const missingNode: MissingNode = { _tag: "MissingNode" }

export const booleanNode = (value: boolean): BooleanNode => ({ _tag: "BooleanNode", value })

export const textNode = (value: string): TextNode => ({ _tag: "TextNode", value })

export const binaryNode = (value: Uint8Array): BinaryNode => ({ _tag: "BinaryNode", value })

export const intNode = (value: number): IntNode => ({ _tag: "IntNode", value: value | 0 })

// expects a value inside 64 bits; wider integers belong in a BigIntegerNode
export const longNode = (value: bigint): LongNode => ({ _tag: "LongNode", value })

export const bigIntegerNode = (value: bigint): BigIntegerNode => ({ _tag: "BigIntegerNode", value })

export const floatNode = (value: number): FloatNode => ({ _tag: "FloatNode", value: Math.fround(value) })

export const doubleNode = (value: number): DoubleNode => ({ _tag: "DoubleNode", value })

export const decimalNode = (value: BigDecimal.BigDecimal): DecimalNode => ({ _tag: "DecimalNode", value })

export const arrayNode = (elements: Iterable<JsonNode>): ArrayNode => ({ _tag: "ArrayNode", elements: [...elements] })

/**
 * Build an object node; setting a key again replaces its value in place.
 *
 * @pure true
 * @complexity O(n)
 */
export const objectNode = (fields: Iterable<readonly [string, JsonNode]>): ObjectNode => ({
  _tag: "ObjectNode",
  fields: new Map(fields)
})

const nodeTypes: { readonly [K in JsonNode["_tag"]]: JsonNodeType } = {
  NullNode: "NULL",
  MissingNode: "MISSING",
  BooleanNode: "BOOLEAN",
  TextNode: "STRING",
  BinaryNode: "BINARY",
  IntNode: "NUMBER",
  LongNode: "NUMBER",
  BigIntegerNode: "NUMBER",
  FloatNode: "NUMBER",
  DoubleNode: "NUMBER",
  DecimalNode: "NUMBER",
  ArrayNode: "ARRAY",
  ObjectNode: "OBJECT"
}

export const nodeType = (node: JsonNode): JsonNodeType => nodeTypes[node._tag]

export const isNumericNode = (node: JsonNode): node is NumericNode => nodeType(node) === "NUMBER"

export const isFloatingPointNumber = (node: JsonNode): node is FloatingPointNode =>
  node._tag === "FloatNode" || node._tag === "DoubleNode" || node._tag === "DecimalNode"

export const isIntegralNumber = (node: JsonNode): node is IntegralNode =>
  node._tag === "IntNode" || node._tag === "LongNode" || node._tag === "BigIntegerNode"

/**
 * Textual form of a node, as the toolkit's `asText` reports it.
 *
 * Containers and the missing node have no text.
 *
 * @pure true
 * @invariant asText(doubleNode(-0)) = "-0.0"
 * @complexity O(n)
 */
export const asText = (node: JsonNode): string => {
  switch (node._tag) {
    case "NullNode":
      return "null"
    case "BooleanNode":
      return node.value ? "true" : "false"
    case "TextNode":
      return node.value
    case "BinaryNode":
      return Buffer.from(node.value).toString("base64")
    case "IntNode":
      return String(node.value)
    case "LongNode":
    case "BigIntegerNode":
      return node.value.toString()
    case "FloatNode":
      return formatFloat(node.value)
    case "DoubleNode":
      return formatDouble(node.value)
    case "DecimalNode":
      return formatDecimal(node.value)
    case "MissingNode":
    case "ArrayNode":
    case "ObjectNode":
      return ""
  }
}

export const bigIntegerValue = (node: IntegralNode): bigint =>
  node._tag === "IntNode" ? BigInt(node.value) : node.value
