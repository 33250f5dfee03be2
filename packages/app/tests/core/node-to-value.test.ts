import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as BigDecimal from "effect/BigDecimal"

import { jsonEquals } from "../../src/core/equality.js"
import { fromLong } from "../../src/core/json.js"
import type { JsonValue } from "../../src/core/json.js"
import { numberToText } from "../../src/core/json-number.js"
import {
  arrayNode,
  bigIntegerNode,
  binaryNode,
  booleanNode,
  decimalNode,
  doubleNode,
  floatNode,
  intNode,
  longNode,
  missingNode,
  nullNode,
  objectNode,
  textNode
} from "../../src/core/node.js"
import { nodeToValue } from "../../src/core/node-to-value.js"

const numberText = (value: JsonValue): string | undefined =>
  value._tag === "Number" ? numberToText(value.value) : undefined

const numberKind = (value: JsonValue): string | undefined =>
  value._tag === "Number" ? value.value._tag : undefined

describe("nodeToValue integral nodes", () => {
  it.effect("reads int and long nodes as longs", () =>
    Effect.sync(() => {
      expect(numberKind(nodeToValue(intNode(7)))).toBe("JsonLong")
      expect(numberText(nodeToValue(longNode(-9223372036854775808n)))).toBe("-9223372036854775808")
    }))

  it.effect("reads integers beyond 64 bits as bigger decimals", () =>
    Effect.sync(() => {
      const value = nodeToValue(bigIntegerNode(2n ** 70n))
      expect(numberKind(value)).toBe("JsonBiggerDecimal")
      expect(numberText(value)).toBe("1180591620717411303424")
    }))
})

describe("nodeToValue floating-point nodes", () => {
  it.effect("re-reads doubles from their text", () =>
    Effect.sync(() => {
      const value = nodeToValue(doubleNode(1.5))
      expect(numberKind(value)).toBe("JsonBigDecimal")
      expect(numberText(value)).toBe("1.5")
      expect(numberText(nodeToValue(doubleNode(1e10)))).toBe("1.0E+10")
    }))

  it.effect("re-reads floats from their shortest text", () =>
    Effect.sync(() => {
      expect(numberText(nodeToValue(floatNode(0.1)))).toBe("0.1")
    }))

  it.effect("keeps decimal digits and scale", () =>
    Effect.sync(() => {
      expect(numberText(nodeToValue(decimalNode(BigDecimal.make(123n, -5))))).toBe("1.23E+7")
      expect(numberText(nodeToValue(decimalNode(BigDecimal.make(150n, 2))))).toBe("1.50")
    }))

  it.effect("loses the sign of negative zero", () =>
    Effect.sync(() => {
      const value = nodeToValue(doubleNode(-0))
      expect(numberText(value)).toBe("0.0")
      expect(jsonEquals(value, fromLong(0n))).toBe(true)
    }))

  it.effect("maps non-finite doubles to null", () =>
    Effect.sync(() => {
      expect(nodeToValue(doubleNode(Number.NaN))._tag).toBe("Null")
      expect(nodeToValue(doubleNode(Number.POSITIVE_INFINITY))._tag).toBe("Null")
    }))
})

describe("nodeToValue other nodes", () => {
  it.effect("maps scalars and unknown kinds", () =>
    Effect.sync(() => {
      expect(nodeToValue(booleanNode(false))).toEqual({ _tag: "Bool", value: false })
      expect(nodeToValue(textNode("1e2147483648"))).toEqual({ _tag: "String", value: "1e2147483648" })
      expect(nodeToValue(nullNode)._tag).toBe("Null")
      expect(nodeToValue(missingNode)._tag).toBe("Null")
      expect(nodeToValue(binaryNode(new Uint8Array([1, 2, 3])))._tag).toBe("Null")
    }))

  it.effect("keeps container order", () =>
    Effect.sync(() => {
      const value = nodeToValue(
        objectNode([
          ["z", arrayNode([intNode(1), textNode("two")])],
          ["y", nullNode]
        ])
      )
      expect(value._tag).toBe("Object")
      if (value._tag === "Object") {
        expect([...value.fields.keys()]).toEqual(["z", "y"])
        const inner = value.fields.get("z")
        expect(inner?._tag === "Array" ? inner.values.map((item) => item._tag) : []).toEqual(["Number", "String"])
      }
    }))
})
