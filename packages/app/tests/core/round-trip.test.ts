import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Either from "effect/Either"

import { nodeDepth, nodeToValueBounded, valueDepth, valueToNodeBounded } from "../../src/core/depth.js"
import { jsonEquals } from "../../src/core/equality.js"
import type { JsonValue } from "../../src/core/json.js"
import { arr, fromLong, fromNumber, fromString, jsonFalse, jsonNull, jsonTrue, obj } from "../../src/core/json.js"
import { jsonDecimal, numberToText } from "../../src/core/json-number.js"
import { asText, nodeType } from "../../src/core/node.js"
import { nodeToValue } from "../../src/core/node-to-value.js"
import { valueToNode } from "../../src/core/value-to-node.js"

const roundTrip = (value: JsonValue): JsonValue => nodeToValue(valueToNode(value))

const nest = (depth: number): JsonValue => {
  let value: JsonValue = fromLong(1n)
  for (let level = 0; level < depth; level++) {
    value = level % 2 === 0 ? arr(value) : obj(["k", value])
  }
  return value
}

describe("scalar round trips", () => {
  it.effect("returns null, booleans and strings unchanged", () =>
    Effect.sync(() => {
      for (const value of [jsonNull, jsonTrue, jsonFalse, fromString(""), fromString("tab\tand \"quotes\" ✓")]) {
        expect(roundTrip(value)).toEqual(value)
      }
    }))

  it.effect("keeps every 64-bit integer exactly", () =>
    Effect.sync(() => {
      for (const x of [0n, -1n, 9007199254740993n, 9223372036854775807n, -9223372036854775808n]) {
        const back = roundTrip(fromLong(x))
        expect(back._tag === "Number" ? back.value : undefined).toEqual({ _tag: "JsonLong", value: x })
      }
    }))

  it.effect("keeps the digits of a decimal longer than a double holds", () =>
    Effect.sync(() => {
      const text = "123456789123456789.123456789"
      const back = roundTrip(fromNumber(jsonDecimal(text)))
      expect(back._tag === "Number" ? numberToText(back.value) : undefined).toBe(text)
    }))
})

describe("structural round trips", () => {
  it.effect("reproduces arrays and objects of scalars", () =>
    Effect.sync(() => {
      const value = arr(obj(["x", jsonNull], ["y", arr(jsonTrue, fromString("s"))]), arr(), obj())
      const back = roundTrip(value)
      expect(back).toEqual(value)
      expect(jsonEquals(back, value)).toBe(true)
    }))

  it.effect("keeps key insertion order", () =>
    Effect.sync(() => {
      const back = roundTrip(obj(["b", jsonTrue], ["a", jsonFalse], ["c", jsonNull]))
      expect(back._tag === "Object" ? [...back.fields.keys()] : []).toEqual(["b", "a", "c"])
    }))
})

describe("numeric asymmetries", () => {
  it.effect("keeps the sign of negative zero on the node side only", () =>
    Effect.sync(() => {
      const negative = valueToNode(fromNumber(jsonDecimal("-0.0")))
      expect(nodeType(negative)).toBe("NUMBER")
      expect(asText(negative)).toBe("-0.0")
      const back = nodeToValue(negative)
      expect(jsonEquals(back, fromLong(0n))).toBe(true)
    }))

  it.effect("leaves an overflowing decimal as a string on the way back", () =>
    Effect.sync(() => {
      const node = valueToNode(fromNumber(jsonDecimal("1e2147483648")))
      expect(asText(node)).toBe("1e2147483648")
      expect(nodeToValue(node)).toEqual({ _tag: "String", value: "1e2147483648" })
    }))
})

describe("depth", () => {
  it.effect("converts a document nested a thousand levels deep", () =>
    Effect.sync(() => {
      const value = nest(1000)
      expect(valueDepth(value)).toBe(1000)
      const node = valueToNodeBounded(value, 1000)
      expect(Either.isRight(node)).toBe(true)
      if (Either.isRight(node)) {
        expect(nodeDepth(node.right)).toBe(1000)
        const back = nodeToValueBounded(node.right, 1000)
        expect(Either.isRight(back) && jsonEquals(back.right, value)).toBe(true)
      }
    }))

  it.effect("reports TooDeep instead of descending past the limit", () =>
    Effect.sync(() => {
      const result = valueToNodeBounded(nest(1000), 999)
      expect(Either.isLeft(result)).toBe(true)
      if (Either.isLeft(result)) {
        expect(result.left).toEqual({ _tag: "TooDeep", depth: 1000, maxDepth: 999 })
      }
      const node = valueToNode(nest(20))
      const back = nodeToValueBounded(node, 19)
      expect(Either.isLeft(back) ? back.left : undefined).toEqual({ _tag: "TooDeep", depth: 20, maxDepth: 19 })
    }))

  it.effect("measures scalars at depth zero", () =>
    Effect.sync(() => {
      expect(valueDepth(fromString("flat"))).toBe(0)
      expect(valueDepth(arr())).toBe(1)
    }))
})
