import type * as BigDecimal from "effect/BigDecimal"
import * as Option from "effect/Option"

import type { JsonNumber } from "./json-number.js"
import { integralNumber, jsonBigDecimal, jsonDouble, jsonFloat, jsonNumberFromString } from "./json-number.js"

// CHANGE: introduce the immutable value tree as a closed tagged union
// WHY: the converters match every variant exhaustively
// REF: req-value-model-1
// SOURCE: n/a
// FORMAT THEOREM: ∀x ∈ JsonValue: x._tag ∈ {Null, Bool, String, Number, Array, Object}
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: Object keys are unique and keep insertion order
// COMPLEXITY: O(1)/O(1)

export interface JsonNull {
  readonly _tag: "Null"
}

export interface JsonBoolean {
  readonly _tag: "Bool"
  readonly value: boolean
}

export interface JsonString {
  readonly _tag: "String"
  readonly value: string
}

export interface JsonNumberValue {
  readonly _tag: "Number"
  readonly value: JsonNumber
}

export interface JsonArray {
  readonly _tag: "Array"
  readonly values: ReadonlyArray<JsonValue>
}

export interface JsonObject {
  readonly _tag: "Object"
  readonly fields: ReadonlyMap<string, JsonValue>
}

export type JsonValue =
  | JsonNull
  | JsonBoolean
  | JsonString
  | JsonNumberValue
  | JsonArray
  | JsonObject

export const jsonNull: JsonNull = { _tag: "Null" }

export const jsonTrue: JsonBoolean = { _tag: "Bool", value: true }

export const jsonFalse: JsonBoolean = { _tag: "Bool", value: false }

export const fromBoolean = (value: boolean): JsonBoolean => value ? jsonTrue : jsonFalse

export const fromString = (value: string): JsonString => ({ _tag: "String", value })

export const fromNumber = (value: JsonNumber): JsonNumberValue => ({ _tag: "Number", value })

/**
 * Wrap an integer given as a long; a value outside 64 bits is kept whole as a
 * JsonBiggerDecimal.
 *
 * @pure true
 * @complexity O(n)
 */
export const fromLong = (value: bigint): JsonNumberValue => fromNumber(integralNumber(value))

/**
 * Wrap a double; NaN and the infinities have no JSON form.
 *
 * @pure true
 * @complexity O(1)
 */
export const fromDouble = (value: number): Option.Option<JsonNumberValue> =>
  Number.isFinite(value) ? Option.some(fromNumber(jsonDouble(value))) : Option.none()

export const fromDoubleOrNull = (value: number): JsonValue =>
  Option.getOrElse(fromDouble(value), (): JsonValue => jsonNull)

export const fromFloat = (value: number): Option.Option<JsonNumberValue> =>
  Number.isFinite(value) ? Option.some(fromNumber(jsonFloat(value))) : Option.none()

export const fromFloatOrNull = (value: number): JsonValue =>
  Option.getOrElse(fromFloat(value), (): JsonValue => jsonNull)

/**
 * Wrap an arbitrary-size integer.
 *
 * @returns A JsonLong inside the signed 64-bit range, a JsonBiggerDecimal outside it.
 *
 * @pure true
 * @complexity O(n)
 */
export const fromBigInt = (value: bigint): JsonNumberValue => fromNumber(integralNumber(value))

export const fromBigDecimal = (value: BigDecimal.BigDecimal): JsonNumberValue => fromNumber(jsonBigDecimal(value))

export const fromNumberString = (text: string): Option.Option<JsonNumberValue> =>
  Option.map(jsonNumberFromString(text), fromNumber)

export const fromValues = (values: Iterable<JsonValue>): JsonArray => ({ _tag: "Array", values: [...values] })

/**
 * Build an object from entries; a repeated key keeps its first position and
 * its last value.
 *
 * @pure true
 * @complexity O(n)
 */
export const fromFields = (fields: Iterable<readonly [string, JsonValue]>): JsonObject => ({
  _tag: "Object",
  fields: new Map(fields)
})

export const arr = (...values: ReadonlyArray<JsonValue>): JsonArray => fromValues(values)

export const obj = (...fields: ReadonlyArray<readonly [string, JsonValue]>): JsonObject => fromFields(fields)

// isNegativeZero recognizes it in any numeric kind; jsonEquals keeps it apart from 0
export const negativeZero: JsonValue = fromDoubleOrNull(-0)
