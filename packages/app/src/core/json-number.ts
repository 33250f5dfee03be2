import type * as BigDecimal from "effect/BigDecimal"
import * as Option from "effect/Option"

import type { DecimalParts } from "./decimal.js"
import {
  formatDecimal,
  formatDouble,
  formatFloat,
  isInt32,
  parseDecimalParts,
  partsToBigDecimal
} from "./decimal.js"

// CHANGE: model the value tree's numeric hierarchy as a closed tagged union
// WHY: every numeric kind must be matched exhaustively by both converters
// REF: req-value-number-1
// SOURCE: n/a
// FORMAT THEOREM: ∀n ∈ JsonNumber: n._tag ∈ {JsonLong, JsonDouble, JsonFloat, JsonDecimal, JsonBigDecimal, JsonBiggerDecimal}
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: JsonLong fits in 64 bits, JsonFloat holds a single-precision value
// COMPLEXITY: O(1)/O(1)

export interface JsonLong {
  readonly _tag: "JsonLong"
  readonly value: bigint
}

export interface JsonDouble {
  readonly _tag: "JsonDouble"
  readonly value: number
}

export interface JsonFloat {
  readonly _tag: "JsonFloat"
  readonly value: number
}

export interface JsonDecimal {
  readonly _tag: "JsonDecimal"
  readonly input: string
}

export interface JsonBigDecimal {
  readonly _tag: "JsonBigDecimal"
  readonly value: BigDecimal.BigDecimal
}

export interface JsonBiggerDecimal {
  readonly _tag: "JsonBiggerDecimal"
  readonly value: DecimalParts
  readonly input: string
}

export type JsonNumber =
  | JsonLong
  | JsonDouble
  | JsonFloat
  | JsonDecimal
  | JsonBigDecimal
  | JsonBiggerDecimal

const INT64_MIN = -(2n ** 63n)
const INT64_MAX = 2n ** 63n - 1n

export const isInt64 = (value: bigint): boolean => value >= INT64_MIN && value <= INT64_MAX

/**
 * Raw 64-bit integer. Callers holding an arbitrary bigint go through
 * `integralNumber`, which never narrows the value.
 *
 * @pure true
 * @invariant isInt64(value)
 */
export const jsonLong = (value: bigint): JsonLong => ({ _tag: "JsonLong", value })

export const jsonDouble = (value: number): JsonDouble => ({ _tag: "JsonDouble", value })

export const jsonFloat = (value: number): JsonFloat => ({ _tag: "JsonFloat", value: Math.fround(value) })

export const jsonDecimal = (input: string): JsonDecimal => ({ _tag: "JsonDecimal", input })

export const jsonBigDecimal = (value: BigDecimal.BigDecimal): JsonBigDecimal => ({ _tag: "JsonBigDecimal", value })

export const jsonBiggerDecimal = (value: DecimalParts, input: string): JsonBiggerDecimal => ({
  _tag: "JsonBiggerDecimal",
  value,
  input
})

/**
 * Integral number from an arbitrary-size integer.
 *
 * @returns JsonLong when the value fits in 64 bits, JsonBiggerDecimal otherwise.
 *
 * @pure true
 * @complexity O(n)
 */
export const integralNumber = (value: bigint): JsonLong | JsonBiggerDecimal =>
  isInt64(value)
    ? jsonLong(value)
    : jsonBiggerDecimal({ negative: value < 0n, unscaled: value < 0n ? -value : value, scale: 0n }, value.toString())

const JSON_NUMBER = /^-?(?:0|[1-9]\d*)(\.\d+)?([eE][+-]?\d+)?$/u

/**
 * Number from a JSON number literal.
 *
 * Integral literals become JsonLong when they fit in 64 bits. A literal "-0"
 * stays a JsonDecimal so that its sign survives.
 *
 * @pure true
 * @invariant Some(n) iff text matches the JSON number grammar
 * @complexity O(n)
 */
export const jsonNumberFromString = (text: string): Option.Option<JsonNumber> => {
  const match = JSON_NUMBER.exec(text)
  if (match === null) {
    return Option.none()
  }
  if (match[1] !== undefined || match[2] !== undefined || text === "-0") {
    return Option.some(jsonDecimal(text))
  }
  return Option.some(integralNumber(BigInt(text)))
}

/**
 * Exact decimal reading of an arbitrary-precision number.
 *
 * @returns None when the scale leaves the signed 32-bit range.
 *
 * @pure true
 * @complexity O(1)
 */
export const toBigDecimal = (
  number: JsonBigDecimal | JsonBiggerDecimal
): Option.Option<BigDecimal.BigDecimal> => {
  if (number._tag === "JsonBiggerDecimal") {
    return partsToBigDecimal(number.value)
  }
  return isInt32(BigInt(number.value.scale)) ? Option.some(number.value) : Option.none()
}

const NEGATIVE_ZERO_TEXT = /^-(?:0+(?:\.0*)?|\.0+)(?:[eE][+-]?\d+)?$/u

/**
 * Whether a number is a zero carrying a minus sign.
 *
 * Looks at the sign and the zero magnitude only; no digits are normalized.
 *
 * @pure true
 * @invariant isNegativeZero(jsonDouble(-0)) ∧ ¬isNegativeZero(jsonLong(0n))
 * @complexity O(n) where n = length of decimal text
 */
export const isNegativeZero = (number: JsonNumber): boolean => {
  switch (number._tag) {
    case "JsonLong":
    case "JsonBigDecimal":
      return false
    case "JsonDouble":
    case "JsonFloat":
      return Object.is(number.value, -0)
    case "JsonDecimal":
      return NEGATIVE_ZERO_TEXT.test(number.input)
    case "JsonBiggerDecimal":
      return number.value.negative && number.value.unscaled === 0n
  }
}

/**
 * Canonical text of a number.
 *
 * @pure true
 * @invariant JsonDecimal and JsonBiggerDecimal keep their input verbatim
 * @complexity O(n)
 */
export const numberToText = (number: JsonNumber): string => {
  switch (number._tag) {
    case "JsonLong":
      return number.value.toString()
    case "JsonDouble":
      return formatDouble(number.value)
    case "JsonFloat":
      return formatFloat(number.value)
    case "JsonDecimal":
      return number.input
    case "JsonBigDecimal":
      return formatDecimal(number.value)
    case "JsonBiggerDecimal":
      return number.input
  }
}

interface NormalForm {
  readonly negativeZero: boolean
  readonly unscaled: bigint
  readonly scale: bigint
}

const normalize = (negative: boolean, magnitude: bigint, scale: bigint): NormalForm => {
  if (magnitude === 0n) {
    return { negativeZero: negative, unscaled: 0n, scale: 0n }
  }
  let unscaled = magnitude
  let reduced = scale
  while (unscaled % 10n === 0n) {
    unscaled /= 10n
    reduced -= 1n
  }
  return { negativeZero: false, unscaled: negative ? -unscaled : unscaled, scale: reduced }
}

const partsNormalForm = (parts: DecimalParts): NormalForm => normalize(parts.negative, parts.unscaled, parts.scale)

const signedNormalForm = (value: bigint, scale: bigint): NormalForm =>
  normalize(value < 0n, value < 0n ? -value : value, scale)

const toNormalForm = (number: JsonNumber): Option.Option<NormalForm> => {
  switch (number._tag) {
    case "JsonLong":
      return Option.some(signedNormalForm(number.value, 0n))
    case "JsonBigDecimal":
      return Option.some(signedNormalForm(number.value.value, BigInt(number.value.scale)))
    case "JsonBiggerDecimal":
      return Option.some(partsNormalForm(number.value))
    case "JsonDouble":
    case "JsonFloat":
    case "JsonDecimal":
      return Option.map(parseDecimalParts(numberToText(number)), partsNormalForm)
  }
}

/**
 * Numeric equality across representations.
 *
 * Compares the logical decimal value; trailing zeros and the numeric kind do
 * not matter, the sign of zero does.
 *
 * @pure true
 * @invariant numberEquals(jsonLong(1n), jsonDecimal("1.0")) = true
 * @complexity O(n)
 */
export const numberEquals = (left: JsonNumber, right: JsonNumber): boolean => {
  const leftForm = toNormalForm(left)
  const rightForm = toNormalForm(right)
  if (Option.isNone(leftForm) || Option.isNone(rightForm)) {
    return numberToText(left) === numberToText(right)
  }
  return leftForm.value.negativeZero === rightForm.value.negativeZero &&
    leftForm.value.unscaled === rightForm.value.unscaled &&
    leftForm.value.scale === rightForm.value.scale
}
