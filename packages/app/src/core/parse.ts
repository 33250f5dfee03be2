import * as Either from "effect/Either"
import * as Option from "effect/Option"

import { isInt32, toNodeDecimal } from "./decimal.js"
import type { JsonValue } from "./json.js"
import { fromFields, fromNumber, fromString, fromValues, jsonFalse, jsonNull, jsonTrue } from "./json.js"
import { isInt64, jsonDecimal, jsonNumberFromString } from "./json-number.js"
import type { JsonNode } from "./node.js"
import {
  arrayNode,
  bigIntegerNode,
  booleanNode,
  decimalNode,
  doubleNode,
  intNode,
  longNode,
  nullNode,
  objectNode,
  textNode
} from "./node.js"

// CHANGE: parse JSON text into either tree through one builder facade
// WHY: both trees must read the same literals, each with its own numeric kinds
// REF: req-parse-1
// SOURCE: n/a
// FORMAT THEOREM: ∀s: parse(s) = Right(t) → s is RFC 8259 JSON
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: containers are tracked on an explicit stack, nesting never recurses
// COMPLEXITY: O(n) where n = text length

export interface JsonFacade<A> {
  readonly jnull: () => A
  readonly jtrue: () => A
  readonly jfalse: () => A
  readonly jstring: (value: string) => A
  readonly jnum: (text: string, decIndex: number, expIndex: number) => A
  readonly jarray: (values: ReadonlyArray<A>) => A
  readonly jobject: (fields: ReadonlyArray<readonly [string, A]>) => A
}

export type JsonParseError = {
  readonly _tag: "JsonParseError"
  readonly offset: number
  readonly message: string
}

export interface NodeParseOptions {
  readonly useBigDecimalForFloats: boolean
}

const jsonParseError = (offset: number, message: string): JsonParseError => ({
  _tag: "JsonParseError",
  offset,
  message
})

interface Scanned<T> {
  readonly value: T
  readonly next: number
}

type Frame<A> =
  | { readonly kind: "array"; readonly values: Array<A> }
  | { readonly kind: "object"; readonly fields: Array<readonly [string, A]>; key: string }

type Opening<A> =
  | { readonly _tag: "Opened"; readonly next: number }
  | { readonly _tag: "Scalar"; readonly value: A; readonly next: number }

type Step<A> =
  | { readonly _tag: "Done"; readonly value: A }
  | { readonly _tag: "Continue"; readonly next: number }

const opened = <A>(next: number): Opening<A> => ({ _tag: "Opened", next })
const scalar = <A>(value: A, next: number): Opening<A> => ({ _tag: "Scalar", value, next })
const done = <A>(value: A): Step<A> => ({ _tag: "Done", value })
const proceed = <A>(next: number): Step<A> => ({ _tag: "Continue", next })

const ESCAPES: Readonly<Record<string, string>> = {
  "\"": "\"",
  "\\": "\\",
  "/": "/",
  b: "\b",
  f: "\f",
  n: "\n",
  r: "\r",
  t: "\t"
}

const HEX4 = /^[0-9a-fA-F]{4}$/u

const NUMBER = /-?(?:0|[1-9]\d*)(\.\d+)?([eE][+-]?\d+)?/uy

const isWhitespace = (code: number): boolean => code === 0x20 || code === 0x09 || code === 0x0a || code === 0x0d

const skipWhitespace = (text: string, index: number): number => {
  let cursor = index
  while (cursor < text.length && isWhitespace(text.charCodeAt(cursor))) {
    cursor += 1
  }
  return cursor
}

const unexpected = (text: string, index: number): JsonParseError =>
  index >= text.length
    ? jsonParseError(index, `Unexpected end of input at offset ${index}`)
    : jsonParseError(index, `Unexpected character ${JSON.stringify(text.charAt(index))} at offset ${index}`)

const scanString = (text: string, start: number): Either.Either<Scanned<string>, JsonParseError> => {
  let result = ""
  let index = start + 1
  let chunkStart = index
  while (index < text.length) {
    const code = text.charCodeAt(index)
    if (code === 0x22) {
      return Either.right({ value: result + text.slice(chunkStart, index), next: index + 1 })
    }
    if (code < 0x20) {
      return Either.left(jsonParseError(index, `Unescaped control character at offset ${index}`))
    }
    if (code !== 0x5c) {
      index += 1
      continue
    }
    result += text.slice(chunkStart, index)
    const escape = text.charAt(index + 1)
    if (escape === "u") {
      const hex = text.slice(index + 2, index + 6)
      if (!HEX4.test(hex)) {
        return Either.left(jsonParseError(index, `Invalid unicode escape at offset ${index}`))
      }
      result += String.fromCharCode(Number.parseInt(hex, 16))
      index += 6
    } else {
      const replacement = ESCAPES[escape]
      if (replacement === undefined) {
        return Either.left(jsonParseError(index, `Invalid escape at offset ${index}`))
      }
      result += replacement
      index += 2
    }
    chunkStart = index
  }
  return Either.left(jsonParseError(text.length, "Unterminated string"))
}

const scanKey = (text: string, start: number): Either.Either<Scanned<string>, JsonParseError> => {
  const index = skipWhitespace(text, start)
  if (text.charAt(index) !== "\"") {
    return Either.left(unexpected(text, index))
  }
  return Either.flatMap(scanString(text, index), ({ next, value }) => {
    const colon = skipWhitespace(text, next)
    return text.charAt(colon) === ":"
      ? Either.right({ value, next: colon + 1 })
      : Either.left(unexpected(text, colon))
  })
}

const scanNumber = <A>(
  facade: JsonFacade<A>,
  text: string,
  start: number
): Either.Either<Scanned<A>, JsonParseError> => {
  NUMBER.lastIndex = start
  const match = NUMBER.exec(text)
  if (match === null) {
    return Either.left(unexpected(text, start))
  }
  const raw = match[0]
  const decIndex = match[1] === undefined ? -1 : raw.indexOf(".")
  const expIndex = match[2] === undefined ? -1 : raw.search(/[eE]/u)
  return Either.right({ value: facade.jnum(raw, decIndex, expIndex), next: start + raw.length })
}

const scanLiteral = <A>(
  text: string,
  start: number,
  literal: string,
  value: () => A
): Either.Either<Scanned<A>, JsonParseError> =>
  text.startsWith(literal, start)
    ? Either.right({ value: value(), next: start + literal.length })
    : Either.left(unexpected(text, start))

const scanScalar = <A>(
  facade: JsonFacade<A>,
  text: string,
  index: number
): Either.Either<Scanned<A>, JsonParseError> => {
  const head = text.charAt(index)
  if (head === "\"") {
    return Either.map(scanString(text, index), ({ next, value }) => ({ value: facade.jstring(value), next }))
  }
  if (head === "t") {
    return scanLiteral(text, index, "true", facade.jtrue)
  }
  if (head === "f") {
    return scanLiteral(text, index, "false", facade.jfalse)
  }
  if (head === "n") {
    return scanLiteral(text, index, "null", facade.jnull)
  }
  if (head === "-" || (head >= "0" && head <= "9")) {
    return scanNumber(facade, text, index)
  }
  return Either.left(unexpected(text, index))
}

const openValue = <A>(
  facade: JsonFacade<A>,
  text: string,
  index: number,
  stack: Array<Frame<A>>
): Either.Either<Opening<A>, JsonParseError> => {
  const head = text.charAt(index)
  if (head === "[") {
    const inner = skipWhitespace(text, index + 1)
    if (text.charAt(inner) === "]") {
      return Either.right(scalar(facade.jarray([]), inner + 1))
    }
    stack.push({ kind: "array", values: [] })
    return Either.right(opened<A>(inner))
  }
  if (head === "{") {
    const inner = skipWhitespace(text, index + 1)
    if (text.charAt(inner) === "}") {
      return Either.right(scalar(facade.jobject([]), inner + 1))
    }
    return Either.map(scanKey(text, inner), ({ next, value }) => {
      stack.push({ kind: "object", fields: [], key: value })
      return opened<A>(next)
    })
  }
  return Either.map(scanScalar(facade, text, index), ({ next, value }) => scalar(value, next))
}

const attach = <A>(
  facade: JsonFacade<A>,
  text: string,
  stack: Array<Frame<A>>,
  value: A,
  start: number
): Either.Either<Step<A>, JsonParseError> => {
  let completed = value
  let index = start
  for (;;) {
    index = skipWhitespace(text, index)
    const frame = stack[stack.length - 1]
    if (frame === undefined) {
      return index === text.length ? Either.right(done(completed)) : Either.left(unexpected(text, index))
    }
    const separator = text.charAt(index)
    if (frame.kind === "array") {
      frame.values.push(completed)
      if (separator === ",") {
        return Either.right(proceed<A>(index + 1))
      }
      if (separator !== "]") {
        return Either.left(unexpected(text, index))
      }
      stack.pop()
      completed = facade.jarray(frame.values)
    } else {
      frame.fields.push([frame.key, completed])
      if (separator === ",") {
        const key = scanKey(text, index + 1)
        if (Either.isLeft(key)) {
          return Either.left(key.left)
        }
        frame.key = key.right.value
        return Either.right(proceed<A>(key.right.next))
      }
      if (separator !== "}") {
        return Either.left(unexpected(text, index))
      }
      stack.pop()
      completed = facade.jobject(frame.fields)
    }
    index += 1
  }
}

/**
 * Parse JSON text with a tree-building facade.
 *
 * @param facade - Builder for the target tree.
 * @param text - Complete JSON document.
 * @returns Either with the built tree or the first syntax error.
 *
 * @pure true
 * @invariant trailing non-whitespace input is rejected
 * @complexity O(n)
 */
export const parseWith = <A>(facade: JsonFacade<A>, text: string): Either.Either<A, JsonParseError> => {
  const stack: Array<Frame<A>> = []
  let index = 0
  for (;;) {
    const opening = openValue(facade, text, skipWhitespace(text, index), stack)
    if (Either.isLeft(opening)) {
      return Either.left(opening.left)
    }
    if (opening.right._tag === "Opened") {
      index = opening.right.next
      continue
    }
    const step = attach(facade, text, stack, opening.right.value, opening.right.next)
    if (Either.isLeft(step)) {
      return Either.left(step.left)
    }
    if (step.right._tag === "Done") {
      return Either.right(step.right.value)
    }
    index = step.right.next
  }
}

export const valueFacade: JsonFacade<JsonValue> = {
  jnull: () => jsonNull,
  jtrue: () => jsonTrue,
  jfalse: () => jsonFalse,
  jstring: fromString,
  jnum: (text) => fromNumber(Option.getOrElse(jsonNumberFromString(text), () => jsonDecimal(text))),
  jarray: fromValues,
  jobject: fromFields
}

const integralNode = (text: string): JsonNode => {
  const value = BigInt(text)
  if (isInt32(value)) {
    return intNode(Number(value))
  }
  return isInt64(value) ? longNode(value) : bigIntegerNode(value)
}

export const nodeFacade = (options: NodeParseOptions): JsonFacade<JsonNode> => ({
  jnull: () => nullNode,
  jtrue: () => booleanNode(true),
  jfalse: () => booleanNode(false),
  jstring: textNode,
  jnum: (text, decIndex, expIndex) => {
    if (decIndex < 0 && expIndex < 0) {
      return integralNode(text)
    }
    if (!options.useBigDecimalForFloats) {
      return doubleNode(Number(text))
    }
    return Option.match(toNodeDecimal(text), {
      onNone: (): JsonNode => doubleNode(Number(text)),
      onSome: decimalNode
    })
  },
  jarray: arrayNode,
  jobject: objectNode
})

export const defaultNodeParseOptions: NodeParseOptions = { useBigDecimalForFloats: false }

/**
 * Parse JSON text into a value tree.
 *
 * Integral literals become JsonLong (or JsonBiggerDecimal past 64 bits); any
 * literal with a fraction or exponent keeps its text as a JsonDecimal.
 *
 * @pure true
 * @complexity O(n)
 */
export const parseValue = (text: string): Either.Either<JsonValue, JsonParseError> => parseWith(valueFacade, text)

/**
 * Parse JSON text into a node tree.
 *
 * Integral literals pick the narrowest of IntNode, LongNode and BigIntegerNode;
 * floating literals become DoubleNode, or DecimalNode with `useBigDecimalForFloats`.
 *
 * @pure true
 * @complexity O(n)
 */
export const parseNode = (
  text: string,
  options: NodeParseOptions = defaultNodeParseOptions
): Either.Either<JsonNode, JsonParseError> => parseWith(nodeFacade(options), text)
