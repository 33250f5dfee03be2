import type { JsonValue } from "./json.js"
import type { JsonNode } from "./node.js"
import { asText } from "./node.js"
import type { OutputSink } from "./sink.js"
import { numberToNode } from "./value-to-node.js"

// CHANGE: stream a value tree into a sink in the node model's output form
// WHY: printed numbers must read exactly as the node tree would write them
// REF: req-printer-writer-1
// SOURCE: n/a
// FORMAT THEOREM: ∀v: parse(print(v)) ≡ nodeToValue(valueToNode(v)) for numeric leaves
// PURITY: CORE
// EFFECT: sink writes
// INVARIANT: indentation only grows inside objects; arrays stay on one line
// COMPLEXITY: O(n) time, O(depth) stack

export interface PrinterOptions {
  readonly indent: boolean
  readonly escapeNonAscii: boolean
}

export const defaultPrinterOptions: PrinterOptions = {
  indent: false,
  escapeNonAscii: false
}

const shortEscapes: Readonly<Record<string, string>> = {
  "\"": "\\\"",
  "\\": "\\\\",
  "\b": "\\b",
  "\f": "\\f",
  "\n": "\\n",
  "\r": "\\r",
  "\t": "\\t"
}

const unicodeEscape = (code: number): string => `\\u${code.toString(16).toUpperCase().padStart(4, "0")}`

/**
 * Quote a string the way the node model's writer does: short escapes where
 * they exist, `\u00XX` for the remaining control characters.
 *
 * @param value - Raw string.
 * @param escapeNonAscii - Also escape every UTF-16 unit above 0x7F.
 * @returns Quoted JSON string literal.
 *
 * @pure true
 * @invariant "/" is never escaped
 * @complexity O(n)
 */
export const quoteString = (value: string, escapeNonAscii: boolean): string => {
  let out = "\""
  for (let index = 0; index < value.length; index++) {
    const unit = value.charAt(index)
    const code = value.charCodeAt(index)
    const short = shortEscapes[unit]
    if (short !== undefined) {
      out += short
    } else if (code < 0x20 || (escapeNonAscii && code > 0x7f)) {
      out += unicodeEscape(code)
    } else {
      out += unit
    }
  }
  return out + "\""
}

const writeNumberNode = (sink: OutputSink, node: JsonNode, options: PrinterOptions): void => {
  switch (node._tag) {
    case "TextNode":
      sink.write(quoteString(node.value, options.escapeNonAscii))
      return
    case "FloatNode":
    case "DoubleNode":
      sink.write(Number.isFinite(node.value) ? asText(node) : quoteString(asText(node), false))
      return
    default:
      sink.write(asText(node))
  }
}

const writeIndent = (sink: OutputSink, level: number): void => {
  sink.write(`\n${"  ".repeat(level)}`)
}

const writeArray = (
  sink: OutputSink,
  values: ReadonlyArray<JsonValue>,
  options: PrinterOptions,
  level: number
): void => {
  if (values.length === 0) {
    sink.write(options.indent ? "[ ]" : "[]")
    return
  }
  sink.write(options.indent ? "[ " : "[")
  values.forEach((item, index) => {
    if (index > 0) {
      sink.write(options.indent ? ", " : ",")
    }
    writeAt(sink, item, options, level)
  })
  sink.write(options.indent ? " ]" : "]")
}

const writeObject = (
  sink: OutputSink,
  fields: ReadonlyMap<string, JsonValue>,
  options: PrinterOptions,
  level: number
): void => {
  if (fields.size === 0) {
    sink.write(options.indent ? "{ }" : "{}")
    return
  }
  sink.write("{")
  const inner = level + 1
  let first = true
  for (const [key, item] of fields) {
    if (!first) {
      sink.write(",")
    }
    first = false
    if (options.indent) {
      writeIndent(sink, inner)
    }
    sink.write(quoteString(key, options.escapeNonAscii))
    sink.write(options.indent ? " : " : ":")
    writeAt(sink, item, options, inner)
  }
  if (options.indent) {
    writeIndent(sink, level)
  }
  sink.write("}")
}

const writeAt = (sink: OutputSink, value: JsonValue, options: PrinterOptions, level: number): void => {
  switch (value._tag) {
    case "Null":
      sink.write("null")
      return
    case "Bool":
      sink.write(value.value ? "true" : "false")
      return
    case "String":
      sink.write(quoteString(value.value, options.escapeNonAscii))
      return
    case "Number":
      writeNumberNode(sink, numberToNode(value), options)
      return
    case "Array":
      writeArray(sink, value.values, options, level)
      return
    case "Object":
      writeObject(sink, value.fields, options, level)
  }
}

/**
 * Write a value tree into a sink. The sink is not flushed.
 *
 * Numbers pass through `numberToNode` so the output carries the node
 * model's text: `-0.0`, `1.0E10`, `1E+3`, or a quoted fallback string.
 *
 * @pure false
 * @effect sink.write
 * @complexity O(n)
 */
export const writeJson = (sink: OutputSink, value: JsonValue, options: PrinterOptions): void => {
  writeAt(sink, value, options, 0)
}
