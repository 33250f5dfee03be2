import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import { quoteString } from "../../src/core/generator.js"
import { arr, fromDoubleOrNull, fromLong, fromNumber, fromString, jsonNull, jsonTrue, obj } from "../../src/core/json.js"
import { jsonDecimal, jsonDouble } from "../../src/core/json-number.js"
import { printToBytes, printToText } from "../../src/core/printer.js"
import { byteSink, textSink } from "../../src/core/sink.js"

describe("printToText", () => {
  it.effect("writes compact JSON by default", () =>
    Effect.sync(() => {
      const value = obj(["a", fromLong(1n)], ["b", arr(fromDoubleOrNull(1.5), jsonNull)], ["c", obj()], ["d", arr()])
      expect(printToText(value)).toBe(`{"a":1,"b":[1.5,null],"c":{},"d":[]}`)
    }))

  it.effect("indents objects and keeps arrays on one line", () =>
    Effect.sync(() => {
      const value = obj(["a", fromLong(1n)], ["b", arr(fromDoubleOrNull(1.5), jsonNull)], ["o", obj(["x", jsonTrue])])
      expect(printToText(value, { indent: true })).toBe(
        "{\n  \"a\" : 1,\n  \"b\" : [ 1.5, null ],\n  \"o\" : {\n    \"x\" : true\n  }\n}"
      )
      expect(printToText(arr(obj(["k", jsonNull])), { indent: true })).toBe("[ {\n  \"k\" : null\n} ]")
      expect(printToText(arr(), { indent: true })).toBe("[ ]")
      expect(printToText(obj(), { indent: true })).toBe("{ }")
    }))

  it.effect("writes numbers the way the node tree holds them", () =>
    Effect.sync(() => {
      expect(printToText(fromDoubleOrNull(1e10))).toBe("1.0E10")
      expect(printToText(fromNumber(jsonDecimal("1e3")))).toBe("1E+3")
      expect(printToText(fromNumber(jsonDecimal("0.50")))).toBe("0.50")
      expect(printToText(fromDoubleOrNull(-0))).toBe("-0.0")
      expect(printToText(fromLong(-9223372036854775808n))).toBe("-9223372036854775808")
    }))

  it.effect("quotes numbers that fall back to text", () =>
    Effect.sync(() => {
      expect(printToText(fromNumber(jsonDecimal("1e2147483648")))).toBe("\"1e2147483648\"")
      expect(printToText(fromNumber(jsonDouble(Number.NaN)))).toBe("\"NaN\"")
    }))
})

describe("quoteString", () => {
  it.effect("uses short escapes and upper-case unicode escapes", () =>
    Effect.sync(() => {
      expect(quoteString("a\"b\\c/\n\t", false)).toBe("\"a\\\"b\\\\c/\\n\\t\"")
      expect(quoteString("\u0001\u001f", false)).toBe("\"\\u0001\\u001F\"")
    }))

  it.effect("escapes non-ASCII units only on request", () =>
    Effect.sync(() => {
      expect(quoteString("é€", false)).toBe("\"é€\"")
      expect(quoteString("é€", true)).toBe("\"\\u00E9\\u20AC\"")
      expect(quoteString("😀", true)).toBe("\"\\uD83D\\uDE00\"")
    }))

  it.effect("applies to keys as well as values", () =>
    Effect.sync(() => {
      expect(printToText(obj(["ключ", fromString("é")]), { escapeNonAscii: true })).toBe(
        "{\"\\u043A\\u043B\\u044E\\u0447\":\"\\u00E9\"}"
      )
    }))
})

describe("printToBytes", () => {
  it.effect("encodes UTF-8 and exposes only the written bytes", () =>
    Effect.sync(() => {
      const buffer = printToBytes(fromString("é"))
      expect(buffer.size).toBe(4)
      expect(buffer.get(0)).toBe(0x22)
      expect(buffer.get(1)).toBe(0xc3)
      expect(buffer.get(2)).toBe(0xa9)
      expect(buffer.get(4)).toBeUndefined()
      expect(buffer.decode()).toBe("\"é\"")
    }))

  it.effect("grows past the initial capacity", () =>
    Effect.sync(() => {
      const value = fromString("x".repeat(100))
      const buffer = printToBytes(value, { indent: true })
      expect(buffer.size).toBe(102)
      expect(buffer.decode()).toBe(printToText(value))
    }))

  it.effect("hands out copies", () =>
    Effect.sync(() => {
      const buffer = printToBytes(jsonNull)
      const copy = buffer.toUint8Array()
      copy[0] = 0
      expect(buffer.get(0)).toBe(0x6e)
    }))
})

describe("sinks", () => {
  it.effect("byte sink shows nothing before flush", () =>
    Effect.sync(() => {
      const sink = byteSink()
      sink.write("abc")
      expect(sink.toByteBuffer().size).toBe(0)
      sink.flush()
      expect(sink.toByteBuffer().decode()).toBe("abc")
    }))

  it.effect("text sink joins chunks", () =>
    Effect.sync(() => {
      const sink = textSink()
      sink.write("[")
      sink.write("1")
      sink.flush()
      sink.write("]")
      expect(sink.contents()).toBe("[1]")
    }))
})
