import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import { auditValue, hasLossyNumbers, keyPath, renderHumanReport, renderJsonReport } from "../../src/core/audit.js"
import { arr, fromDoubleOrNull, fromLong, fromNumber, fromString, obj } from "../../src/core/json.js"
import { jsonDecimal } from "../../src/core/json-number.js"

const lossy = obj(
  ["a", fromNumber(jsonDecimal("1e2147483648"))],
  ["b", fromDoubleOrNull(-0)],
  ["my key", arr(fromLong(1n), fromNumber(jsonDecimal("-0")))]
)

describe("auditValue", () => {
  it.effect("notes text fallbacks and negative zeros in document order", () =>
    Effect.sync(() => {
      const report = auditValue(lossy)
      expect(report.notes).toEqual([
        { type: "text-fallback", path: "$.a", text: "1e2147483648" },
        { type: "negative-zero", path: "$.b" },
        { type: "negative-zero", path: "$[\"my key\"][1]" }
      ])
      expect(report.stats).toEqual({ values: 6, numbers: 4 })
      expect(hasLossyNumbers(report)).toBe(true)
    }))

  it.effect("finds nothing in a faithful document", () =>
    Effect.sync(() => {
      const report = auditValue(arr(fromLong(5n), fromDoubleOrNull(0.5), fromString("-0")))
      expect(report.notes).toEqual([])
      expect(hasLossyNumbers(report)).toBe(false)
      expect(report.stats).toEqual({ values: 4, numbers: 2 })
    }))

  it.effect("quotes keys that are not identifiers", () =>
    Effect.sync(() => {
      expect(keyPath("$", "plain_key1")).toBe("$.plain_key1")
      expect(keyPath("$", "1st")).toBe("$[\"1st\"]")
    }))
})

describe("fidelity report rendering", () => {
  it.effect("renders a human report", () =>
    Effect.sync(() => {
      expect(renderHumanReport(auditValue(lossy))).toBe(
        [
          "Lossy numbers:",
          "  - [text-fallback] $.a: 1e2147483648",
          "  - [negative-zero] $.b",
          "  - [negative-zero] $[\"my key\"][1]",
          "Stats: values=6, numbers=4"
        ].join("\n")
      )
      expect(renderHumanReport(auditValue(fromLong(1n)))).toBe("Lossy numbers: (none)\nStats: values=1, numbers=1")
    }))

  it.effect("renders a JSON report", () =>
    Effect.sync(() => {
      const parsed: unknown = JSON.parse(renderJsonReport(auditValue(obj(["b", fromDoubleOrNull(-0)]))))
      expect(parsed).toEqual({
        notes: [{ type: "negative-zero", path: "$.b" }],
        stats: { values: 2, numbers: 1 }
      })
    }))
})
