import { Match } from "effect"

import type { JsonNumberValue, JsonValue } from "./json.js"
import { isNegativeZero } from "./json-number.js"
import { numberToNode } from "./value-to-node.js"

// CHANGE: report numbers whose node form does not carry them faithfully
// WHY: the text fallback and the negative-zero asymmetry are silent by contract
// REF: req-audit-1
// SOURCE: n/a
// FORMAT THEOREM: ∀v: notes(audit(v)) = {n ∈ numbers(v) | lossy(n)} in document order
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: stats.numbers ≥ notes.length
// COMPLEXITY: O(n) time, O(depth) stack

export type FidelityNote =
  | { readonly type: "text-fallback"; readonly path: string; readonly text: string }
  | { readonly type: "negative-zero"; readonly path: string }

export interface FidelityStats {
  readonly values: number
  readonly numbers: number
}

export interface FidelityReport {
  readonly notes: ReadonlyArray<FidelityNote>
  readonly stats: FidelityStats
}

const IDENTIFIER = /^[A-Za-z_$][A-Za-z0-9_$]*$/u

export const keyPath = (parent: string, key: string): string =>
  IDENTIFIER.test(key) ? `${parent}.${key}` : `${parent}[${JSON.stringify(key)}]`

export const indexPath = (parent: string, index: number): string => `${parent}[${index}]`

const noteFor = (value: JsonNumberValue, path: string): FidelityNote | undefined => {
  if (isNegativeZero(value.value)) {
    return { type: "negative-zero", path }
  }
  const node = numberToNode(value)
  return node._tag === "TextNode" ? { type: "text-fallback", path, text: node.value } : undefined
}

interface AuditState {
  readonly notes: Array<FidelityNote>
  values: number
  numbers: number
}

const visit = (value: JsonValue, path: string, state: AuditState): void => {
  state.values += 1
  switch (value._tag) {
    case "Number": {
      state.numbers += 1
      const note = noteFor(value, path)
      if (note !== undefined) {
        state.notes.push(note)
      }
      return
    }
    case "Array":
      value.values.forEach((item, index) => visit(item, indexPath(path, index), state))
      return
    case "Object":
      for (const [key, item] of value.fields) {
        visit(item, keyPath(path, key), state)
      }
      return
    default:
      return
  }
}

/**
 * Walk a value tree and note every number that a value → node → value round
 * trip does not return unchanged in kind.
 *
 * @param value - Value tree.
 * @returns Notes in document order plus value and number counts.
 *
 * @pure true
 * @complexity O(n)
 */
export const auditValue = (value: JsonValue): FidelityReport => {
  const state: AuditState = { notes: [], values: 0, numbers: 0 }
  visit(value, "$", state)
  return { notes: state.notes, stats: { values: state.values, numbers: state.numbers } }
}

export const hasLossyNumbers = (report: FidelityReport): boolean => report.notes.length > 0

const formatNote = (note: FidelityNote): string =>
  Match.value(note).pipe(
    Match.when({ type: "text-fallback" }, (value) => `[text-fallback] ${value.path}: ${value.text}`),
    Match.when({ type: "negative-zero" }, (value) => `[negative-zero] ${value.path}`),
    Match.exhaustive
  )

/**
 * Render a human-readable fidelity report.
 *
 * @pure true
 * @complexity O(n)
 */
export const renderHumanReport = (report: FidelityReport): string => {
  const noteLines = report.notes.length === 0
    ? ["Lossy numbers: (none)"]
    : ["Lossy numbers:", ...report.notes.map((note) => `  - ${formatNote(note)}`)]
  return [...noteLines, `Stats: values=${report.stats.values}, numbers=${report.stats.numbers}`].join("\n")
}

export const renderJsonReport = (report: FidelityReport): string =>
  JSON.stringify({ notes: report.notes, stats: report.stats }, null, 2)
