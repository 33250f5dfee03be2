import type { PrinterOptions } from "./generator.js"
import { defaultPrinterOptions, writeJson } from "./generator.js"
import type { JsonValue } from "./json.js"
import type { OutputSink, ReadOnlyByteBuffer } from "./sink.js"
import { byteSink, textSink } from "./sink.js"

// CHANGE: print value trees to text or UTF-8 bytes
// WHY: the printer owns the sink; the writer only streams tokens into it
// REF: req-printer-1
// SOURCE: n/a
// FORMAT THEOREM: ∀v,o: decode(printToBytes(v,o)) = printToText(v,o)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: the sink is flushed on every exit path
// COMPLEXITY: O(n)

const resolveOptions = (options: Partial<PrinterOptions> | undefined): PrinterOptions => ({
  indent: options?.indent ?? defaultPrinterOptions.indent,
  escapeNonAscii: options?.escapeNonAscii ?? defaultPrinterOptions.escapeNonAscii
})

const writeFlushed = (sink: OutputSink, value: JsonValue, options: PrinterOptions): void => {
  try {
    writeJson(sink, value, options)
  } finally {
    sink.flush()
  }
}

export const printToText = (value: JsonValue, options?: Partial<PrinterOptions>): string => {
  const sink = textSink()
  writeFlushed(sink, value, resolveOptions(options))
  return sink.contents()
}

/**
 * Print a value tree as UTF-8 bytes.
 *
 * @returns Read-only view bounded to the bytes written.
 *
 * @pure true
 * @complexity O(n)
 */
export const printToBytes = (value: JsonValue, options?: Partial<PrinterOptions>): ReadOnlyByteBuffer => {
  const sink = byteSink()
  writeFlushed(sink, value, resolveOptions(options))
  return sink.toByteBuffer()
}
