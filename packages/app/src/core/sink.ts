// CHANGE: provide the output sinks the printer writes into
// WHY: the writer streams string chunks; callers want either text or UTF-8 bytes
// REF: req-printer-sink-1
// SOURCE: n/a
// FORMAT THEOREM: ∀s: flush(s) → bytes(s) = utf8(concat(chunks(s)))
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: a byte buffer never exposes capacity beyond the bytes written
// COMPLEXITY: O(n) amortized

export interface OutputSink {
  readonly write: (chunk: string) => void
  readonly flush: () => void
}

export interface TextSink extends OutputSink {
  readonly contents: () => string
}

export interface ReadOnlyByteBuffer {
  readonly size: number
  readonly get: (index: number) => number | undefined
  readonly toUint8Array: () => Uint8Array
  readonly decode: () => string
}

export interface ByteSink extends OutputSink {
  readonly toByteBuffer: () => ReadOnlyByteBuffer
}

export const textSink = (): TextSink => {
  const chunks: Array<string> = []
  return {
    write: (chunk) => {
      chunks.push(chunk)
    },
    flush: () => {
      const joined = chunks.join("")
      chunks.length = 0
      chunks.push(joined)
    },
    contents: () => chunks.join("")
  }
}

const INITIAL_CAPACITY = 32

const growTo = (bytes: Uint8Array, required: number): Uint8Array => {
  if (required <= bytes.length) {
    return bytes
  }
  let capacity = Math.max(bytes.length, INITIAL_CAPACITY)
  while (capacity < required) {
    capacity *= 2
  }
  const next = new Uint8Array(capacity)
  next.set(bytes)
  return next
}

const readOnlyView = (bytes: Uint8Array): ReadOnlyByteBuffer => ({
  size: bytes.length,
  get: (index) => (Number.isInteger(index) && index >= 0 && index < bytes.length ? bytes[index] : undefined),
  toUint8Array: () => bytes.slice(),
  decode: () => new TextDecoder().decode(bytes)
})

/**
 * Sink over a growable byte array; text is UTF-8 encoded on flush.
 *
 * @pure false
 * @invariant toByteBuffer().size = number of bytes flushed so far
 * @complexity O(n) amortized
 */
export const byteSink = (): ByteSink => {
  const encoder = new TextEncoder()
  const pending: Array<string> = []
  let bytes: Uint8Array = new Uint8Array(INITIAL_CAPACITY)
  let length = 0
  return {
    write: (chunk) => {
      pending.push(chunk)
    },
    flush: () => {
      if (pending.length === 0) {
        return
      }
      const encoded = encoder.encode(pending.join(""))
      pending.length = 0
      bytes = growTo(bytes, length + encoded.length)
      bytes.set(encoded, length)
      length += encoded.length
    },
    toByteBuffer: () => readOnlyView(bytes.subarray(0, length))
  }
}
