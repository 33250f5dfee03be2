export type { FidelityNote, FidelityReport, FidelityStats } from "./core/audit.js"
export { auditValue, hasLossyNumbers, renderHumanReport, renderJsonReport } from "./core/audit.js"
export { nodeDepth, nodeToValueBounded, valueDepth, valueToNodeBounded } from "./core/depth.js"
export type { AppError, TooDeep } from "./core/errors.js"
export { jsonEquals } from "./core/equality.js"
export type { PrinterOptions } from "./core/generator.js"
export { defaultPrinterOptions, quoteString, writeJson } from "./core/generator.js"
export * from "./core/json.js"
export * from "./core/json-number.js"
export * from "./core/node.js"
export { nodeToValue } from "./core/node-to-value.js"
export type { JsonFacade, JsonParseError, NodeParseOptions } from "./core/parse.js"
export { defaultNodeParseOptions, parseNode, parseValue, parseWith } from "./core/parse.js"
export { printToBytes, printToText } from "./core/printer.js"
export type { ByteSink, OutputSink, ReadOnlyByteBuffer, TextSink } from "./core/sink.js"
export { byteSink, textSink } from "./core/sink.js"
export { numberToNode, valueToNode } from "./core/value-to-node.js"
