/**
 * API compatibility guard
 *
 * Snapshots the public symbols of a module, stores them as a baseline and
 * reports breaking changes against it.
 */

export * from "./types.js";
export * from "./errors.js";
export { canonicalStringify, encodeCanonical, type JsonValue } from "./canonical.js";
export {
  SymbolGraphSchema,
  isExternallyVisible,
  normalizeSymbolGraph,
  parseSymbolGraph,
  readSymbolGraphFile,
  symbolSignature,
  type SymbolGraph,
  type SymbolRecord,
} from "./normalizer.js";
export {
  baselinePath,
  decodeSnapshot,
  encodeSnapshot,
  loadBaseline,
  saveBaseline,
} from "./baseline.js";
export { describeSignatureChanges, diffSnapshots, isEmptyDiff } from "./diff.js";
export { evaluatePolicy } from "./policy.js";
export {
  CommandSymbolGraphExporter,
  findSymbolGraph,
  type CommandExporterOptions,
  type SymbolGraphExporter,
} from "./exporter.js";
export { DEFAULT_CONFIG_PATH, GuardConfigSchema, loadConfig, parseConfig } from "./config.js";
export {
  checkTarget,
  createContext,
  produceSnapshot,
  runGuard,
  updateBaseline,
  type GuardContext,
  type RunOptions,
} from "./guard.js";
export {
  generateMarkdownReport,
  generateTextReport,
  saveReport,
  summarize,
} from "./reporter.js";
export { ActionsLogger, ConsoleLogger, QuietLogger, setLogger, getLogger, type Logger } from "./logger.js";
