/**
 * Symbol graph normalization
 *
 * Turns the compiler's symbol graph export into a Snapshot: only externally
 * visible symbols are kept, each reduced to one whitespace-normalized declaration.
 */

import * as fs from "fs";
import { z } from "zod";
import { ExportUnavailableError, MalformedExportError } from "./errors.js";
import { log } from "./logger.js";
import type { Snapshot } from "./types.js";

const DeclarationFragmentSchema = z.object({
  kind: z.string(),
  spelling: z.string(),
});

const SymbolSchema = z.object({
  identifier: z.object({ precise: z.string() }),
  names: z.object({ title: z.string() }),
  kind: z.object({
    identifier: z.string(),
    displayName: z.string().optional(),
  }),
  accessLevel: z.string().optional(),
  declarationFragments: z.array(DeclarationFragmentSchema).optional(),
});

export const SymbolGraphSchema = z.object({
  symbols: z.array(SymbolSchema),
});

export type SymbolGraph = z.infer<typeof SymbolGraphSchema>;
export type SymbolRecord = z.infer<typeof SymbolSchema>;

const PUBLIC_ACCESS_LEVELS: ReadonlySet<string> = new Set(["public", "open"]);

export function isExternallyVisible(accessLevel: string | undefined): boolean {
  return accessLevel !== undefined && PUBLIC_ACCESS_LEVELS.has(accessLevel);
}

/**
 * Format zod issues as `path: message` strings
 */
export function formatIssues(error: z.ZodError, limit = 5): string[] {
  return error.issues.slice(0, limit).map((issue) => {
    const where = issue.path.length > 0 ? issue.path.join(".") : "root";
    return `${where}: ${issue.message}`;
  });
}

/**
 * Parse and validate symbol graph JSON text
 */
export function parseSymbolGraph(text: string, source = "<input>"): SymbolGraph {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new MalformedExportError(source, [
      error instanceof Error ? error.message : String(error),
    ]);
  }

  const parsed = SymbolGraphSchema.safeParse(raw);
  if (!parsed.success) {
    throw new MalformedExportError(source, formatIssues(parsed.error));
  }
  return parsed.data;
}

export function readSymbolGraphFile(target: string, filePath: string): SymbolGraph {
  let text: string;
  try {
    text = fs.readFileSync(filePath, "utf-8");
  } catch (error) {
    throw new ExportUnavailableError(target, `Cannot read symbol graph ${filePath}: ${error}`);
  }
  return parseSymbolGraph(text, filePath);
}

/**
 * Derive the comparison signature of a symbol.
 * Falls back to "<kind> <name>" when the export carries no declaration.
 */
export function symbolSignature(symbol: SymbolRecord): string {
  const fragments = symbol.declarationFragments;
  if (fragments && fragments.length > 0) {
    return fragments
      .map((f) => f.spelling)
      .join("")
      .replace(/\s+/g, " ")
      .trim();
  }
  return `${symbol.kind.identifier} ${symbol.names.title}`;
}

export function normalizeSymbolGraph(
  graph: SymbolGraph,
  target: string,
  now: Date = new Date()
): Snapshot {
  const symbols = new Map<string, string>();
  let duplicates = 0;

  for (const symbol of graph.symbols) {
    if (!isExternallyVisible(symbol.accessLevel)) continue;

    const id = symbol.identifier.precise;
    if (symbols.has(id)) {
      duplicates++;
      log.debug(`Duplicate symbol identifier in ${target}: ${id}`);
    }
    // Later occurrence wins
    symbols.set(id, symbolSignature(symbol));
  }

  if (duplicates > 0) {
    log.warning(`${target}: ${duplicates} duplicate public symbol identifier(s) in export`);
  }
  log.debug(`${target}: ${symbols.size} public symbols of ${graph.symbols.length}`);

  return {
    target,
    createdAt: now.toISOString(),
    symbols,
  };
}
