/**
 * Baseline storage - one canonical JSON file per target
 */

import * as fs from "fs";
import * as path from "path";
import { z } from "zod";
import { encodeCanonical } from "./canonical.js";
import { BaselineMissingError, MalformedBaselineError } from "./errors.js";
import { formatIssues } from "./normalizer.js";
import type { Snapshot } from "./types.js";

const BaselineFileSchema = z.object({
  target: z.string(),
  createdAt: z.string(),
  symbols: z.record(z.string()),
});

export function baselinePath(baselineDir: string, target: string): string {
  return path.join(baselineDir, `${target}.json`);
}

/**
 * Encode a snapshot as the bytes stored on disk
 */
export function encodeSnapshot(snapshot: Snapshot): Buffer {
  const body = encodeCanonical({
    target: snapshot.target,
    createdAt: snapshot.createdAt,
    symbols: Object.fromEntries(snapshot.symbols),
  });
  return Buffer.concat([body, Buffer.from("\n")]);
}

export function decodeSnapshot(text: string, source = "<input>"): Snapshot {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new MalformedBaselineError(source, [
      error instanceof Error ? error.message : String(error),
    ]);
  }

  const parsed = BaselineFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new MalformedBaselineError(source, formatIssues(parsed.error));
  }

  return {
    target: parsed.data.target,
    createdAt: parsed.data.createdAt,
    symbols: new Map(Object.entries(parsed.data.symbols)),
  };
}

/**
 * Load the stored baseline for a target
 */
export function loadBaseline(baselineDir: string, target: string): Snapshot {
  const file = baselinePath(baselineDir, target);
  if (!fs.existsSync(file)) {
    throw new BaselineMissingError(target, file);
  }
  return decodeSnapshot(fs.readFileSync(file, "utf-8"), file);
}

/**
 * Replace the stored baseline for the snapshot's target.
 *
 * The file is written beside the destination and renamed over it, so readers see
 * either the previous baseline or the new one, never a partial write.
 */
export function saveBaseline(snapshot: Snapshot, baselineDir: string): string {
  fs.mkdirSync(baselineDir, { recursive: true });
  const file = baselinePath(baselineDir, snapshot.target);
  const tmp = path.join(
    baselineDir,
    `.${snapshot.target}.json.${process.pid}.${Date.now()}.tmp`
  );

  const data = encodeSnapshot(snapshot);
  try {
    fs.writeFileSync(tmp, data);
    fs.renameSync(tmp, file);
  } catch (error) {
    fs.rmSync(tmp, { force: true });
    throw error;
  }
  return file;
}
