/**
 * Core diffing logic for API snapshots
 *
 * Pure functions for comparing snapshots - no I/O side effects.
 */

import type { SignatureChange, Snapshot, SnapshotDiff } from "./types.js";

function byIdentifier(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Compare a baseline snapshot against a newer one.
 *
 * Both snapshots must describe the same target; the target of the newer one is
 * reported.
 */
export function diffSnapshots(oldSnapshot: Snapshot, newSnapshot: Snapshot): SnapshotDiff {
  const added: string[] = [];
  const removed: string[] = [];
  const changed: string[] = [];

  for (const [id, signature] of oldSnapshot.symbols) {
    const current = newSnapshot.symbols.get(id);
    if (current === undefined) {
      removed.push(id);
    } else if (current !== signature) {
      changed.push(id);
    }
  }

  for (const id of newSnapshot.symbols.keys()) {
    if (!oldSnapshot.symbols.has(id)) {
      added.push(id);
    }
  }

  return {
    target: newSnapshot.target,
    added: added.sort(byIdentifier),
    removed: removed.sort(byIdentifier),
    changed: changed.sort(byIdentifier),
  };
}

export function isEmptyDiff(diff: SnapshotDiff): boolean {
  return diff.added.length === 0 && diff.removed.length === 0 && diff.changed.length === 0;
}

/**
 * Pair each changed identifier with its old and new signature
 */
export function describeSignatureChanges(
  oldSnapshot: Snapshot,
  newSnapshot: Snapshot,
  diff: SnapshotDiff
): SignatureChange[] {
  return diff.changed.map((identifier) => ({
    identifier,
    before: oldSnapshot.symbols.get(identifier) ?? "",
    after: newSnapshot.symbols.get(identifier) ?? "",
  }));
}

/**
 * Render a signature change as unified-diff style lines
 */
export function formatSignatureChange(change: SignatureChange): string {
  return [`@@ ${change.identifier}`, `- ${change.before}`, `+ ${change.after}`].join("\n");
}
