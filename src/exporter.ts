/**
 * Symbol graph export - runs the host toolchain and locates its output
 */

import { spawn, type ChildProcess } from "child_process";
import * as fs from "fs";
import * as path from "path";
import { ExportUnavailableError } from "./errors.js";
import { log } from "./logger.js";

export interface SymbolGraphExporter {
  /**
   * Produce the symbol graph for a target and return the path of the JSON file
   */
  exportSymbolGraph(target: string): Promise<string>;
}

export interface CommandExporterOptions {
  cwd: string;
  exportCommand: string[];
  symbolGraphDir: string;
  outputDir: string;
  timeoutMs: number;
}

export interface ExecOutput {
  exitCode: number;
  stdout: string;
  stderr: string;
}

/** Time a timed-out command gets after SIGTERM before it is sent SIGKILL */
const KILL_GRACE_MS = 5_000;

function formatTimeout(timeoutMs: number): string {
  return timeoutMs < 1000 ? `${timeoutMs}ms` : `${Math.ceil(timeoutMs / 1000)}s`;
}

/**
 * Signal the command and, outside Windows, every process it started
 */
function killTree(child: ChildProcess, signal: NodeJS.Signals): void {
  if (child.pid === undefined) return;
  try {
    if (process.platform === "win32") {
      child.kill(signal);
    } else {
      process.kill(-child.pid, signal);
    }
  } catch (error) {
    // ESRCH: the group already exited
    log.debug(`kill ${signal} ${child.pid}: ${error instanceof Error ? error.message : String(error)}`);
  }
}

/**
 * Run a command and capture its output. A command still running after
 * `timeoutMs` is killed, and the promise rejects once it has exited.
 */
export function execWithTimeout(
  argv: string[],
  cwd: string,
  timeoutMs: number
): Promise<ExecOutput> {
  const [command, ...args] = argv;

  return new Promise((resolve, reject) => {
    const child = spawn(command, args, {
      cwd,
      detached: process.platform !== "win32",
      stdio: ["ignore", "pipe", "pipe"],
    });

    let stdout = "";
    let stderr = "";
    let timedOut = false;
    let settled = false;
    let escalation: NodeJS.Timeout | undefined;

    const timer = setTimeout(() => {
      timedOut = true;
      killTree(child, "SIGTERM");
      escalation = setTimeout(() => killTree(child, "SIGKILL"), KILL_GRACE_MS);
    }, timeoutMs);

    const finish = (settle: () => void): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      clearTimeout(escalation);
      settle();
    };

    child.stdout?.on("data", (data: Buffer) => {
      stdout += data.toString();
    });
    child.stderr?.on("data", (data: Buffer) => {
      stderr += data.toString();
    });

    child.on("error", (error) => finish(() => reject(error)));
    child.on("close", (code) =>
      finish(() => {
        if (timedOut) {
          reject(new Error(`Process exceeded ${formatTimeout(timeoutMs)} timeout`));
        } else {
          resolve({ exitCode: code ?? 1, stdout, stderr });
        }
      })
    );
  });
}

/**
 * Find the newest `<target>.symbols.json` or `<target>@<platform>.symbols.json`
 */
export function findSymbolGraph(symbolGraphDir: string, target: string): string | null {
  if (!fs.existsSync(symbolGraphDir)) return null;

  const candidates = fs
    .readdirSync(symbolGraphDir)
    .filter(
      (name) =>
        name.endsWith(".symbols.json") &&
        (name.startsWith(`${target}.`) || name.startsWith(`${target}@`))
    )
    .map((name) => {
      const file = path.join(symbolGraphDir, name);
      return { file, mtimeMs: fs.statSync(file).mtimeMs };
    })
    .sort((a, b) => a.mtimeMs - b.mtimeMs);

  const newest = candidates[candidates.length - 1];
  return newest ? newest.file : null;
}

/**
 * Exporter that shells out to the configured toolchain command
 * (by default `swift package dump-symbol-graph`)
 */
export class CommandSymbolGraphExporter implements SymbolGraphExporter {
  constructor(private readonly options: CommandExporterOptions) {}

  async exportSymbolGraph(target: string): Promise<string> {
    const { cwd, exportCommand, symbolGraphDir, outputDir, timeoutMs } = this.options;

    const perTargetOut = path.join(outputDir, target);
    fs.rmSync(perTargetOut, { recursive: true, force: true });
    fs.mkdirSync(perTargetOut, { recursive: true });

    log.debug(`Running: ${exportCommand.join(" ")}`);
    let result: ExecOutput;
    try {
      result = await execWithTimeout(exportCommand, cwd, timeoutMs);
    } catch (error) {
      throw new ExportUnavailableError(
        target,
        `Symbol graph export failed: ${error instanceof Error ? error.message : String(error)}`
      );
    }

    if (result.exitCode !== 0) {
      throw new ExportUnavailableError(
        target,
        `${exportCommand[0]} exited with code ${result.exitCode}`,
        (result.stdout + result.stderr).trim()
      );
    }
    if (result.stderr.trim()) {
      log.debug(result.stderr.trim());
    }

    const produced = findSymbolGraph(symbolGraphDir, target);
    if (!produced) {
      throw new ExportUnavailableError(
        target,
        `No .symbols.json produced for target ${target} in ${symbolGraphDir}`
      );
    }

    const dest = path.join(perTargetOut, `${target}.symbols.json`);
    fs.copyFileSync(produced, dest);
    log.debug(`Symbol graph for ${target}: ${produced}`);
    return dest;
  }
}
