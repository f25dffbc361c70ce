import { spawn, ChildProcess } from "child_process";
import fs from "fs";
import path from "path";

import type { BuildStage } from "./errors";
import { StageFailure, tailOutput } from "./errors";
import type { Logger } from "./debug";

const activeChildren = new Set<ChildProcess>();
let exitHookRegistered = false;

function registerExitHook() {
  if (exitHookRegistered) return;
  exitHookRegistered = true;
  process.once("exit", () => {
    for (const child of activeChildren) {
      try {
        child.kill("SIGKILL");
      } catch {
        // already gone
      }
    }
  });
}

/**
 * Kill `child` if this process exits while it is still running.
 */
export function trackChild(child: ChildProcess) {
  registerExitHook();
  activeChildren.add(child);
  const cleanup = () => {
    activeChildren.delete(child);
  };
  child.once("exit", cleanup);
  child.once("error", cleanup);
}

/** grace period between SIGTERM and SIGKILL */
export const KILL_GRACE_MS = 3000;

/** output kept per stream */
const MAX_CAPTURE_CHARS = 256 * 1024;

/**
 * A single external tool call. `argv[0]` is the executable; nothing is
 * interpreted by a shell.
 */
export type ToolInvocation = {
  argv: readonly string[];
  cwd?: string;
  /** merged over the current environment */
  env?: Record<string, string>;
  /** hard wall-clock limit */
  timeoutMs: number;
  /** data written to stdin before it is closed */
  input?: string | Buffer;
};

export type ToolResult = {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
  /** true when the timeout fired and the process was killed */
  timedOut: boolean;
  durationMs: number;
};

/**
 * Seam for every external process the builders and validators start.
 */
export interface ToolRunner {
  run(invocation: ToolInvocation): Promise<ToolResult>;
}

function appendCapped(buffer: string, chunk: string) {
  const next = buffer + chunk;
  return next.length > MAX_CAPTURE_CHARS ? next.slice(next.length - MAX_CAPTURE_CHARS) : next;
}

/**
 * Runs tools as local child processes.
 */
export class LocalToolRunner implements ToolRunner {
  private readonly logger?: Logger;

  constructor(logger?: Logger) {
    this.logger = logger;
  }

  run(invocation: ToolInvocation): Promise<ToolResult> {
    const [command, ...args] = invocation.argv;
    if (!command) {
      return Promise.reject(new Error("empty argument vector"));
    }

    this.logger?.debug("exec", `${invocation.argv.join(" ")}${invocation.cwd ? ` (cwd ${invocation.cwd})` : ""}`);
    const started = Date.now();

    return new Promise<ToolResult>((resolve, reject) => {
      const child = spawn(command, args, {
        cwd: invocation.cwd,
        env: invocation.env ? { ...process.env, ...invocation.env } : process.env,
        stdio: [invocation.input === undefined ? "ignore" : "pipe", "pipe", "pipe"],
      });
      trackChild(child);

      let stdout = "";
      let stderr = "";
      let timedOut = false;
      let killTimer: NodeJS.Timeout | null = null;

      child.stdout?.setEncoding("utf8");
      child.stderr?.setEncoding("utf8");
      child.stdout?.on("data", (chunk: string) => {
        stdout = appendCapped(stdout, chunk);
      });
      child.stderr?.on("data", (chunk: string) => {
        stderr = appendCapped(stderr, chunk);
      });

      if (invocation.input !== undefined && child.stdin) {
        child.stdin.on("error", () => {
          // reader exited early, the exit status reports it
        });
        child.stdin.end(invocation.input);
      }

      const timer = setTimeout(() => {
        timedOut = true;
        this.logger?.debug("exec", `timeout after ${invocation.timeoutMs}ms: ${command}`);
        child.kill("SIGTERM");
        killTimer = setTimeout(() => {
          child.kill("SIGKILL");
        }, KILL_GRACE_MS);
      }, invocation.timeoutMs);

      child.once("error", (err) => {
        clearTimeout(timer);
        if (killTimer) clearTimeout(killTimer);
        reject(err);
      });

      child.once("close", (exitCode, signal) => {
        clearTimeout(timer);
        if (killTimer) clearTimeout(killTimer);
        resolve({
          exitCode,
          signal,
          stdout,
          stderr,
          timedOut,
          durationMs: Date.now() - started,
        });
      });
    });
  }
}

export function toolSucceeded(result: ToolResult) {
  return !result.timedOut && result.exitCode === 0;
}

/**
 * Human readable reason a tool call failed.
 */
export function describeToolFailure(argv: readonly string[], result: ToolResult): string {
  const name = path.basename(argv[0] ?? "");
  if (result.timedOut) {
    return `${name} timed out after ${result.durationMs}ms`;
  }
  if (result.signal) {
    return `${name} killed by ${result.signal}`;
  }
  return `${name} exited with code ${result.exitCode}`;
}

/**
 * Run one step of a build stage. Any failure (spawn error, non-zero exit,
 * timeout) becomes a `StageFailure` for `stage`.
 */
export async function runStep(
  runner: ToolRunner,
  stage: BuildStage,
  invocation: ToolInvocation
): Promise<ToolResult> {
  let result: ToolResult;
  try {
    result = await runner.run(invocation);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new StageFailure(stage, `failed to start ${invocation.argv[0] ?? ""}: ${message}`);
  }

  if (!toolSucceeded(result)) {
    throw new StageFailure(
      stage,
      describeToolFailure(invocation.argv, result),
      tailOutput(`${result.stdout}${result.stderr}`)
    );
  }
  return result;
}

/**
 * Locate `name` on `PATH` without running it.
 */
export function findExecutable(name: string, envPath: string | undefined = process.env.PATH): string | null {
  if (name.includes(path.sep)) {
    return isExecutable(name) ? name : null;
  }
  for (const dir of (envPath ?? "").split(path.delimiter)) {
    if (!dir) continue;
    const candidate = path.join(dir, name);
    if (isExecutable(candidate)) return candidate;
  }
  return null;
}

function isExecutable(file: string) {
  try {
    const stat = fs.statSync(file);
    if (!stat.isFile()) return false;
    fs.accessSync(file, fs.constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Names from `tools` that are not on `PATH`.
 */
export function missingTools(tools: readonly string[], envPath?: string): string[] {
  return tools.filter((tool) => findExecutable(tool, envPath) === null);
}
