// Command execution layer: every rpm/dnf/yum/tar/curl invocation passes through this module.
// LocalExecutor.execute() is the boundary between the engine and the OS; tests swap in
// an in-process Executor that records argv instead of running anything.
import { execFile } from "node:child_process";
import type { Command } from "../types/command.js";
import type { DurationCategory } from "../types/risk.js";
import { DURATION_TIMEOUTS } from "../types/risk.js";

/** Result of command execution. */
export interface ExecResult {
  readonly stdout: string;
  readonly stderr: string;
  readonly exitCode: number;
  readonly durationMs: number;
}

/** Executor interface. */
export interface Executor {
  execute(command: Command, timeoutMs: number): Promise<ExecResult>;
}

/** Local executor using child_process. Never spawns a shell unless argv[0] is "bash". */
export class LocalExecutor implements Executor {
  async execute(command: Command, timeoutMs: number): Promise<ExecResult> {
    const start = performance.now();
    const [cmd, ...args] = command.argv;

    return new Promise<ExecResult>((resolve) => {
      const child = execFile(
        cmd,
        args,
        {
          timeout: timeoutMs,
          // Package listings on large hosts run to a few MB; cap runaway output.
          maxBuffer: 32 * 1024 * 1024,
          env: command.env ? { ...process.env, ...command.env } : process.env,
        },
        (error, stdout, stderr) => {
          const durationMs = Math.round(performance.now() - start);
          resolve({ stdout: stdout ?? "", stderr: stderr || (error?.message ?? ""), exitCode: exitCodeOf(error), durationMs });
        },
      );

      if (command.stdin && child.stdin) {
        child.stdin.write(command.stdin);
        child.stdin.end();
      }
    });
  }
}

function exitCodeOf(error: Error | null): number {
  if (!error) return 0;
  if ("code" in error && typeof error.code === "number") return error.code;
  // Spawn failures (ENOENT) carry a string code; report them like a shell would.
  if ("code" in error && error.code === "ENOENT") return 127;
  return 1;
}

/**
 * Execute a raw bash command string. Convenience for probes such as `command -v`
 * where argv decomposition is impractical.
 */
export async function execBash(executor: Executor, cmd: string, timeoutMs: number): Promise<ExecResult> {
  return executor.execute({ argv: ["bash", "-c", cmd] }, timeoutMs);
}

/** Timeout for a duration category, capped by the configured ceiling (seconds, 0 = none). */
export function resolveTimeout(duration: DurationCategory, ceilingSeconds: number): number {
  return ceilingSeconds > 0 ? Math.min(DURATION_TIMEOUTS[duration], ceilingSeconds * 1000) : DURATION_TIMEOUTS[duration];
}
