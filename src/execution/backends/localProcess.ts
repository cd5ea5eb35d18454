import { spawn, type ChildProcess } from "child_process";
import { createWriteStream } from "fs";
import { finished } from "stream/promises";
import type { ExecutionResources, ExecutionResult, ExecutionSpec, LocalProcessSpec, RunnerBackend } from "./types.js";

const MAX_CAPTURE_BYTES = 1024 * 1024;

interface Capture {
  chunks: Buffer[];
  bytes: number;
  truncated: boolean;
}

function newCapture(): Capture {
  return { chunks: [], bytes: 0, truncated: false };
}

function appendLimited(state: Capture, chunk: Buffer): void {
  if (state.truncated) return;
  const next = state.bytes + chunk.byteLength;
  if (next > MAX_CAPTURE_BYTES) {
    const keep = Math.max(0, MAX_CAPTURE_BYTES - state.bytes);
    if (keep > 0) state.chunks.push(chunk.subarray(0, keep));
    state.bytes = MAX_CAPTURE_BYTES;
    state.truncated = true;
    return;
  }
  state.chunks.push(chunk);
  state.bytes = next;
}

function captured(state: Capture, label: string): string {
  return Buffer.concat(state.chunks).toString("utf8") + (state.truncated ? `\n[${label} truncated]\n` : "");
}

const SPAWN_FAILED_EXIT = 127;

// A stage that cannot be spawned counts as exit 127; the spawn error goes to stderr.
function waitExit(child: ChildProcess, onSpawnError: (e: Error) => void): Promise<number> {
  return new Promise<number>((resolve) => {
    child.on("error", (e) => {
      onSpawnError(e);
      resolve(SPAWN_FAILED_EXIT);
    });
    child.on("close", (code: number | null, signal: NodeJS.Signals | null) => resolve(code ?? (signal ? 128 : 0)));
  });
}

export class LocalProcessRunner implements RunnerBackend {
  async execute(spec: ExecutionSpec, resources: ExecutionResources): Promise<ExecutionResult> {
    const pipeline = spec.kind === "pipeline" ? spec : { kind: "pipeline" as const, stages: [spec] };
    return this.executePipeline(pipeline.stages, resources, pipeline.stdoutPath);
  }

  private async executePipeline(
    stages: LocalProcessSpec[],
    resources: ExecutionResources,
    stdoutPath?: string
  ): Promise<ExecutionResult> {
    if (!stages.length) throw new Error("pipeline must have at least one stage");
    const startedAt = new Date().toISOString();

    const children: ChildProcess[] = [];
    const stderr = newCapture();
    const stdout = newCapture();
    const exits: Array<Promise<number>> = [];
    const killAll = (): void => {
      for (const c of children) c.kill("SIGKILL");
    };
    const onSpawnError = (e: Error): void => {
      appendLimited(stderr, Buffer.from(`${e.message}\n`, "utf8"));
      killAll();
    };

    for (const [i, stage] of stages.entries()) {
      const [command, ...args] = stage.argv;
      if (!command) throw new Error(`local_process argv must be non-empty (stage ${i})`);

      const prev = children[children.length - 1];
      const child = spawn(command, args, {
        cwd: stage.cwd,
        env: { ...process.env, ...stage.env },
        stdio: [prev ? "pipe" : "ignore", "pipe", "pipe"]
      });
      if (prev?.stdout && child.stdin) {
        prev.stdout.pipe(child.stdin);
        // A stage that exits early closes its stdin; the upstream write error is reported via exit codes.
        child.stdin.on("error", () => prev.stdout?.unpipe(child.stdin ?? undefined));
      }
      child.stderr?.on("data", (chunk: Buffer) => appendLimited(stderr, chunk));
      children.push(child);
      exits.push(waitExit(child, onSpawnError));
    }

    const last = children[children.length - 1];
    // Resolves with the write error, if any; a failed sink stops the pipeline.
    let sink: Promise<Error | null> = Promise.resolve(null);
    if (last?.stdout) {
      if (stdoutPath) {
        const out = createWriteStream(stdoutPath);
        last.stdout.pipe(out);
        sink = finished(out).then(
          () => null,
          (e: unknown) => {
            killAll();
            return e instanceof Error ? e : new Error(String(e));
          }
        );
      } else {
        last.stdout.on("data", (chunk: Buffer) => appendLimited(stdout, chunk));
      }
    }

    let timedOut = false;
    const timeoutMs = Math.max(0, Math.floor(resources.runtimeSeconds * 1000));
    const timeout =
      timeoutMs > 0
        ? setTimeout(() => {
            timedOut = true;
            killAll();
          }, timeoutMs)
        : null;

    const codes = await Promise.all(exits).finally(() => {
      if (timeout) clearTimeout(timeout);
    });
    const sinkError = await sink;
    if (sinkError) appendLimited(stderr, Buffer.from(`writing ${stdoutPath ?? "stdout"}: ${sinkError.message}\n`, "utf8"));

    const finishedAt = new Date().toISOString();
    const exitCode = codes.find((c) => c !== 0) ?? (sinkError ? 1 : 0);

    return {
      exitCode,
      stdout: captured(stdout, "stdout") + (timedOut ? "\n[timeout]\n" : ""),
      stderr: captured(stderr, "stderr") + (timedOut ? "\n[timeout]\n" : ""),
      startedAt,
      finishedAt
    };
  }
}
