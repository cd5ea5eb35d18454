import { CallerError } from "../core/errors.js";
import type { CallRun } from "../runs/callRun.js";
import type { ExecutionResources, ExecutionResult, ExecutionSpec, RunnerBackend } from "./backends/types.js";

const STDERR_TAIL_CHARS = 4000;

export function describeSpec(spec: ExecutionSpec): string {
  const stages = spec.kind === "pipeline" ? spec.stages : [spec];
  const text = stages.map((s) => s.argv.join(" ")).join(" | ");
  return spec.kind === "pipeline" && spec.stdoutPath ? `${text} > ${spec.stdoutPath}` : text;
}

function stderrTail(stderr: string): string {
  return stderr.length > STDERR_TAIL_CHARS ? stderr.slice(stderr.length - STDERR_TAIL_CHARS) : stderr;
}

/** Executes `spec` and fails on a non-zero exit; nothing is retried. */
export async function runChecked(
  runner: RunnerBackend,
  spec: ExecutionSpec,
  resources: ExecutionResources,
  step: string,
  run?: CallRun
): Promise<ExecutionResult> {
  const command = describeSpec(spec);
  run?.event("exec.start", step, { command });

  const result = await runner.execute(spec, resources);

  run?.event("exec.result", `${step} exit=${result.exitCode}`, {
    started_at: result.startedAt,
    finished_at: result.finishedAt,
    stderr: stderrTail(result.stderr)
  });

  if (result.exitCode !== 0) {
    throw new CallerError("PROCESS_FAILED", `${step} failed (exit ${result.exitCode}): ${command}`, {
      exitCode: result.exitCode,
      stderr: stderrTail(result.stderr)
    });
  }
  return result;
}
