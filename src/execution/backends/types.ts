export interface ExecutionResources {
  runtimeSeconds: number;
}

export interface ExecutionResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  startedAt: string;
  finishedAt: string;
}

export interface LocalProcessSpec {
  kind: "local_process";
  argv: string[];
  cwd?: string;
  env?: Record<string, string>;
}

/**
 * Stages run connected stdout -> stdin. The exit code is the first non-zero
 * stage exit code; stderr of every stage is concatenated.
 */
export interface PipelineSpec {
  kind: "pipeline";
  stages: LocalProcessSpec[];
  // When set, stdout of the last stage is written here instead of captured.
  stdoutPath?: string;
}

export type ExecutionSpec = LocalProcessSpec | PipelineSpec;

export interface RunnerBackend {
  execute(spec: ExecutionSpec, resources: ExecutionResources): Promise<ExecutionResult>;
}
