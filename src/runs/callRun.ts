import { promises as fs } from "fs";
import type { Sha256Ref } from "../core/canonicalJson.js";
import type { RunId } from "../core/ids.js";
import type { JsonObject } from "../core/json.js";

export interface RunEvent {
  ts: string;
  kind: string;
  message: string;
  data: JsonObject | null;
}

/** Event log of one caller invocation; written beside the output as JSON lines. */
export class CallRun {
  readonly runId: RunId;
  private readonly logEvents: RunEvent[] = [];

  constructor(
    private readonly info: {
      runId: RunId;
      toolName: string;
      paramsHash: Sha256Ref;
      configHash: Sha256Ref;
    }
  ) {
    this.runId = info.runId;
  }

  start(): void {
    this.event("run.started", `tool=${this.info.toolName}`, {
      params_hash: this.info.paramsHash,
      config_hash: this.info.configHash
    });
  }

  event(kind: string, message: string, data: JsonObject | null): void {
    this.logEvents.push({ ts: new Date().toISOString(), kind, message, data });
  }

  events(): RunEvent[] {
    return [...this.logEvents];
  }

  logText(): string {
    return this.logEvents.map((e) => JSON.stringify(e)).join("\n") + (this.logEvents.length ? "\n" : "");
  }

  async writeLog(filePath: string): Promise<void> {
    await fs.writeFile(filePath, this.logText(), "utf8");
  }
}
