import { createHash } from "crypto";
import { sha256Prefixed, stableJsonStringify, type Sha256Ref } from "../core/canonicalJson.js";
import { crockfordBase32, type RunId } from "../core/ids.js";
import type { JsonObject } from "../core/json.js";

export interface RunIdentity {
  runId: RunId;
  paramsHash: Sha256Ref;
}

/**
 * Deterministic id for one tool call: the same tool contract, caller config
 * and canonical request always map to the same run id, so repeated plans and
 * calls can be correlated with their logs.
 */
export function deriveRunId(input: {
  toolName: string;
  contractVersion: string;
  configHash: Sha256Ref;
  canonicalParams: JsonObject;
}): RunIdentity {
  const paramsHash = sha256Prefixed(stableJsonStringify(input.canonicalParams));
  const h = createHash("sha256");
  for (const part of [input.toolName, input.contractVersion, input.configHash, paramsHash]) {
    h.update(part).update("\n");
  }
  return { runId: `run_${crockfordBase32(h.digest().subarray(0, 16))}`, paramsHash };
}
