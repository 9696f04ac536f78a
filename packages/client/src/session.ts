/**
 * Scripted sessions: run a list of requests one after another, one connection each.
 * A failed operation does not stop the script.
 */

import type { OperationRequest } from "@stowage/commands";
import type { BackupClient } from "./engine.js";
import type { OperationResult } from "./operation.js";

export type ScriptStepListener = (request: OperationRequest, result: OperationResult) => void;

export async function runScript(
  client: BackupClient,
  requests: readonly OperationRequest[],
  onStep?: ScriptStepListener,
): Promise<OperationResult[]> {
  const results: OperationResult[] = [];
  for (const request of requests) {
    const result = await client.run(request);
    results.push(result);
    onStep?.(request, result);
  }
  return results;
}
