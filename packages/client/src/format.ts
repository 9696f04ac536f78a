/**
 * Plain-text rendering of operation states and results, shared by the CLI and the shell.
 */

import type { FileDescriptor } from "@stowage/protocol";
import type { FileOutcome, OperationResult, OperationState } from "./operation.js";

const UNITS = ["KiB", "MiB", "GiB"];

export function formatSize(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  let value = bytes / 1024;
  let unit = 0;
  while (value >= 1024 && unit < UNITS.length - 1) {
    value /= 1024;
    unit++;
  }
  return `${value.toFixed(1)} ${UNITS[unit]}`;
}

/** One line per file, names padded to a common width */
export function formatListing(files: readonly FileDescriptor[]): string[] {
  if (files.length === 0) return ["No files stored"];
  const width = Math.max(...files.map((f) => f.name.length));
  return files.map((f) => `  ${f.name.padEnd(width)}  ${formatSize(f.size)}`);
}

export function formatOutcome(outcome: FileOutcome): string {
  switch (outcome.status) {
    case "pending":
      return `… ${outcome.name}`;
    case "succeeded": {
      let line = `✓ ${outcome.name}`;
      if (outcome.savedTo !== undefined && outcome.savedTo !== outcome.name) line += ` → ${outcome.savedTo}`;
      if (outcome.size !== undefined) line += ` (${formatSize(outcome.size)})`;
      return line;
    }
    case "failed":
      return `✗ ${outcome.name}: ${outcome.message}`;
    case "skipped":
      return `- ${outcome.name}: skipped`;
  }
}

export function formatResult(result: OperationResult): string[] {
  const lines: string[] = [];
  if (result.files) lines.push(...formatListing(result.files));
  lines.push(...result.outcomes.map(formatOutcome));
  if (result.error) {
    lines.push(`⚠ ${result.operation} failed: [${result.error.code}] ${result.error.message}`);
  }
  return lines;
}

/** Short progress line, e.g. `backup: awaiting_response [notes.txt]` */
export function formatPhase(state: OperationState): string {
  const current = state.current === null ? undefined : state.outcomes[state.current];
  return current ? `${state.operation}: ${state.phase} [${current.name}]` : `${state.operation}: ${state.phase}`;
}
