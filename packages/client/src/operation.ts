/**
 * Operation State Machine — Types and Reducer
 *
 * One logical operation (list, backup, restore, delete) moves through
 *
 *   idle → connected → awaiting_response → processing → connected … → completed | failed
 *
 * The protocol engine dispatches actions as the exchange progresses; everything it reports
 * (per-file outcomes, listing, fatal error) is derived from this state.
 */

import type { ErrorCode, FileDescriptor } from "@stowage/protocol";
import type { OperationKind } from "@stowage/commands";

// =============================================================================
// State
// =============================================================================

export type OperationPhase =
  | "idle"
  | "connected"
  | "awaiting_response"
  | "processing"
  | "completed"
  | "failed";

/** Why a file (or the whole operation) failed: a server status or a client-side error code */
export type FailureReason = "FILE_NOT_FOUND" | "SERVER_ERROR" | ErrorCode;

export interface PendingOutcome {
  name: string;
  status: "pending";
}

export interface SucceededOutcome {
  name: string;
  status: "succeeded";
  /** Bytes transferred */
  size?: number;
  /** Local path a restored file was written to */
  savedTo?: string;
}

export interface FailedOutcome {
  name: string;
  status: "failed";
  reason: FailureReason;
  message: string;
}

/** Not attempted: a fatal error ended the operation first */
export interface SkippedOutcome {
  name: string;
  status: "skipped";
}

export type FileOutcome = PendingOutcome | SucceededOutcome | FailedOutcome | SkippedOutcome;

export interface OperationError {
  code: FailureReason;
  message: string;
}

export interface OperationState {
  operation: OperationKind;
  phase: OperationPhase;
  /** One entry per requested file, in request order (empty for list) */
  outcomes: FileOutcome[];
  /** Index of the file being exchanged, null between files */
  current: number | null;
  /** Files reported by a successful list */
  listing: FileDescriptor[] | null;
  error: OperationError | null;
}

export function createOperationState(operation: OperationKind, names: readonly string[] = []): OperationState {
  return {
    operation,
    phase: "idle",
    outcomes: names.map((name): FileOutcome => ({ name, status: "pending" })),
    current: null,
    listing: null,
    error: null,
  };
}

// =============================================================================
// Actions
// =============================================================================

export type OperationAction =
  | { type: "CONNECTED" }
  | { type: "BEGIN_FILE"; index: number }
  | { type: "REQUEST_SENT" }
  | { type: "RESPONSE_RECEIVED" }
  | { type: "FILE_SUCCEEDED"; size?: number; savedTo?: string }
  | { type: "FILE_FAILED"; reason: FailureReason; message: string }
  | { type: "LISTED"; files: FileDescriptor[] }
  | { type: "FATAL"; reason: FailureReason; message: string }
  | { type: "FINISHED" };

// =============================================================================
// Reducer
// =============================================================================

/**
 * Apply one action. Actions that are not valid in the current phase return the state
 * unchanged; completed and failed are terminal.
 */
export function operationReducer(state: OperationState, action: OperationAction): OperationState {
  if (isTerminal(state.phase)) return state;

  switch (action.type) {
    case "CONNECTED":
      return state.phase === "idle" ? { ...state, phase: "connected" } : state;

    case "BEGIN_FILE": {
      if (state.phase !== "connected" || state.current !== null) return state;
      if (state.outcomes[action.index]?.status !== "pending") return state;
      return { ...state, current: action.index };
    }

    case "REQUEST_SENT":
      return state.phase === "connected" ? { ...state, phase: "awaiting_response" } : state;

    case "RESPONSE_RECEIVED":
      return state.phase === "awaiting_response" ? { ...state, phase: "processing" } : state;

    case "FILE_SUCCEEDED": {
      if (state.phase !== "processing" || state.current === null) return state;
      const { name } = state.outcomes[state.current];
      const outcome: SucceededOutcome = { name, status: "succeeded" };
      if (action.size !== undefined) outcome.size = action.size;
      if (action.savedTo !== undefined) outcome.savedTo = action.savedTo;
      return settle(state, state.current, outcome);
    }

    case "FILE_FAILED": {
      if (state.current === null) return state;
      if (state.phase !== "processing" && state.phase !== "connected") return state;
      const { name } = state.outcomes[state.current];
      return settle(state, state.current, {
        name,
        status: "failed",
        reason: action.reason,
        message: action.message,
      });
    }

    case "LISTED":
      if (state.phase !== "processing" || state.operation !== "list") return state;
      return { ...state, phase: "connected", listing: action.files };

    case "FATAL":
      return {
        ...state,
        phase: "failed",
        current: null,
        error: { code: action.reason, message: action.message },
        outcomes: state.outcomes.map((outcome, i): FileOutcome => {
          if (i === state.current) {
            return { name: outcome.name, status: "failed", reason: action.reason, message: action.message };
          }
          return outcome.status === "pending" ? { name: outcome.name, status: "skipped" } : outcome;
        }),
      };

    case "FINISHED":
      if (state.phase !== "connected" || state.current !== null) return state;
      return { ...state, phase: "completed" };

    default:
      return state;
  }
}

// =============================================================================
// Results
// =============================================================================

export interface OperationResult {
  operation: OperationKind;
  /** True only when the operation completed and every file succeeded */
  ok: boolean;
  phase: "completed" | "failed";
  outcomes: FileOutcome[];
  /** Present for a completed list */
  files?: FileDescriptor[];
  /** Present when a fatal error ended the operation */
  error?: OperationError;
}

export function isTerminal(phase: OperationPhase): phase is "completed" | "failed" {
  return phase === "completed" || phase === "failed";
}

export function toResult(state: OperationState): OperationResult {
  const { phase } = state;
  if (!isTerminal(phase)) {
    throw new Error(`Operation ${state.operation} has not finished (phase: ${phase})`);
  }

  const result: OperationResult = {
    operation: state.operation,
    ok: phase === "completed" && state.outcomes.every((o) => o.status === "succeeded"),
    phase,
    outcomes: state.outcomes,
  };
  if (state.listing && phase === "completed") result.files = state.listing;
  if (state.error) result.error = state.error;
  return result;
}

// =============================================================================
// Helpers
// =============================================================================

function settle(state: OperationState, index: number, outcome: FileOutcome): OperationState {
  const outcomes = [...state.outcomes];
  outcomes[index] = outcome;
  return { ...state, phase: "connected", current: null, outcomes };
}
