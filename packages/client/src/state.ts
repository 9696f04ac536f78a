/**
 * Shell State — Types and Reducer
 *
 * All shell state flows through a single reducer. The engine's onUpdate callback and
 * the prompt dispatch actions to update it.
 */

import type { Endpoint } from "@stowage/protocol";
import { formatResult } from "./format.js";
import type { OperationResult, OperationState } from "./operation.js";

// =============================================================================
// History
// =============================================================================

export interface HistoryEntry {
  id: string;
  /** `command` echoes what the user ran, `result` is an operation report, `notice` is client output */
  kind: "command" | "result" | "notice";
  lines: string[];
  /** Set on results */
  ok?: boolean;
}

// =============================================================================
// App State
// =============================================================================

export interface ServerInfo {
  endpoint: Endpoint;
  userId: number;
  protocolVersion: number;
}

export interface AppState {
  serverInfo: ServerInfo;

  /** Finished entries (rendered in <Static>) */
  history: HistoryEntry[];

  /** Latest state of the running operation */
  active: OperationState | null;

  /** Whether an operation is running; the prompt accepts no operation meanwhile */
  isBusy: boolean;

  succeeded: number;
  failed: number;

  /** Error message to display (transient) */
  errorMessage: string | null;
}

export function createInitialState(serverInfo: ServerInfo): AppState {
  return {
    serverInfo,
    history: [],
    active: null,
    isBusy: false,
    succeeded: 0,
    failed: 0,
    errorMessage: null,
  };
}

// =============================================================================
// Actions
// =============================================================================

export type AppAction =
  | { type: "OPERATION_START"; description: string }
  | { type: "OPERATION_UPDATE"; state: OperationState }
  | { type: "OPERATION_DONE"; result: OperationResult }
  | { type: "OPERATION_CRASHED"; message: string }
  | { type: "NOTICE"; lines: string[] }
  | { type: "CLEAR_HISTORY" }
  | { type: "SET_ERROR"; message: string }
  | { type: "CLEAR_ERROR" };

// =============================================================================
// Reducer
// =============================================================================

let entryCounter = 0;

export function appReducer(state: AppState, action: AppAction): AppState {
  switch (action.type) {
    case "OPERATION_START":
      if (state.isBusy) return state;
      return {
        ...state,
        isBusy: true,
        active: null,
        errorMessage: null,
        history: [...state.history, entry("command", [action.description])],
      };

    case "OPERATION_UPDATE":
      if (!state.isBusy) return state;
      return { ...state, active: action.state };

    case "OPERATION_DONE": {
      if (!state.isBusy) return state;
      const { result } = action;
      return {
        ...state,
        isBusy: false,
        active: null,
        succeeded: state.succeeded + (result.ok ? 1 : 0),
        failed: state.failed + (result.ok ? 0 : 1),
        history: [...state.history, { ...entry("result", formatResult(result)), ok: result.ok }],
      };
    }

    case "OPERATION_CRASHED":
      if (!state.isBusy) return state;
      return {
        ...state,
        isBusy: false,
        active: null,
        failed: state.failed + 1,
        errorMessage: action.message,
      };

    case "NOTICE":
      return { ...state, history: [...state.history, entry("notice", action.lines)] };

    case "CLEAR_HISTORY":
      return { ...state, history: [] };

    case "SET_ERROR":
      return { ...state, errorMessage: action.message };

    case "CLEAR_ERROR":
      return { ...state, errorMessage: null };

    default:
      return state;
  }
}

// =============================================================================
// Helpers
// =============================================================================

/** One-line summary for the `status` command */
export function formatStatus(state: AppState): string {
  const { endpoint, userId, protocolVersion } = state.serverInfo;
  return `Server: ${formatEndpoint(endpoint)} | User: ${userId} | Protocol: v${protocolVersion} | Operations: ${state.succeeded} ok, ${state.failed} failed`;
}

export function formatEndpoint(endpoint: Endpoint): string {
  return endpoint.host.includes(":") ? `[${endpoint.host}]:${endpoint.port}` : `${endpoint.host}:${endpoint.port}`;
}

function entry(kind: HistoryEntry["kind"], lines: string[]): HistoryEntry {
  return { id: `entry-${++entryCounter}`, kind, lines };
}
