/**
 * Shell input handling, kept out of the component so it can be driven without a terminal.
 */

import { describeRequest, getCommands, routeInput, type OperationRequest } from "@stowage/commands";
import type { OperationResult } from "./operation.js";
import { formatStatus, type AppAction, type AppState } from "./state.js";

export interface ShellDeps {
  run: (request: OperationRequest) => Promise<OperationResult>;
  dispatch: (action: AppAction) => void;
  exit: () => void;
  /** Latest rendered state, for `status` */
  getState: () => AppState;
  /** Used by `backup` without arguments */
  backupFiles: readonly string[];
}

/**
 * Build the prompt's submit handler. The busy flag lives here rather than in AppState so
 * that two submits before the next render cannot start two operations.
 */
export function createSubmitHandler(deps: ShellDeps): (text: string) => void {
  const { run, dispatch, exit, getState, backupFiles } = deps;
  let running = false;

  return (text) => {
    const route = routeInput(text, { backupFiles });

    switch (route.kind) {
      case "empty":
        return;

      case "invalid":
        dispatch({ type: "SET_ERROR", message: route.message });
        return;

      case "client":
        dispatch({ type: "CLEAR_ERROR" });
        switch (route.command) {
          case "quit":
            exit();
            break;
          case "help":
            dispatch({ type: "NOTICE", lines: helpLines() });
            break;
          case "status":
            dispatch({ type: "NOTICE", lines: [formatStatus(getState())] });
            break;
          case "clear":
            dispatch({ type: "CLEAR_HISTORY" });
            break;
        }
        return;

      case "operation": {
        if (running) {
          dispatch({ type: "SET_ERROR", message: "An operation is already running" });
          return;
        }
        running = true;
        dispatch({ type: "OPERATION_START", description: describeRequest(route.request) });
        run(route.request).then(
          (result) => {
            running = false;
            dispatch({ type: "OPERATION_DONE", result });
          },
          (err: unknown) => {
            running = false;
            dispatch({
              type: "OPERATION_CRASHED",
              message: err instanceof Error ? err.message : String(err),
            });
          },
        );
        return;
      }
    }
  };
}

export function helpLines(): string[] {
  const commands = getCommands();
  const width = Math.max(...commands.map((c) => c.usage.length));
  return commands.map((c) => `${c.usage.padEnd(width)}  ${c.description}`);
}
