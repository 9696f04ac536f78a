/**
 * Operation reducer tests: phase transitions, per-file outcomes, results.
 */

import { describe, it, expect } from "vitest";
import {
  createOperationState,
  operationReducer,
  toResult,
  type OperationAction,
  type OperationState,
} from "../src/operation.js";

// =============================================================================
// Helpers
// =============================================================================

function reduce(state: OperationState, ...actions: OperationAction[]): OperationState {
  return actions.reduce((s, a) => operationReducer(s, a), state);
}

const connected = reduce(createOperationState("backup", ["a", "b", "c"]), { type: "CONNECTED" });

// =============================================================================
// Transitions
// =============================================================================

describe("phase transitions", () => {
  it("walks one file through a full exchange", () => {
    const state = reduce(
      connected,
      { type: "BEGIN_FILE", index: 0 },
      { type: "REQUEST_SENT" },
      { type: "RESPONSE_RECEIVED" },
    );
    expect(state.phase).toBe("processing");
    expect(state.current).toBe(0);

    const settled = operationReducer(state, { type: "FILE_SUCCEEDED", size: 3 });
    expect(settled.phase).toBe("connected");
    expect(settled.current).toBeNull();
    expect(settled.outcomes[0]).toEqual({ name: "a", status: "succeeded", size: 3 });
  });

  it("ignores actions that are invalid in the current phase", () => {
    const idle = createOperationState("list");
    expect(operationReducer(idle, { type: "REQUEST_SENT" })).toBe(idle);
    expect(operationReducer(connected, { type: "RESPONSE_RECEIVED" })).toBe(connected);
    expect(operationReducer(connected, { type: "FILE_SUCCEEDED" })).toBe(connected);
  });

  it("does not begin a file while another is in flight", () => {
    const busy = operationReducer(connected, { type: "BEGIN_FILE", index: 0 });
    expect(operationReducer(busy, { type: "BEGIN_FILE", index: 1 })).toBe(busy);
  });

  it("does not begin a file that already settled", () => {
    const done = reduce(
      connected,
      { type: "BEGIN_FILE", index: 0 },
      { type: "FILE_FAILED", reason: "FILE_ACCESS", message: "Cannot read a: denied" },
    );
    expect(operationReducer(done, { type: "BEGIN_FILE", index: 0 })).toBe(done);
  });

  it("lets a file fail before anything was sent", () => {
    const state = reduce(
      connected,
      { type: "BEGIN_FILE", index: 1 },
      { type: "FILE_FAILED", reason: "FILE_ACCESS", message: "Cannot read b: denied" },
    );
    expect(state.phase).toBe("connected");
    expect(state.outcomes[1]).toEqual({
      name: "b",
      status: "failed",
      reason: "FILE_ACCESS",
      message: "Cannot read b: denied",
    });
  });

  it("cannot finish with a file in flight", () => {
    const busy = operationReducer(connected, { type: "BEGIN_FILE", index: 0 });
    expect(operationReducer(busy, { type: "FINISHED" })).toBe(busy);
  });

  it("accepts nothing once terminal", () => {
    const done = operationReducer(connected, { type: "FINISHED" });
    expect(done.phase).toBe("completed");
    expect(operationReducer(done, { type: "FATAL", reason: "IO_ERROR", message: "late" })).toBe(done);
  });
});

describe("FATAL", () => {
  it("fails the current file and skips the pending ones", () => {
    const state = reduce(
      connected,
      { type: "BEGIN_FILE", index: 0 },
      { type: "REQUEST_SENT" },
      { type: "RESPONSE_RECEIVED" },
      { type: "FILE_SUCCEEDED", size: 1 },
      { type: "BEGIN_FILE", index: 1 },
      { type: "REQUEST_SENT" },
      { type: "FATAL", reason: "IO_ERROR", message: "Peer closed the connection after 0 of 5 bytes" },
    );

    expect(state.phase).toBe("failed");
    expect(state.current).toBeNull();
    expect(state.error).toEqual({ code: "IO_ERROR", message: "Peer closed the connection after 0 of 5 bytes" });
    expect(state.outcomes.map((o) => o.status)).toEqual(["succeeded", "failed", "skipped"]);
  });

  it("skips every file when raised before the first one began", () => {
    const state = operationReducer(createOperationState("delete", ["x", "y"]), {
      type: "FATAL",
      reason: "CONNECTION_FAILED",
      message: "Cannot connect to 127.0.0.1:1: refused",
    });
    expect(state.outcomes).toEqual([
      { name: "x", status: "skipped" },
      { name: "y", status: "skipped" },
    ]);
  });
});

describe("LISTED", () => {
  it("stores the listing for list operations only", () => {
    const listState = reduce(
      createOperationState("list"),
      { type: "CONNECTED" },
      { type: "REQUEST_SENT" },
      { type: "RESPONSE_RECEIVED" },
      { type: "LISTED", files: [{ name: "a", size: 1 }] },
    );
    expect(listState.phase).toBe("connected");
    expect(listState.listing).toEqual([{ name: "a", size: 1 }]);

    const backup = reduce(connected, { type: "BEGIN_FILE", index: 0 }, { type: "REQUEST_SENT" }, { type: "RESPONSE_RECEIVED" });
    expect(operationReducer(backup, { type: "LISTED", files: [] })).toBe(backup);
  });
});

// =============================================================================
// Results
// =============================================================================

describe("toResult", () => {
  it("is ok only when completed with every file succeeded", () => {
    const settled = reduce(
      createOperationState("delete", ["a"]),
      { type: "CONNECTED" },
      { type: "BEGIN_FILE", index: 0 },
      { type: "REQUEST_SENT" },
      { type: "RESPONSE_RECEIVED" },
      { type: "FILE_SUCCEEDED" },
      { type: "FINISHED" },
    );
    expect(toResult(settled)).toEqual({
      operation: "delete",
      ok: true,
      phase: "completed",
      outcomes: [{ name: "a", status: "succeeded" }],
    });
  });

  it("is not ok when a file failed", () => {
    const state = reduce(
      createOperationState("delete", ["a"]),
      { type: "CONNECTED" },
      { type: "BEGIN_FILE", index: 0 },
      { type: "REQUEST_SENT" },
      { type: "RESPONSE_RECEIVED" },
      { type: "FILE_FAILED", reason: "FILE_NOT_FOUND", message: '"a" not found on the server' },
      { type: "FINISHED" },
    );
    const result = toResult(state);
    expect(result.phase).toBe("completed");
    expect(result.ok).toBe(false);
  });

  it("throws for an operation still running", () => {
    expect(() => toResult(connected)).toThrow("Operation backup has not finished (phase: connected)");
  });
});
