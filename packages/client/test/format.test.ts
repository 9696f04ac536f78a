import { describe, it, expect } from "vitest";
import { formatListing, formatOutcome, formatPhase, formatResult, formatSize } from "../src/format.js";
import { createOperationState, operationReducer } from "../src/operation.js";

describe("formatSize", () => {
  it("uses bytes below 1 KiB", () => {
    expect(formatSize(0)).toBe("0 B");
    expect(formatSize(1023)).toBe("1023 B");
  });

  it("scales to KiB, MiB and GiB with one decimal", () => {
    expect(formatSize(20480)).toBe("20.0 KiB");
    expect(formatSize(1536)).toBe("1.5 KiB");
    expect(formatSize(3 * 1024 * 1024)).toBe("3.0 MiB");
    expect(formatSize(4294967295)).toBe("4.0 GiB");
  });
});

describe("formatListing", () => {
  it("pads names to a common width", () => {
    expect(
      formatListing([
        { name: "demofile.txt", size: 120 },
        { name: "maman14.pdf", size: 20480 },
      ]),
    ).toEqual(["  demofile.txt  120 B", "  maman14.pdf   20.0 KiB"]);
  });

  it("says so when nothing is stored", () => {
    expect(formatListing([])).toEqual(["No files stored"]);
  });
});

describe("formatOutcome", () => {
  it("shows where a restored file went when it differs from its name", () => {
    expect(formatOutcome({ name: "a.txt", status: "succeeded", size: 5, savedTo: "tmp" })).toBe("✓ a.txt → tmp (5 B)");
    expect(formatOutcome({ name: "a.txt", status: "succeeded", size: 5, savedTo: "a.txt" })).toBe("✓ a.txt (5 B)");
  });

  it("shows the failure message", () => {
    expect(
      formatOutcome({ name: "a.txt", status: "failed", reason: "FILE_NOT_FOUND", message: '"a.txt" not found on the server' }),
    ).toBe('✗ a.txt: "a.txt" not found on the server');
  });

  it("marks skipped and pending files", () => {
    expect(formatOutcome({ name: "b", status: "skipped" })).toBe("- b: skipped");
    expect(formatOutcome({ name: "b", status: "pending" })).toBe("… b");
  });
});

describe("formatResult", () => {
  it("lists outcomes then the fatal error", () => {
    expect(
      formatResult({
        operation: "delete",
        ok: false,
        phase: "failed",
        outcomes: [
          { name: "a", status: "succeeded" },
          { name: "b", status: "failed", reason: "IO_ERROR", message: "Connection closed" },
        ],
        error: { code: "IO_ERROR", message: "Connection closed" },
      }),
    ).toEqual(["✓ a", "✗ b: Connection closed", "⚠ delete failed: [IO_ERROR] Connection closed"]);
  });

  it("renders a listing", () => {
    expect(
      formatResult({ operation: "list", ok: true, phase: "completed", outcomes: [], files: [] }),
    ).toEqual(["No files stored"]);
  });
});

describe("formatPhase", () => {
  it("names the file in flight", () => {
    let state = createOperationState("backup", ["notes.txt"]);
    state = operationReducer(state, { type: "CONNECTED" });
    expect(formatPhase(state)).toBe("backup: connected");
    state = operationReducer(state, { type: "BEGIN_FILE", index: 0 });
    state = operationReducer(state, { type: "REQUEST_SENT" });
    expect(formatPhase(state)).toBe("backup: awaiting_response [notes.txt]");
  });
});
