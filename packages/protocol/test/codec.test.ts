import { describe, it, expect } from "vitest";
import {
  PROTOCOL_VERSION,
  RequestCode,
  StatusCode,
  MalformedMessageError,
  VersionMismatchError,
  encodeRequest,
  encodeRequestHead,
  decodeRequestHeader,
  decodeRequest,
  requestFrameLength,
  decodeResponseHeader,
  decodeSize,
  decodePayload,
  encodeListing,
  encodeResponse,
  hasPayload,
  answers,
} from "../src/index.js";

const USER = 0x01020304;

// =============================================================================
// Request encoding
// =============================================================================

describe("encodeRequest", () => {
  it("lays out a LIST request as an 8-byte little-endian header", () => {
    const bytes = encodeRequest({ code: RequestCode.LIST, version: 1, userId: USER });
    expect([...bytes]).toEqual([0x04, 0x03, 0x02, 0x01, 1, 202, 0, 0]);
  });

  it("appends the name after the header", () => {
    const bytes = encodeRequest({ code: RequestCode.DELETE, version: 1, userId: 7, name: "a.txt" });
    expect(bytes.length).toBe(8 + 5);
    expect(bytes.readUInt16LE(6)).toBe(5);
    expect(bytes.readUInt8(5)).toBe(201);
    expect(bytes.toString("utf8", 8)).toBe("a.txt");
  });

  it("writes size and content after the name for BACKUP", () => {
    const content = Buffer.from("hello");
    const bytes = encodeRequest({
      code: RequestCode.BACKUP,
      version: 1,
      userId: 7,
      name: "h",
      size: content.length,
      content,
    });
    expect(bytes.length).toBe(8 + 1 + 4 + 5);
    expect(bytes.readUInt32LE(9)).toBe(5);
    expect(bytes.toString("utf8", 13)).toBe("hello");
  });

  it("rejects BACKUP content that disagrees with the declared size", () => {
    expect(() =>
      encodeRequest({
        code: RequestCode.BACKUP,
        version: 1,
        userId: 7,
        name: "h",
        size: 10,
        content: Buffer.from("short"),
      }),
    ).toThrow(RangeError);
  });

  it("rejects a user id wider than 32 bits", () => {
    expect(() => encodeRequest({ code: RequestCode.LIST, version: 1, userId: 2 ** 32 })).toThrow(
      "userId out of range: 4294967296",
    );
  });

  it("head omits content but keeps the size field", () => {
    const head = encodeRequestHead({ code: RequestCode.BACKUP, version: 1, userId: 7, name: "big", size: 1_000_000 });
    expect(head.length).toBe(8 + 3 + 4);
    expect(head.readUInt32LE(11)).toBe(1_000_000);
  });
});

// =============================================================================
// Request decoding
// =============================================================================

describe("decodeRequestHeader", () => {
  it("recovers code, version, user id and declared name length", () => {
    const bytes = encodeRequest({ code: RequestCode.RESTORE, version: 3, userId: USER, name: "notes.md" });
    expect(decodeRequestHeader(bytes)).toEqual({
      userId: USER,
      version: 3,
      code: RequestCode.RESTORE,
      nameLength: 8,
    });
  });

  it("fails on a short header", () => {
    expect(() => decodeRequestHeader(new Uint8Array(7))).toThrow(MalformedMessageError);
  });

  it("fails on an unknown request code", () => {
    const bytes = Buffer.from([0, 0, 0, 0, 1, 99, 0, 0]);
    expect(() => decodeRequestHeader(bytes)).toThrow("Unknown request code 99");
  });
});

describe("decodeRequest", () => {
  it("decodes a complete BACKUP frame", () => {
    const content = Buffer.from([1, 2, 3]);
    const bytes = encodeRequest({ code: RequestCode.BACKUP, version: 1, userId: 9, name: "x.bin", size: 3, content });
    const decoded = decodeRequest(bytes);
    expect(decoded).toEqual({ code: RequestCode.BACKUP, version: 1, userId: 9, name: "x.bin", size: 3, content });
  });

  it("decodes a LIST frame", () => {
    const bytes = encodeRequest({ code: RequestCode.LIST, version: 1, userId: 9 });
    expect(decodeRequest(bytes)).toEqual({ code: RequestCode.LIST, version: 1, userId: 9 });
  });

  it("rejects trailing bytes", () => {
    const bytes = Buffer.concat([encodeRequest({ code: RequestCode.LIST, version: 1, userId: 9 }), Buffer.from([0])]);
    expect(() => decodeRequest(bytes)).toThrow("Request frame has 1 trailing bytes");
  });

  it("rejects a truncated BACKUP frame", () => {
    const bytes = encodeRequest({ code: RequestCode.BACKUP, version: 1, userId: 9, name: "x", size: 4, content: Buffer.from("abcd") });
    expect(() => decodeRequest(bytes.subarray(0, bytes.length - 1))).toThrow(MalformedMessageError);
  });
});

describe("requestFrameLength", () => {
  it("is null until the size field of a BACKUP frame has arrived", () => {
    const bytes = encodeRequest({ code: RequestCode.BACKUP, version: 1, userId: 9, name: "ab", size: 2, content: Buffer.from("zz") });
    expect(requestFrameLength(bytes.subarray(0, 5))).toBeNull();
    expect(requestFrameLength(bytes.subarray(0, 11))).toBeNull();
    expect(requestFrameLength(bytes.subarray(0, 14))).toBe(16);
  });

  it("is header plus name for other requests", () => {
    const bytes = encodeRequest({ code: RequestCode.DELETE, version: 1, userId: 9, name: "abc" });
    expect(requestFrameLength(bytes.subarray(0, 8))).toBe(11);
  });
});

// =============================================================================
// Response decoding
// =============================================================================

describe("decodeResponseHeader", () => {
  it("reads version, status and name length", () => {
    const bytes = encodeResponse({ version: 1, status: StatusCode.OK, name: "a.txt" });
    expect(decodeResponseHeader(bytes)).toEqual({ version: 1, status: StatusCode.OK, nameLength: 5 });
  });

  it("fails on a short header", () => {
    expect(() => decodeResponseHeader(new Uint8Array([1, 212, 0]))).toThrow(
      "Response header needs 5 bytes, got 3",
    );
  });

  it("fails on an unknown status", () => {
    const bytes = Buffer.from([1, 0, 0, 0, 0]);
    bytes.writeUInt16LE(999, 1);
    expect(() => decodeResponseHeader(bytes)).toThrow("Unknown status code 999");
  });

  it("checks the version before the status", () => {
    const bytes = Buffer.from([2, 0, 0, 0, 0]);
    bytes.writeUInt16LE(999, 1);
    let caught: unknown;
    try {
      decodeResponseHeader(bytes, { expectedVersion: PROTOCOL_VERSION });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(VersionMismatchError);
    expect(caught).toMatchObject({ code: "VERSION_MISMATCH", clientVersion: 1, serverVersion: 2 });
  });
});

describe("decodeSize", () => {
  it("reads a little-endian u32", () => {
    expect(decodeSize(Buffer.from([0x00, 0x50, 0x00, 0x00]))).toBe(20480);
  });
});

describe("decodePayload", () => {
  it("decodes a listing in order", () => {
    const files = [
      { name: "demofile.txt", size: 120 },
      { name: "maman14.pdf", size: 20480 },
    ];
    const bytes = encodeListing(files);
    expect(decodePayload(bytes, bytes.length, RequestCode.LIST)).toEqual(files);
  });

  it("decodes an empty listing", () => {
    expect(decodePayload(new Uint8Array(0), 0, RequestCode.LIST)).toEqual([]);
  });

  it("fails on a truncated listing entry", () => {
    const bytes = encodeListing([{ name: "abc", size: 1 }]).subarray(0, 7);
    expect(() => decodePayload(bytes, 7, RequestCode.LIST)).toThrow(
      "Listing entry at offset 0 is truncated",
    );
  });

  it("returns restored bytes as-is", () => {
    const bytes = Buffer.from("payload");
    expect(decodePayload(bytes, 7, RequestCode.RESTORE)).toBe(bytes);
  });

  it("fails when fewer bytes than declared are given", () => {
    expect(() => decodePayload(Buffer.from("pay"), 7, RequestCode.RESTORE)).toThrow(
      "Payload declares 7 bytes, got 3",
    );
  });

  it("rejects a payload on a DELETE acknowledgement", () => {
    expect(() => decodePayload(Buffer.from("x"), 1, RequestCode.DELETE)).toThrow(
      "DELETE acknowledgement carries no payload, got 1 bytes",
    );
  });
});

describe("encodeResponse", () => {
  it("writes size and payload only for payload-carrying statuses", () => {
    const restored = encodeResponse({ version: 1, status: StatusCode.FILE_RESTORED, name: "f", content: Buffer.from("abc") });
    expect(restored.length).toBe(5 + 1 + 4 + 3);
    expect(restored.readUInt32LE(6)).toBe(3);

    const missing = encodeResponse({ version: 1, status: StatusCode.FILE_NOT_FOUND, name: "f" });
    expect(missing.length).toBe(6);
    expect(missing.readUInt16LE(1)).toBe(1001);
  });
});

// =============================================================================
// Status semantics
// =============================================================================

describe("status semantics", () => {
  it("hasPayload is true only for FILE_RESTORED and FILE_LIST", () => {
    const carrying = Object.values(StatusCode).filter((status) => hasPayload(status));
    expect(carrying).toEqual([StatusCode.FILE_RESTORED, StatusCode.FILE_LIST]);
  });

  it("ties success statuses to the request they answer", () => {
    expect(answers(RequestCode.LIST, StatusCode.FILE_LIST)).toBe(true);
    expect(answers(RequestCode.LIST, StatusCode.NO_FILES)).toBe(true);
    expect(answers(RequestCode.BACKUP, StatusCode.OK)).toBe(true);
    expect(answers(RequestCode.DELETE, StatusCode.OK)).toBe(true);
    expect(answers(RequestCode.RESTORE, StatusCode.FILE_RESTORED)).toBe(true);
    expect(answers(RequestCode.RESTORE, StatusCode.OK)).toBe(false);
    expect(answers(RequestCode.BACKUP, StatusCode.FILE_LIST)).toBe(false);
  });

  it("lets failure statuses answer any request", () => {
    for (const code of Object.values(RequestCode)) {
      expect(answers(code, StatusCode.FILE_NOT_FOUND)).toBe(true);
      expect(answers(code, StatusCode.SERVER_ERROR)).toBe(true);
    }
  });
});
