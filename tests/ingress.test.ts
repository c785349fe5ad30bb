import { describe, expect, it } from "vitest";
import { MAX_DOCUMENT_BYTES, parseDocument } from "../src/core/ingress.js";

function reason(raw: unknown) {
  const r = parseDocument(raw);
  if (r.ok) throw new Error("expected MalformedInput");
  expect(r.error.kind).toBe("MalformedInput");
  return r.error.message;
}

describe("parseDocument", () => {
  it("strips a BOM and normalizes line endings", () => {
    expect(parseDocument("\uFEFFa\r\nb\rc")).toEqual({ ok: true, value: { content: "a\nb\nc", bytes: 9 } });
  });

  it("decodes UTF-8 bytes", () => {
    expect(parseDocument(Buffer.from("héllo", "utf8"))).toEqual({
      ok: true,
      value: { content: "héllo", bytes: 6 },
    });
  });

  it("accepts a document of exactly the size limit", () => {
    expect(parseDocument("a".repeat(MAX_DOCUMENT_BYTES)).ok).toBe(true);
  });

  it("rejects oversized input as text or bytes", () => {
    expect(reason("a".repeat(MAX_DOCUMENT_BYTES + 1))).toBe("document exceeds 1048576 bytes");
    expect(reason(Buffer.alloc(MAX_DOCUMENT_BYTES + 1, 0x61))).toBe("document exceeds 1048576 bytes");
  });

  it("rejects binary, non-text, NUL and empty input", () => {
    expect(reason(Buffer.from([0xc3, 0x28]))).toBe("document is not valid UTF-8 text");
    expect(reason(null)).toBe("expected text, got null");
    expect(reason(42)).toBe("expected text, got number");
    expect(reason("a\u0000b")).toBe("document contains NUL characters");
    expect(reason("  \n\t ")).toBe("document is empty");
  });
});
