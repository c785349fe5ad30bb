import { err, ok, PipelineError, type Result } from "./errors.js";

export const MAX_DOCUMENT_BYTES = 1024 * 1024;

export type IngressDocument = {
  content: string;
  bytes: number;
};

function malformed(message: string) {
  return err(new PipelineError("MalformedInput", message));
}

const utf8 = new TextDecoder("utf-8", { fatal: true });

/**
 * Accepts text or UTF-8 bytes. Anything empty, binary or oversized is
 * `MalformedInput`; this is the only failure a pipeline run reports.
 */
export function parseDocument(raw: unknown): Result<IngressDocument> {
  let text: string;
  if (typeof raw === "string") {
    text = raw;
  } else if (raw instanceof Uint8Array) {
    if (raw.byteLength > MAX_DOCUMENT_BYTES) {
      return malformed(`document exceeds ${MAX_DOCUMENT_BYTES} bytes`);
    }
    try {
      text = utf8.decode(raw);
    } catch (e) {
      return err(new PipelineError("MalformedInput", "document is not valid UTF-8 text", e));
    }
  } else {
    return malformed(`expected text, got ${raw === null ? "null" : typeof raw}`);
  }

  const bytes = Buffer.byteLength(text, "utf8");
  if (bytes > MAX_DOCUMENT_BYTES) {
    return malformed(`document exceeds ${MAX_DOCUMENT_BYTES} bytes`);
  }
  if (text.includes("\u0000")) {
    return malformed("document contains NUL characters");
  }
  const content = text.replace(/^\uFEFF/, "").replace(/\r\n?/g, "\n");
  if (!content.trim()) {
    return malformed("document is empty");
  }
  return ok({ content, bytes });
}
