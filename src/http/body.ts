import { Buffer } from "node:buffer";

/** Default cap on JSON-RPC request bodies (1 MiB). */
export const DEFAULT_MAX_BODY_BYTES = 1 << 20;

/** Error carrying the HTTP status the server should answer with. */
export class HttpBodyError extends Error {
  constructor(
    message: string,
    readonly status: number,
  ) {
    super(message);
    this.name = "HttpBodyError";
  }
}

/**
 * Reads a request body as UTF-8 text while enforcing an upper bound on the
 * number of bytes accepted. Parsing is left to the caller so malformed JSON
 * can be answered with a JSON-RPC parse error instead of an HTTP failure.
 */
export async function readBodyText(req: AsyncIterable<unknown>, maxBytes = DEFAULT_MAX_BODY_BYTES): Promise<string> {
  const buffers: Buffer[] = [];
  let totalBytes = 0;

  for await (const chunk of req) {
    const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    totalBytes += buffer.length;
    if (totalBytes > maxBytes) {
      throw new HttpBodyError("Payload Too Large", 413);
    }
    buffers.push(buffer);
  }

  return Buffer.concat(buffers).toString("utf8");
}
