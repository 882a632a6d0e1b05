import { TextDecoder } from "node:util";

/** Subset of a web stream reader the helper consumes. */
export interface ChunkReader {
  read(): Promise<{ done: boolean; value?: Uint8Array }>;
}

export interface ParsedSseEvent {
  id: string | null;
  event: string | null;
  /** `data:` lines joined with a line feed, as `EventSource` delivers them. */
  data: string;
}

/**
 * Parses a Server-Sent Events payload into individual event records, splitting
 * on blank lines and decoding the `id`, `event` and `data` fields.
 */
export function parseSseStream(stream: string): ParsedSseEvent[] {
  const events: ParsedSseEvent[] = [];
  for (const record of stream.split("\n\n")) {
    if (!record.trim()) {
      continue;
    }
    let id: string | null = null;
    let event: string | null = null;
    const data: string[] = [];
    for (const line of record.split("\n")) {
      if (line.startsWith("id: ")) {
        id = line.slice("id: ".length);
      } else if (line.startsWith("event: ")) {
        event = line.slice("event: ".length);
      } else if (line.startsWith("data: ")) {
        data.push(line.slice("data: ".length));
      }
    }
    events.push({ id, event, data: data.join("\n") });
  }
  return events;
}

/**
 * Incremental reader over an SSE response body. {@link waitFor} keeps reading
 * until the parsed events satisfy the predicate.
 */
export class SseStreamReader {
  private text = "";
  private readonly decoder = new TextDecoder();

  constructor(private readonly reader: ChunkReader) {}

  get events(): ParsedSseEvent[] {
    // Only complete records (terminated by a blank line) are parsed.
    const end = this.text.lastIndexOf("\n\n");
    return end === -1 ? [] : parseSseStream(this.text.slice(0, end + 2));
  }

  async waitFor(predicate: (events: ParsedSseEvent[]) => boolean): Promise<ParsedSseEvent[]> {
    while (!predicate(this.events)) {
      const { done, value } = await this.reader.read();
      if (done || !value) {
        throw new Error(`stream ended before the expected events arrived: ${this.text}`);
      }
      this.text += this.decoder.decode(value, { stream: true });
    }
    return this.events;
  }
}
