export interface JsonReply {
  status: number;
  header(name: string): string | null;
  body: unknown;
  text: string;
}

/** POSTs a JSON body (or a raw string) to the local listener and decodes the reply. */
export async function postJson(
  port: number,
  path: string,
  body: unknown,
  headers: Record<string, string> = {},
): Promise<JsonReply> {
  const response = await fetch(`http://127.0.0.1:${port}${path}`, {
    method: "POST",
    headers: { "content-type": "application/json", ...headers },
    body: typeof body === "string" ? body : JSON.stringify(body),
  });
  const text = await response.text();
  return {
    status: response.status,
    header: (name) => response.headers.get(name),
    body: text ? JSON.parse(text) : null,
    text,
  };
}

export async function getJson(port: number, path: string, headers: Record<string, string> = {}): Promise<JsonReply> {
  const response = await fetch(`http://127.0.0.1:${port}${path}`, { headers });
  const text = await response.text();
  return {
    status: response.status,
    header: (name) => response.headers.get(name),
    body: text ? JSON.parse(text) : null,
    text,
  };
}
