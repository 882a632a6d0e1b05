import { describe, it } from "mocha";
import { expect } from "chai";

import { AuthGate, checkToken, resolveHttpAuthToken } from "../../src/http/auth.js";

describe("http auth token", () => {
  it("compares tokens in constant time", () => {
    expect(checkToken("test-secret", "test-secret")).to.equal(true);
    expect(checkToken(undefined, "test-secret")).to.equal(false);
    expect(checkToken("test", "test-secret")).to.equal(false);
    expect(checkToken("test-secreT", "test-secret")).to.equal(false);
    expect(checkToken("anything", "")).to.equal(false);
  });
});

describe("resolveHttpAuthToken", () => {
  it("prefers the bearer token over X-MCP-Token", () => {
    expect(
      resolveHttpAuthToken({ authorization: "Bearer  test-secret ", "x-mcp-token": "other" }),
    ).to.equal("test-secret");
  });

  it("falls back to X-MCP-Token and ignores other schemes", () => {
    expect(resolveHttpAuthToken({ authorization: "Basic dXNlcg==", "x-mcp-token": " test-secret" })).to.equal(
      "test-secret",
    );
  });

  it("returns undefined when nothing usable is presented", () => {
    expect(resolveHttpAuthToken({ authorization: "Bearer   ", "x-mcp-token": ["", "  "] })).to.equal(undefined);
    expect(resolveHttpAuthToken({})).to.equal(undefined);
  });
});

describe("auth gate", () => {
  const url = (path: string) => new URL(path, "http://localhost");

  it("lets everything through without a configured token", () => {
    const gate = new AuthGate({ token: "" });

    expect(gate.required).to.equal(false);
    expect(gate.verify(undefined)).to.deep.equal({ ok: true });
    expect(gate.verifyHttp({}, url("/mcp"))).to.deep.equal({ ok: true });
  });

  it("checks out-of-band tokens", () => {
    const gate = new AuthGate({ token: "test-secret" });

    expect(gate.verify("test-secret")).to.deep.equal({ ok: true });
    expect(gate.verify(undefined)).to.deep.equal({ ok: false, reason: "missing_token" });
    expect(gate.verify("wrong")).to.deep.equal({ ok: false, reason: "invalid_token" });
  });

  it("checks header tokens before the query string", () => {
    const gate = new AuthGate({ token: "test-secret", allowQueryToken: true });

    expect(gate.verifyHttp({ authorization: "Bearer wrong" }, url("/sse?token=test-secret"))).to.deep.equal({
      ok: false,
      reason: "invalid_token",
    });
    expect(gate.verifyHttp({}, url("/sse?token=test-secret"))).to.deep.equal({ ok: true });
    expect(gate.verifyHttp({}, url("/sse"))).to.deep.equal({ ok: false, reason: "missing_token" });
  });

  it("refuses query tokens unless they are enabled", () => {
    const gate = new AuthGate({ token: "test-secret" });

    expect(gate.verifyHttp({}, url("/sse?token=test-secret"))).to.deep.equal({
      ok: false,
      reason: "query_token_disabled",
    });
  });
});
