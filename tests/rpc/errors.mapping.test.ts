import { describe, it } from "mocha";
import { expect } from "chai";

import { runWithJsonRpcContext } from "../../src/infra/jsonRpcContext.js";
import {
  AuthError,
  ForbiddenError,
  InternalError,
  UnknownCapabilityError,
  ValidationError,
  toJsonRpc,
} from "../../src/rpc/errors.js";

describe("rpc errors mapping", () => {
  it("maps validation errors with hints and issues", () => {
    const error = new ValidationError("Invalid params", {
      requestId: "req-validation",
      hint: "name: Required",
      issues: [{ path: ["name"], message: "Required" }],
    });

    expect(toJsonRpc("req-validation", error)).to.deep.equal({
      jsonrpc: "2.0",
      id: "req-validation",
      error: {
        code: -32602,
        message: "Invalid params",
        data: {
          category: "VALIDATION_ERROR",
          request_id: "req-validation",
          hint: "name: Required",
          issues: [{ path: ["name"], message: "Required" }],
        },
      },
    });
  });

  it("attaches the HTTP status of auth and forbidden errors", () => {
    expect(new AuthError().data).to.deep.equal({ category: "AUTH_REQUIRED", status: 401 });
    expect(new ForbiddenError(undefined, { hint: "remote_peer" }).data).to.deep.equal({
      category: "FORBIDDEN",
      hint: "remote_peer",
      status: 403,
    });
    expect(new AuthError("Authentication required").name).to.equal("AuthError");
  });

  it("stamps the request and session of the current routing context", () => {
    const error = runWithJsonRpcContext({ transport: "sse", requestId: 9, sessionId: "s1" }, () =>
      new UnknownCapabilityError("Unknown tool 'ghost'"),
    );

    expect(error.code).to.equal(-32004);
    expect(error.data).to.deep.equal({ category: "UNKNOWN_CAPABILITY", request_id: 9, session_id: "s1" });
  });

  it("lets an explicit request id override the context", () => {
    const error = runWithJsonRpcContext({ transport: "http", requestId: 9, sessionId: null }, () =>
      new InternalError(undefined, { requestId: null }),
    );

    expect(error.message).to.equal("Internal error");
    expect(error.data).to.deep.equal({ category: "INTERNAL", request_id: null });
  });
});
