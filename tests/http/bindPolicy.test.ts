import { describe, it } from "mocha";
import { expect } from "chai";

import { BindPolicy, isLoopbackAddress } from "../../src/http/bindPolicy.js";

describe("loopback detection", () => {
  it("recognises loopback forms", () => {
    for (const address of ["127.0.0.1", "127.8.9.10", "::1", "[::1]", "::ffff:127.0.0.1", "LOCALHOST"]) {
      expect(isLoopbackAddress(address), address).to.equal(true);
    }
  });

  it("rejects everything else", () => {
    for (const address of ["0.0.0.0", "192.168.1.20", "::", "::ffff:10.0.0.1", "example.test", "", undefined, null]) {
      expect(isLoopbackAddress(address), String(address)).to.equal(false);
    }
  });
});

describe("bind policy", () => {
  it("admits only loopback peers by default", () => {
    const policy = new BindPolicy({ allowRemote: false });

    expect(policy.admits("127.0.0.1")).to.deep.equal({ ok: true });
    expect(policy.admits("10.1.2.3")).to.deep.equal({ ok: false, reason: "remote_peer" });
    expect(policy.admits(undefined)).to.deep.equal({ ok: false, reason: "remote_peer" });
    expect(policy.permitsHost("0.0.0.0")).to.equal(false);
    expect(policy.permitsHost("localhost")).to.equal(true);
  });

  it("admits any peer once remote access is enabled", () => {
    const policy = new BindPolicy({ allowRemote: true });

    expect(policy.admits("10.1.2.3")).to.deep.equal({ ok: true });
    expect(policy.permitsHost("0.0.0.0")).to.equal(true);
  });
});
