import { describe, it } from "mocha";
import { expect } from "chai";

import { loadBrokerConfig } from "../src/config/brokerConfig.js";
import { parseServerOptions } from "../src/serverOptions.js";

describe("server options", () => {
  const base = loadBrokerConfig({});

  it("keeps the base configuration without flags", () => {
    expect(parseServerOptions([], base)).to.deep.equal(base);
  });

  it("applies transport flags", () => {
    const config = parseServerOptions(["--no-stdio", "--http-port", "8123", "--http-path=rpc", "--allow-remote"], {
      ...base,
      http: { ...base.http, enabled: false },
    });

    expect(config.enableStdio).to.equal(false);
    expect(config.http).to.deep.include({ enabled: true, port: 8123, path: "/rpc", allowRemote: true });
  });

  it("applies job and tick flags", () => {
    const config = parseServerOptions(
      ["--job-timeout-ms=2500", "--max-jobs", "4", "--tick-interval-ms", "10", "--log-file", "/tmp/broker.log"],
      base,
    );

    expect(config.jobs).to.deep.include({ timeoutMs: 2_500, capacity: 4 });
    expect(config.tick.intervalMs).to.equal(10);
    expect(config.log.file).to.equal("/tmp/broker.log");
  });

  it("disables the HTTP listener", () => {
    expect(parseServerOptions(["--no-http"], base).http.enabled).to.equal(false);
  });

  it("does not mutate the base configuration", () => {
    parseServerOptions(["--http-port", "9999", "--no-stdio"], base);

    expect(base.http.port).to.equal(12097);
    expect(base.enableStdio).to.equal(true);
  });

  it("reports missing and invalid values", () => {
    expect(() => parseServerOptions(["--http-port"], base)).to.throw("Flag --http-port requires a value.");
    expect(() => parseServerOptions(["--max-jobs", "--no-http"], base)).to.throw("Flag --max-jobs requires a value.");
    expect(() => parseServerOptions(["--max-jobs=0"], base)).to.throw(
      "Value 0 for --max-jobs must be a positive integer.",
    );
    expect(() => parseServerOptions(["--http-host", " "], base)).to.throw("Value for --http-host cannot be empty.");
    expect(() => parseServerOptions(["--job-timeout-ms", "3000000000"], base)).to.throw(
      "Value 3000000000 for --job-timeout-ms must not exceed 2147483647.",
    );
  });

  it("ignores unknown flags and positional arguments", () => {
    expect(parseServerOptions(["--verbose", "extra"], base)).to.deep.equal(base);
  });
});
