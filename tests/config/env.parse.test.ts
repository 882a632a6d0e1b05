import { describe, it } from "mocha";
import { expect } from "chai";

import {
  readBool,
  readInt,
  readOptionalBool,
  readOptionalInt,
  readOptionalString,
  readString,
} from "../../src/config/env.js";

describe("environment readers", () => {
  it("interprets boolean literals", () => {
    const env = { A: " YES ", B: "off", C: "maybe" };

    expect(readOptionalBool("A", env)).to.equal(true);
    expect(readOptionalBool("B", env)).to.equal(false);
    expect(readOptionalBool("C", env)).to.equal(undefined);
    expect(readBool("C", true, env)).to.equal(true);
    expect(readBool("MISSING", false, env)).to.equal(false);
  });

  it("parses base-10 integers within bounds", () => {
    const env = { PORT: " 8080 ", NEG: "-5", FLOAT: "1.5", HUGE: "99999999999999999999" };

    expect(readOptionalInt("PORT", undefined, env)).to.equal(8080);
    expect(readOptionalInt("NEG", undefined, env)).to.equal(-5);
    expect(readOptionalInt("NEG", { min: 0 }, env)).to.equal(undefined);
    expect(readOptionalInt("PORT", { max: 1024 }, env)).to.equal(undefined);
    expect(readOptionalInt("FLOAT", undefined, env)).to.equal(undefined);
    expect(readOptionalInt("HUGE", undefined, env)).to.equal(undefined);
    expect(readInt("FLOAT", 7, undefined, env)).to.equal(7);
  });

  it("trims strings and treats blank values as missing", () => {
    const env = { NAME: "  broker ", BLANK: "   " };

    expect(readOptionalString("NAME", env)).to.equal("broker");
    expect(readOptionalString("BLANK", env)).to.equal(undefined);
    expect(readString("BLANK", "fallback", env)).to.equal("fallback");
  });
});
