import { describe, it } from "mocha";
import { expect } from "chai";
import { ZodError } from "zod";

import { readBool, readInt, readOptionalBool, readOptionalInt, readOptionalString } from "../../src/config/env.js";
import { DEFAULT_EVENT_HISTORY_LIMIT, loadProximityRuntimeOptions } from "../../src/config/runtimeOptions.js";

describe("config/env", () => {
  it("interprets boolean literals and falls back on unknown ones", () => {
    const env = { ON: " yes ", OFF: "0", ODD: "maybe" };

    expect(readOptionalBool("ON", env)).to.equal(true);
    expect(readOptionalBool("OFF", env)).to.equal(false);
    expect(readOptionalBool("ODD", env)).to.equal(undefined);
    expect(readBool("ODD", true, env)).to.equal(true);
    expect(readBool("MISSING", false, env)).to.equal(false);
  });

  it("parses bounded base-10 integers", () => {
    const env = { LIMIT: "250", NEG: "-3", FLOAT: "2.5", HUGE: "99999999999999999999" };

    expect(readOptionalInt("LIMIT", undefined, env)).to.equal(250);
    expect(readOptionalInt("NEG", { min: 0 }, env)).to.equal(undefined);
    expect(readOptionalInt("FLOAT", undefined, env)).to.equal(undefined);
    expect(readOptionalInt("HUGE", undefined, env)).to.equal(undefined);
    expect(readInt("NEG", 7, { min: 0 }, env)).to.equal(7);
  });

  it("treats blank strings as unset", () => {
    expect(readOptionalString("BLANK", { BLANK: "   " })).to.equal(undefined);
    expect(readOptionalString("NAME", { NAME: " root " })).to.equal("root");
  });
});

describe("config/runtimeOptions", () => {
  it("applies defaults when only the deployer is set", () => {
    expect(loadProximityRuntimeOptions({ PROXIMITY_DEPLOYER: "root" })).to.deep.equal({
      deployer: "root",
      logFile: null,
      logRedact: null,
      eventHistoryLimit: DEFAULT_EVENT_HISTORY_LIMIT,
      journalDir: null,
      syntheticBypassesGate: false,
    });
  });

  it("reads every override", () => {
    const options = loadProximityRuntimeOptions({
      PROXIMITY_DEPLOYER: "root",
      PROXIMITY_LOG_FILE: "/tmp/proximity.log",
      PROXIMITY_LOG_REDACT: "on,test-secret",
      PROXIMITY_EVENT_HISTORY_LIMIT: "50",
      PROXIMITY_JOURNAL_DIR: "/tmp/journal",
      PROXIMITY_SYNTHETIC_BYPASS_GATE: "true",
    });

    expect(options).to.deep.equal({
      deployer: "root",
      logFile: "/tmp/proximity.log",
      logRedact: "on,test-secret",
      eventHistoryLimit: 50,
      journalDir: "/tmp/journal",
      syntheticBypassesGate: true,
    });
  });

  it("ignores an invalid history limit", () => {
    const options = loadProximityRuntimeOptions({ PROXIMITY_DEPLOYER: "root", PROXIMITY_EVENT_HISTORY_LIMIT: "0" });

    expect(options.eventHistoryLimit).to.equal(DEFAULT_EVENT_HISTORY_LIMIT);
  });

  it("requires the deployer identity", () => {
    expect(() => loadProximityRuntimeOptions({})).to.throw(ZodError, "PROXIMITY_DEPLOYER must name the deploying identity");
  });
});
